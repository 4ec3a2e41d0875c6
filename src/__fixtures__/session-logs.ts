// Sample proxy sessions shared by the test suites
export const MIXED_SESSION_LOG = [
  '{"timestamp":"2024-05-01T10:00:00Z","method":"POST","url":"http://localhost:8001/search_flights","status_code":200,"traffic_type":"TOOL_CALL"}',
  '{"timestamp":"2024-05-01T10:00:01Z","method":"POST","url":"http://localhost:8001/book_ticket","status_code":404,"chaos_applied":["mcp_fuzzing","schema_violation"],"fuzzed":true}',
  'Retry attempt 1 for book_ticket',
  '{"timestamp":"2024-05-01T10:00:05Z","method":"POST","url":"http://localhost:8001/book_ticket","status_code":200}',
  '[HTTP Tool] POST http://localhost:8001/book_ticket Response: 200',
  'Agent processing complete',
  '',
  'not json {',
].join('\n') + '\n';

export const SWARM_RECORD =
  '{"timestamp":"2024-05-01T10:00:02Z","method":"POST","url":"http://localhost:9000/agent/message",' +
  '"status_code":503,"traffic_type":"AGENT_TO_AGENT","traffic_subtype":"consensus",' +
  '"chaos_applied":"swarm_disruption,consensus_delay"}';
