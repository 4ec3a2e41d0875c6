import { percent, titleCase } from '../utils/format.js';
import type { Metrics, Scorecard } from '../scorecard/types.js';
import { buildRecommendations } from './recommendations.js';

const MAX_LOGIC_ERRORS = 5;

export function generateMarkdownReport(scorecard: Scorecard): string {
  const { metadata, metrics, grade, summary } = scorecard;
  const lines: string[] = [];

  lines.push('# Resilience Scorecard');
  lines.push('');
  lines.push(`**Generated:** ${metadata.generated_at}`);
  lines.push('');
  if (metadata.log_file) {
    lines.push(`**Log file:** ${metadata.log_file}`);
    lines.push('');
  }
  if (metadata.warning) {
    lines.push(`**Warning:** ${metadata.warning}`);
    lines.push('');
  }
  lines.push(`## Overall Grade: ${grade}`);
  lines.push('');
  lines.push(`**Resilience Score:** ${metrics.resilience_score.toFixed(1)}/100`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  for (const [key, value] of Object.entries(summary)) {
    if (key === 'grade') continue;
    lines.push(`- **${titleCase(key)}:** ${value}`);
  }
  lines.push('');

  lines.push('## Detailed Metrics');
  lines.push('');
  lines.push(...toolCallSection(metrics));
  lines.push(...swarmSection(metrics));
  lines.push(...fuzzingSection(metrics));

  lines.push('### System Recovery');
  lines.push('');
  lines.push(`- Retry Attempts: ${metrics.retry_attempts}`);
  lines.push(`- Successful Retries: ${metrics.successful_retries}`);
  lines.push(`- Recovery Rate: ${percent(metrics.system_recovery_rate)}`);
  lines.push('');

  lines.push('### Agent Outcome');
  lines.push('');
  lines.push(`- Successful Completions: ${metrics.agent_successful_completion}`);
  lines.push(`- Crashes: ${metrics.agent_crashes}`);
  lines.push('');

  lines.push(...raceConditionSection(metrics));
  lines.push(...countSection('### Error Breakdown', metrics.tool_call_errors));

  lines.push('## Recommendations');
  lines.push('');
  for (const recommendation of buildRecommendations(scorecard)) {
    lines.push(`- ${recommendation}`);
  }
  lines.push('');

  return lines.join('\n');
}

function toolCallSection(metrics: Metrics): string[] {
  return [
    '### Tool Calls',
    '',
    `- Total Tool Calls: ${metrics.total_tool_calls}`,
    `- Successful: ${metrics.successful_tool_calls}`,
    `- Failed: ${metrics.failed_tool_calls}`,
    `- Success Rate: ${percent(metrics.tool_call_success_rate)}`,
    '',
  ];
}

function swarmSection(metrics: Metrics): string[] {
  if (Object.keys(metrics.swarm_communication_errors).length === 0) {
    return [];
  }
  return [
    ...countSection('### Swarm Communication Errors', metrics.swarm_communication_errors),
    '**Swarm Disruption Summary:**',
    `- Agent-to-Agent Disruptions: ${metrics.agent_to_agent_disruptions}`,
    `- Message Mutations: ${metrics.message_mutations}`,
    `- Consensus Delays: ${metrics.consensus_delays}`,
    `- Agent Isolations: ${metrics.agent_isolations}`,
    '',
  ];
}

function fuzzingSection(metrics: Metrics): string[] {
  const lines = [
    '### Fuzzing',
    '',
    `- Fuzzing Attempts: ${metrics.fuzzing_attempts}`,
    `- Successful Injections: ${metrics.fuzzing_successful}`,
    `- Fuzzing Success Rate: ${percent(metrics.fuzzing_success_rate)}`,
    '',
  ];
  const types = Object.entries(metrics.fuzzing_types);
  if (types.length > 0) {
    lines.push('**Fuzzing Types:**');
    for (const [fuzzType, count] of types) {
      lines.push(`- ${fuzzType}: ${count}`);
    }
    lines.push('');
  }
  return lines;
}

function raceConditionSection(metrics: Metrics): string[] {
  if (metrics.race_conditions_detected === 0) {
    return [];
  }

  const lines = [
    '### Race Conditions Detected',
    '',
    `**Critical Issue**: ${metrics.race_conditions_detected} race condition(s) found!`,
    '',
    '**What this means**: The agent called dependent tools (e.g., `book_ticket`) before their ' +
      'dependencies (e.g., `search_flights`) completed, or with invalid data.',
    '',
  ];

  if (metrics.logic_errors.length > 0) {
    lines.push('**Details**:');
    metrics.logic_errors.slice(0, MAX_LOGIC_ERRORS).forEach((error, index) => {
      lines.push(`${index + 1}. ${error.description}`);
      lines.push(`   - Time: ${error.dependent_call_time}`);
      lines.push(`   - Status: ${error.dependent_call_status}`);
    });
    lines.push('');
  }

  return lines;
}

function countSection(heading: string, counts: Readonly<Record<string, number>>): string[] {
  const entries = Object.entries(counts);
  if (entries.length === 0) {
    return [];
  }
  return [heading, '', ...entries.map(([key, count]) => `- ${key}: ${count}`), ''];
}
