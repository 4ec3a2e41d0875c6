#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig } from './config.js';
import { setLogLevel } from './utils/logger.js';
import { reportCommand } from './commands/report.js';
import { serveCommand } from './commands/serve.js';
import { ANALYZER_VERSION } from './scorecard/analyzer.js';

const config = loadConfig();
setLogLevel(config.logLevel);

const program = new Command();

program
  .name('resilience-scorecard')
  .description('Score how well an AI agent survived a chaos-testing session, from its proxy logs')
  .version(ANALYZER_VERSION);

program
  .command('report', { isDefault: true })
  .description('Analyze a proxy log and write JSON and Markdown resilience reports')
  .option('--log-file <path>', 'Path to proxy log file (default: auto-detect)', config.logFile)
  .option('--log-dir <dir>', 'Directory to search for *.log files', config.logDir)
  .option('--output-dir <dir>', 'Output directory for reports', config.outputDir)
  .option('--json-only', 'Only generate the JSON report')
  .option('--md-only', 'Only generate the Markdown report')
  .option('--debug', 'Enable debug logging')
  .action(reportCommand);

program
  .command('serve')
  .description('Serve the scorecard of the configured log over HTTP')
  .option('-p, --port <port>', 'Port to listen on', String(config.port))
  .option('--log-file <path>', 'Path to proxy log file (default: auto-detect)', config.logFile)
  .option('--log-dir <dir>', 'Directory to search for *.log files', config.logDir)
  .option('--debug', 'Enable debug logging')
  .action(serveCommand);

await program.parseAsync();
