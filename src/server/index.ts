import express, { type Express } from 'express';
import { createServer, type Server } from 'http';
import { logger } from '../utils/logger.js';
import { ANALYZER_VERSION, type AnalyzeOptions } from '../scorecard/analyzer.js';
import { createScorecardRouter } from './routes/scorecard.js';

export const SERVICE_NAME = 'resilience-scorecard';

export interface ServerOptions extends AnalyzeOptions {
  port: number;
}

export function createApp(source: AnalyzeOptions): Express {
  const app = express();

  app.get('/api/health', (_req, res) => {
    res.json({ ok: true, service: SERVICE_NAME, version: ANALYZER_VERSION });
  });

  app.use('/api/scorecard', createScorecardRouter(source));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

export function startServer(options: ServerOptions): Promise<Server> {
  const { port, ...source } = options;
  const server = createServer(createApp(source));

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, () => {
      logger.info(`Server listening on http://localhost:${port}`, { logFile: source.logFile, logDir: source.logDir });
      console.log(`\nresilience-scorecard server running at http://localhost:${port}`);
      console.log(`Scorecard: http://localhost:${port}/api/scorecard`);
      console.log(`Markdown: http://localhost:${port}/api/scorecard/markdown\n`);
      resolve(server);
    });
  });
}
