import { Router, Request, Response } from 'express';
import { logger } from '../../utils/logger.js';
import { analyze, type AnalyzeOptions } from '../../scorecard/analyzer.js';
import { toScorecardDocument } from '../../report/json-reporter.js';
import { generateMarkdownReport } from '../../report/markdown-reporter.js';
import { buildRecommendations } from '../../report/recommendations.js';

/**
 * Every request is an independent analysis run over the log as it is on disk.
 */
export function createScorecardRouter(source: AnalyzeOptions): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    try {
      res.json(toScorecardDocument(analyze(source)));
    } catch (err) {
      logger.error('Error building scorecard', { error: String(err) });
      res.status(500).json({ error: 'Failed to build scorecard' });
    }
  });

  router.get('/markdown', (_req: Request, res: Response) => {
    try {
      res.type('text/markdown; charset=utf-8').send(generateMarkdownReport(analyze(source)));
    } catch (err) {
      logger.error('Error rendering markdown report', { error: String(err) });
      res.status(500).json({ error: 'Failed to render report' });
    }
  });

  router.get('/recommendations', (_req: Request, res: Response) => {
    try {
      const scorecard = analyze(source);
      res.json({ grade: scorecard.grade, recommendations: buildRecommendations(scorecard) });
    } catch (err) {
      logger.error('Error building recommendations', { error: String(err) });
      res.status(500).json({ error: 'Failed to build recommendations' });
    }
  });

  return router;
}
