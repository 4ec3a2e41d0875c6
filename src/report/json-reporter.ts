import type { Scorecard } from '../scorecard/types.js';
import { buildRecommendations } from './recommendations.js';

export interface ScorecardDocument extends Scorecard {
  recommendations: string[];
}

export function toScorecardDocument(scorecard: Scorecard): ScorecardDocument {
  return { ...scorecard, recommendations: buildRecommendations(scorecard) };
}

export function generateJsonReport(scorecard: Scorecard): string {
  return JSON.stringify(toScorecardDocument(scorecard), null, 2) + '\n';
}
