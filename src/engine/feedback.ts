import type { HealthScoreResult } from './types.js';

export const COMPLETED_ACTION_PREFIX = 'Completed - ';

/**
 * Copy of `result` without the recommendation `recommendationId`.
 * Unknown ids leave the recommendations as they were.
 */
export function dismissRecommendation(result: HealthScoreResult, recommendationId: string): HealthScoreResult {
  return {
    ...result,
    recommendations: result.recommendations.filter(rec => rec.id !== recommendationId),
  };
}

/**
 * Copy of `result` where the matching recommendation gains a completion entry
 * ("Completed - <ISO time>") at the end of its actions.
 */
export function completeRecommendation(
  result: HealthScoreResult,
  recommendationId: string,
  completedAt: Date = new Date()
): HealthScoreResult {
  return {
    ...result,
    recommendations: result.recommendations.map(rec =>
      rec.id === recommendationId
        ? { ...rec, actions: [...rec.actions, `${COMPLETED_ACTION_PREFIX}${completedAt.toISOString()}`] }
        : rec
    ),
  };
}

export function isRecommendationCompleted(result: HealthScoreResult, recommendationId: string): boolean {
  const rec = result.recommendations.find(candidate => candidate.id === recommendationId);
  return rec !== undefined && rec.actions.some(action => action.startsWith(COMPLETED_ACTION_PREFIX));
}
