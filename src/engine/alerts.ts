import type { ComponentId } from './components/types.js';
import type { HealthRecommendation, HealthScoreResult } from './types.js';

/** Drops larger than this many overall points raise a score_drop alert. */
export const SCORE_DROP_THRESHOLD = 20;

export type ScoreAlert =
  | { kind: 'score_drop'; drop: number; overallScore: number }
  | { kind: 'risk_change'; from: HealthScoreResult['riskCategory']; to: HealthScoreResult['riskCategory'] }
  | { kind: 'urgent_recommendation'; recommendationId: string; title: string };

/**
 * Alert triggers between two consecutive results for the same user.
 * Deciding whether and when to surface them is left to the notification layer.
 */
export function detectScoreAlerts(
  previous: HealthScoreResult | undefined,
  current: HealthScoreResult
): ScoreAlert[] {
  if (!previous) return [];

  const alerts: ScoreAlert[] = [];

  const drop = previous.overallScore - current.overallScore;
  if (drop > SCORE_DROP_THRESHOLD) {
    alerts.push({ kind: 'score_drop', drop, overallScore: current.overallScore });
  }

  if (previous.riskCategory !== current.riskCategory) {
    alerts.push({ kind: 'risk_change', from: previous.riskCategory, to: current.riskCategory });
  }

  const urgent = current.recommendations.find(rec => rec.isUrgent);
  if (urgent) {
    alerts.push({ kind: 'urgent_recommendation', recommendationId: urgent.id, title: urgent.title });
  }

  return alerts;
}

export function needsImmediateAttention(result: HealthScoreResult): boolean {
  return (
    result.riskCategory === 'Critical' ||
    result.overallScore < 30 ||
    result.recommendations.some(rec => rec.isUrgent)
  );
}

/** Scores under this value flag their area as needing attention. */
export const ATTENTION_THRESHOLD = 60;

export type ScoreArea = ComponentId | 'overall';

export type ScoreField =
  | 'overallScore'
  | 'respiratoryScore'
  | 'cardiovascularScore'
  | 'immuneScore'
  | 'activityImpactScore';

export const SCORE_FIELDS: Record<ScoreArea, ScoreField> = {
  overall: 'overallScore',
  respiratory: 'respiratoryScore',
  cardiovascular: 'cardiovascularScore',
  immune: 'immuneScore',
  activityImpact: 'activityImpactScore',
};

export function needsAttention(result: HealthScoreResult, area: ScoreArea): boolean {
  return result[SCORE_FIELDS[area]] < ATTENTION_THRESHOLD;
}

export function isUrgentRecommendation(rec: HealthRecommendation): boolean {
  return rec.isUrgent || rec.priority === 'Critical';
}

/** Splits recommendations for display, keeping their order within each group. */
export function partitionRecommendations(result: HealthScoreResult): {
  urgent: HealthRecommendation[];
  general: HealthRecommendation[];
} {
  return {
    urgent: result.recommendations.filter(isUrgentRecommendation),
    general: result.recommendations.filter(rec => !isUrgentRecommendation(rec)),
  };
}
