import type { HealthScoreResult, RiskCategory } from './types.js';

export interface HealthScoreHistoryEntry {
  timestamp: Date;
  overallScore: number;
  respiratoryScore: number;
  cardiovascularScore: number;
  immuneScore: number;
  activityImpactScore: number;
  riskCategory: RiskCategory;
}

export type TrendDirection = 'improving' | 'declining' | 'stable';

export interface TrendSummary {
  count: number;
  from: Date;
  to: Date;
  firstScore: number;
  latestScore: number;
  minScore: number;
  maxScore: number;
  averageScore: number;
  change: number;
  direction: TrendDirection;
  latestCategory: RiskCategory;
}

// Changes smaller than this are reported as stable
const TREND_STEP = 5;

export function toHistoryEntry(result: HealthScoreResult): HealthScoreHistoryEntry {
  return {
    timestamp: new Date(result.timestamp.getTime()),
    overallScore: result.overallScore,
    respiratoryScore: result.respiratoryScore,
    cardiovascularScore: result.cardiovascularScore,
    immuneScore: result.immuneScore,
    activityImpactScore: result.activityImpactScore,
    riskCategory: result.riskCategory,
  };
}

export function summarizeTrend(entries: readonly HealthScoreHistoryEntry[]): TrendSummary | null {
  const sorted = [...entries].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const first = sorted[0];
  const latest = sorted[sorted.length - 1];
  if (!first || !latest) return null;

  const scores = sorted.map(e => e.overallScore);
  const average = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  const change = latest.overallScore - first.overallScore;

  let direction: TrendDirection = 'stable';
  if (change >= TREND_STEP) direction = 'improving';
  else if (change <= -TREND_STEP) direction = 'declining';

  return {
    count: sorted.length,
    from: first.timestamp,
    to: latest.timestamp,
    firstScore: first.overallScore,
    latestScore: latest.overallScore,
    minScore: Math.min(...scores),
    maxScore: Math.max(...scores),
    averageScore: Math.round(average * 10) / 10,
    change,
    direction,
    latestCategory: latest.riskCategory,
  };
}
