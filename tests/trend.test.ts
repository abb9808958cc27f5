import { describe, it, expect } from 'vitest';
import { HealthScoreEngine } from '../src/engine/engine.js';
import { summarizeTrend, toHistoryEntry, type HealthScoreHistoryEntry } from '../src/engine/trend.js';
import type { RiskCategory } from '../src/engine/types.js';
import { NOW, hoursAgo, makeHealth, makeReading, makeUser } from './helpers/test-utils.js';

function entry(hours: number, overallScore: number, riskCategory: RiskCategory = 'Low'): HealthScoreHistoryEntry {
  return {
    timestamp: hoursAgo(hours),
    overallScore,
    respiratoryScore: overallScore,
    cardiovascularScore: overallScore,
    immuneScore: overallScore,
    activityImpactScore: overallScore,
    riskCategory,
  };
}

describe('Score Trend', () => {
  it('should return null for no entries', () => {
    expect(summarizeTrend([])).toBeNull();
  });

  it('should summarize entries in time order regardless of input order', () => {
    const summary = summarizeTrend([entry(2, 70, 'Medium'), entry(10, 90), entry(6, 81)]);

    expect(summary).toEqual({
      count: 3,
      from: hoursAgo(10),
      to: hoursAgo(2),
      firstScore: 90,
      latestScore: 70,
      minScore: 70,
      maxScore: 90,
      averageScore: 80.3,
      change: -20,
      direction: 'declining',
      latestCategory: 'Medium',
    });
  });

  it('should call small changes stable', () => {
    expect(summarizeTrend([entry(5, 60), entry(1, 64)])?.direction).toBe('stable');
    expect(summarizeTrend([entry(5, 60), entry(1, 65)])?.direction).toBe('improving');
    expect(summarizeTrend([entry(5, 60), entry(1, 55)])?.direction).toBe('declining');
  });

  it('should build history entries from results', () => {
    const engine = new HealthScoreEngine({ clock: () => NOW, generateId: () => 'result-1' });
    const result = engine.computeHealthScore('user-1', makeUser(), makeHealth(), makeReading());

    expect(toHistoryEntry(result)).toEqual({
      timestamp: NOW,
      overallScore: 100,
      respiratoryScore: 99,
      cardiovascularScore: 98,
      immuneScore: 99,
      activityImpactScore: 100,
      riskCategory: 'Low',
    });
  });
});
