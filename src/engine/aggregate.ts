import { clampScore, type ComponentScores } from './components/types.js';
import { severityAdjustment } from './impact.js';
import type { RiskCategory, SelfReportedRisk } from './types.js';

/**
 * Equal-weight mean of the four components, bent by real-time AQI severity.
 * Score = mean(components) × (1 + severityAdjustment(aqi)), capped at [0, 100]
 */
export function calculateOverallScore(components: ComponentScores, aqi: number): number {
  const mean =
    (components.respiratory + components.cardiovascular + components.immune + components.activityImpact) / 4;
  return clampScore(mean * (1 + severityAdjustment(aqi)));
}

const RISK_MULTIPLIER: Record<SelfReportedRisk, number> = {
  high: 1.3,
  medium: 1.0,
  low: 0.8,
};

/** 0 = no risk, 1 = highest risk. */
export function calculateRiskLevel(overallScore: number, selfReported: SelfReportedRisk): number {
  const baseRisk = (100 - clampScore(overallScore)) / 100;
  return Math.max(0, Math.min(1, baseRisk * RISK_MULTIPLIER[selfReported]));
}

export function determineRiskCategory(riskLevel: number): RiskCategory {
  if (riskLevel >= 0.8) return 'Critical';
  if (riskLevel >= 0.6) return 'High';
  if (riskLevel >= 0.3) return 'Medium';
  return 'Low';
}
