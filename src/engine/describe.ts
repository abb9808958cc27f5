import type { HealthScoreResult, RiskCategory } from './types.js';

export function describeScore(overallScore: number): string {
  if (overallScore >= 90) return 'Excellent health resilience';
  if (overallScore >= 75) return 'Good health protection';
  if (overallScore >= 60) return 'Moderate health concern';
  if (overallScore >= 40) return 'Health awareness needed';
  return 'Immediate health protection required';
}

const CATEGORY_LABELS: Record<RiskCategory, string> = {
  Low: 'Low Risk',
  Medium: 'Medium Risk',
  High: 'High Risk',
  Critical: 'Critical Risk',
};

const CATEGORY_COLORS: Record<RiskCategory, string> = {
  Low: '#28A745',
  Medium: '#FFC107',
  High: '#FF9800',
  Critical: '#DC3545',
};

const CATEGORY_RANKS: Record<RiskCategory, number> = {
  Low: 1,
  Medium: 2,
  High: 3,
  Critical: 4,
};

export function riskCategoryLabel(category: RiskCategory): string {
  return CATEGORY_LABELS[category];
}

export function riskCategoryColor(category: RiskCategory): string {
  return CATEGORY_COLORS[category];
}

export function riskCategoryRank(category: RiskCategory): number {
  return CATEGORY_RANKS[category];
}

export const HEALTH_STATUSES = ['Excellent', 'Good', 'Fair', 'Poor', 'Critical'] as const;
export type HealthStatus = (typeof HEALTH_STATUSES)[number];

/** Coarser five-step reading of the overall score, for badges and headlines. */
export function healthStatus(overallScore: number): HealthStatus {
  if (overallScore >= 80) return 'Excellent';
  if (overallScore >= 65) return 'Good';
  if (overallScore >= 50) return 'Fair';
  if (overallScore >= 35) return 'Poor';
  return 'Critical';
}

const STATUS_COLORS: Record<HealthStatus, string> = {
  Excellent: '#28A745',
  Good: '#20C997',
  Fair: '#FFC107',
  Poor: '#FF9800',
  Critical: '#DC3545',
};

export function healthStatusColor(status: HealthStatus): string {
  return STATUS_COLORS[status];
}

const RISK_DESCRIPTIONS: Record<RiskCategory, string> = {
  Low: 'Low risk - Continue normal activities with standard precautions',
  Medium: 'Medium risk - Consider limiting prolonged outdoor exposure',
  High: 'High risk - Reduce outdoor activities and use protective measures',
  Critical: 'Critical risk - Seek medical advice and minimize outdoor exposure',
};

export function riskLevelDescription(category: RiskCategory): string {
  return RISK_DESCRIPTIONS[category];
}

/**
 * Short everyday tips for the scores in `result`, in display order.
 * The sedentary tip reads the activity level recorded in the protective factors.
 */
export function personalizedTips(result: HealthScoreResult): string[] {
  const tips: string[] = [];

  if (result.overallScore < 50) {
    tips.push('Consider wearing an N95 mask when outdoors');
    tips.push('Keep windows closed and use air purifiers indoors');
  }

  if (result.activityImpactScore < 60) {
    tips.push('Move exercise indoors during poor air quality days');
    tips.push('Choose early morning or evening for outdoor activities');
  }

  if (result.respiratoryScore < 60) {
    tips.push('Monitor your breathing and respiratory symptoms');
    tips.push('Consider consulting a pulmonologist if symptoms worsen');
  }

  if (result.contributingFactors.protective.activityLevel === 'sedentary') {
    tips.push('Regular indoor exercise can improve your resilience to air pollution');
  }

  return tips;
}
