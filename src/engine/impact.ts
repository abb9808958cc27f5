import type { ActivityLevel, SelfReportedRisk } from './types.js';

/**
 * Transfer functions from exposure and vulnerability inputs to penalty points.
 * Every function is pure and total: non-finite or negative inputs count as 0.
 * Callers subtract the (weighted) result from a starting score of 100.
 */

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/** 0 at or below the WHO guideline of 12 µg/m³, max 170. */
export function pm25Penalty(pm25: number): number {
  const p = nonNegative(pm25);
  if (p <= 12) return 0;
  if (p <= 35) return (p - 12) * 0.5;
  if (p <= 55) return 12 + (p - 35) * 1.0;
  if (p <= 150) return 32 + (p - 55) * 0.8;
  return 120 + Math.min(p - 150, 100) * 0.5;
}

/** Follows the EPA AQI bands, flat beyond 500. Max 280. */
export function aqiPenalty(aqi: number): number {
  const a = nonNegative(aqi);
  if (a <= 50) return 0; // Good
  if (a <= 100) return (a - 50) * 0.3; // Moderate
  if (a <= 150) return 15 + (a - 100) * 0.5; // Unhealthy for sensitive groups
  if (a <= 200) return 40 + (a - 150) * 0.8; // Unhealthy
  if (a <= 300) return 80 + (a - 200) * 1.0; // Very unhealthy
  return 180 + Math.min(a - 300, 200) * 0.5; // Hazardous
}

export function no2Penalty(no2: number): number {
  const n = nonNegative(no2);
  if (n <= 40) return 0;
  return (n - 40) * 0.8;
}

export interface AgeVulnerabilityOptions {
  cardio?: boolean;
  immune?: boolean;
}

export function ageVulnerability(age: number, options: AgeVulnerabilityOptions = {}): number {
  const a = nonNegative(age);
  let multiplier = 1.0;
  if (options.cardio) {
    multiplier = 1.5;
  } else if (options.immune) {
    multiplier = 1.3;
  }

  if (a < 18) return 5 * multiplier;
  if (a < 30) return 2 * multiplier;
  if (a < 50) return 5 * multiplier;
  if (a < 65) return 10 * multiplier;
  return 20 * multiplier;
}

// First matching condition wins, in table order.
const RESPIRATORY_CONDITION_PENALTIES: ReadonlyArray<readonly [string, number]> = [
  ['asthma', 25],
  ['copd', 30],
  ['bronchitis', 20],
  ['pneumonia', 15],
];

const CARDIOVASCULAR_CONDITION_PENALTIES: ReadonlyArray<readonly [string, number]> = [
  ['hypertension', 20],
  ['heart disease', 30],
  ['stroke', 25],
  ['arrhythmia', 15],
];

function conditionPenalty(
  conditions: readonly string[],
  table: ReadonlyArray<readonly [string, number]>
): number {
  const text = conditions.join(' ').toLowerCase();
  for (const [needle, penalty] of table) {
    if (text.includes(needle)) return penalty;
  }
  return 0;
}

export function respiratoryConditionPenalty(conditions: readonly string[]): number {
  return conditionPenalty(conditions, RESPIRATORY_CONDITION_PENALTIES);
}

export function cardiovascularConditionPenalty(conditions: readonly string[]): number {
  return conditionPenalty(conditions, CARDIOVASCULAR_CONDITION_PENALTIES);
}

export function hasConditions(conditions: readonly string[]): boolean {
  return conditions.some(c => c.trim() !== '');
}

const ACTIVITY_VULNERABILITY: Record<ActivityLevel, number> = {
  sedentary: 10,
  light: 5,
  moderate: 2,
  active: 0,
  very_active: -5,
};

/** Negative for very active users. */
export function activityVulnerability(level: ActivityLevel): number {
  return ACTIVITY_VULNERABILITY[level];
}

/** An undefined BMI (missing biometrics) carries no penalty. */
export function bmiImpact(bmi: number | undefined): number {
  if (bmi === undefined || !Number.isFinite(bmi)) return 0;
  if (bmi < 18.5) return 5;
  if (bmi <= 24.9) return 0;
  if (bmi <= 29.9) return 8;
  return 15;
}

const GENERAL_HEALTH_PENALTY: Record<SelfReportedRisk, number> = {
  high: 15,
  medium: 8,
  low: 3,
};

export function generalHealthPenalty(risk: SelfReportedRisk): number {
  return GENERAL_HEALTH_PENALTY[risk];
}

const ACTIVITY_IMMUNE_IMPACT: Record<ActivityLevel, number> = {
  sedentary: 10,
  light: 5,
  moderate: 0,
  active: -8,
  very_active: -15,
};

/** Signed: active levels reduce the immune penalty. */
export function activityImmuneImpact(level: ActivityLevel): number {
  return ACTIVITY_IMMUNE_IMPACT[level];
}

export function pollutantLoadPenalty(load: number): number {
  const l = nonNegative(load);
  if (l <= 20) return 0;
  if (l <= 50) return (l - 20) * 0.4;
  if (l <= 100) return 12 + (l - 50) * 0.6;
  return 42 + Math.min(l - 100, 50) * 0.4;
}

export function outdoorRestriction(aqi: number): number {
  const a = nonNegative(aqi);
  if (a <= 50) return 0;
  if (a <= 100) return 5;
  if (a <= 150) return 15;
  if (a <= 200) return 30;
  return 50;
}

export function exerciseImpact(aqi: number, level: ActivityLevel): number {
  const multiplier = level === 'very_active' ? 1.5 : 1.0;
  return outdoorRestriction(aqi) * multiplier;
}

export function sensitivityScore(
  age: number,
  respiratoryConditions: readonly string[],
  cardiovascularConditions: readonly string[]
): number {
  let sensitivity = 0;
  if (age < 18 || age > 65) sensitivity += 10;
  if (hasConditions(respiratoryConditions)) sensitivity += 15;
  if (hasConditions(cardiovascularConditions)) sensitivity += 10;
  return sensitivity;
}

export function locationRestriction(aqi: number): number {
  return outdoorRestriction(aqi) * 0.3;
}

/** Multiplicative bend applied to the averaged score under extreme real-time conditions. */
export function severityAdjustment(aqi: number): number {
  if (aqi > 200) return -0.1;
  if (aqi > 150) return -0.05;
  if (aqi < 50) return 0.05;
  return 0;
}
