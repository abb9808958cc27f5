import { dailyExposure, weeklyExposure } from './exposure.js';
import type { AirQualityReading, HealthProfile, UserProfile } from './types.js';

export const MAX_AQI = 500;

function clampNonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

/** Negative or non-finite pollutant values become 0; AQI is held to [0, 500]. */
export function normalizeReading(reading: AirQualityReading): AirQualityReading {
  return {
    ...reading,
    pm25: clampNonNegative(reading.pm25),
    pm10: clampNonNegative(reading.pm10),
    no2: clampNonNegative(reading.no2),
    so2: clampNonNegative(reading.so2),
    o3: clampNonNegative(reading.o3),
    co: clampNonNegative(reading.co),
    aqi: Math.min(MAX_AQI, clampNonNegative(reading.aqi)),
  };
}

export function normalizeAge(age: number): number {
  return Math.floor(clampNonNegative(age));
}

/**
 * weight_kg / (height_m)². Undefined when either biometric is missing or not positive.
 */
export function calculateBmi(heightCm: number | undefined, weightKg: number | undefined): number | undefined {
  if (heightCm === undefined || weightKg === undefined) return undefined;
  if (!(Number.isFinite(heightCm) && heightCm > 0 && Number.isFinite(weightKg) && weightKg > 0)) {
    return undefined;
  }
  const heightM = heightCm / 100;
  return weightKg / (heightM * heightM);
}

function cleanConditions(conditions: readonly string[]): string[] {
  return conditions.map(c => c.trim()).filter(c => c !== '');
}

/**
 * Everything a component scorer reads, already clamped to valid ranges.
 */
export interface ScoringContext {
  reading: AirQualityReading;
  history: AirQualityReading[] | undefined;
  age: number;
  bmi: number | undefined;
  user: UserProfile;
  health: HealthProfile;
  /** Null when no history was supplied or the window is empty. */
  dailyAverageAqi: number | null;
  weeklyAverageAqi: number | null;
  now: Date;
}

export function buildScoringContext(
  user: UserProfile,
  health: HealthProfile,
  reading: AirQualityReading,
  history: AirQualityReading[] | undefined,
  now: Date
): ScoringContext {
  const normalizedHistory = history?.map(normalizeReading);
  return {
    reading: normalizeReading(reading),
    history: normalizedHistory,
    age: normalizeAge(user.age),
    bmi: calculateBmi(user.heightCm, user.weightKg),
    user,
    health: {
      ...health,
      respiratoryConditions: cleanConditions(health.respiratoryConditions),
      cardiovascularConditions: cleanConditions(health.cardiovascularConditions),
    },
    dailyAverageAqi: normalizedHistory ? dailyExposure(normalizedHistory, now) : null,
    weeklyAverageAqi: normalizedHistory ? weeklyExposure(normalizedHistory, now) : null,
    now,
  };
}
