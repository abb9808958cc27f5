import { aqiPenalty } from './impact.js';
import type { AirQualityReading } from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const DAILY_WINDOW_HOURS = 24;
export const WEEKLY_WINDOW_DAYS = 7;
export const MIN_LONG_TERM_SAMPLES = 10;

function meanAqi(readings: readonly AirQualityReading[]): number {
  return readings.reduce((sum, r) => sum + r.aqi, 0) / readings.length;
}

/**
 * Mean AQI over the trailing 24 hours, or null when no reading falls inside.
 */
export function dailyExposure(history: readonly AirQualityReading[], now: Date): number | null {
  const since = now.getTime() - DAILY_WINDOW_HOURS * HOUR_MS;
  const recent = history.filter(r => r.timestamp.getTime() > since);
  if (recent.length === 0) return null;
  return meanAqi(recent);
}

/**
 * Mean of the daily mean AQI across the 7 trailing day buckets.
 * Day i covers (now - (i+1) days, now - i days]. Empty buckets are skipped.
 * Null when history has fewer than 10 samples or every bucket is empty.
 *
 * Buckets trail `now` and are never shifted forward: day 0 ends at `now`, not a day later.
 */
export function weeklyExposure(history: readonly AirQualityReading[], now: Date): number | null {
  if (history.length < MIN_LONG_TERM_SAMPLES) return null;

  const dailyMeans: number[] = [];
  for (let i = 0; i < WEEKLY_WINDOW_DAYS; i++) {
    const end = now.getTime() - i * DAY_MS;
    const start = end - DAY_MS;
    const day = history.filter(r => {
      const t = r.timestamp.getTime();
      return t > start && t <= end;
    });
    if (day.length > 0) {
      dailyMeans.push(meanAqi(day));
    }
  }

  if (dailyMeans.length === 0) return null;
  return dailyMeans.reduce((a, b) => a + b, 0) / dailyMeans.length;
}

export function exposureTimePenalty(dailyAverageAqi: number | null): number {
  return dailyAverageAqi === null ? 0 : aqiPenalty(dailyAverageAqi) * 0.5;
}

export function longTermExposurePenalty(weeklyAverageAqi: number | null): number {
  return weeklyAverageAqi === null ? 0 : aqiPenalty(weeklyAverageAqi) * 0.3;
}
