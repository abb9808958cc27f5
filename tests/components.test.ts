import { describe, it, expect } from 'vitest';
import {
  activityImpactScorer,
  allScorers,
  cardiovascularScorer,
  clampScore,
  immuneScorer,
  respiratoryScorer,
  scoreComponents,
} from '../src/engine/components/index.js';
import { buildScoringContext, calculateBmi, normalizeAge, normalizeReading } from '../src/engine/normalize.js';
import type { AirQualityReading } from '../src/engine/types.js';
import { NOW, hoursAgo, makeHealth, makeReading, makeUser } from './helpers/test-utils.js';

function goodDayContext(history?: AirQualityReading[]) {
  return buildScoringContext(makeUser(), makeHealth(), makeReading(), history, NOW);
}

function pollutedDayContext() {
  return buildScoringContext(
    makeUser({ age: 70, heightCm: 170, weightKg: 95, activityLevel: 'sedentary' }),
    makeHealth({
      respiratoryConditions: ['asthma'],
      cardiovascularConditions: ['heart disease'],
      riskLevel: 'high',
    }),
    makeReading({ pm25: 180, pm10: 200, no2: 200, o3: 120, aqi: 250 }),
    undefined,
    NOW
  );
}

describe('Normalization', () => {
  it('should clamp negative pollutants and cap AQI at 500', () => {
    const reading = normalizeReading(makeReading({ pm25: -3, no2: Number.NaN, aqi: 750 }));
    expect(reading.pm25).toBe(0);
    expect(reading.no2).toBe(0);
    expect(reading.aqi).toBe(500);
  });

  it('should floor ages and treat negative ages as 0', () => {
    expect(normalizeAge(42.9)).toBe(42);
    expect(normalizeAge(-1)).toBe(0);
  });

  it('should compute BMI from centimetres and kilograms', () => {
    expect(calculateBmi(200, 88)).toBe(22);
    expect(calculateBmi(0, 70)).toBeUndefined();
    expect(calculateBmi(180, -1)).toBeUndefined();
    expect(calculateBmi(undefined, 70)).toBeUndefined();
    expect(calculateBmi(180, undefined)).toBeUndefined();
  });

  it('should drop blank condition entries', () => {
    const context = buildScoringContext(
      makeUser(),
      makeHealth({ respiratoryConditions: [' asthma ', ''] }),
      makeReading(),
      undefined,
      NOW
    );
    expect(context.health.respiratoryConditions).toEqual(['asthma']);
  });

  it('should leave exposure averages null without history', () => {
    const context = goodDayContext();
    expect(context.dailyAverageAqi).toBeNull();
    expect(context.weeklyAverageAqi).toBeNull();
  });
});

describe('Component Scorers', () => {
  it('should expose the four components in display order', () => {
    expect(allScorers.map(s => s.name)).toEqual(['Respiratory', 'Cardiovascular', 'Immune', 'Activity Impact']);
  });

  describe('on a clean-air day', () => {
    const context = goodDayContext();

    it('should only deduct the age term from respiratory', () => {
      // age 30 -> 5, weighted 0.2
      expect(respiratoryScorer.score(context)).toBe(99);
    });

    it('should deduct the cardio-weighted age term from cardiovascular', () => {
      // 5 * 1.5 * 0.25
      expect(cardiovascularScorer.score(context)).toBe(98.125);
    });

    it('should credit active users in the immune score', () => {
      // 100 - 6.5*0.3 - 3*0.2 + 8*0.15
      expect(immuneScorer.score(context)).toBeCloseTo(98.65, 10);
    });

    it('should not restrict activity', () => {
      expect(activityImpactScorer.score(context)).toBe(100);
    });
  });

  describe('on a heavily polluted day', () => {
    const components = scoreComponents(pollutedDayContext());

    it('should push respiratory below 30', () => {
      // 100 - 135*0.3 - 130*0.25 - (20 + 25 + 10)*0.2
      expect(components.respiratory).toBeCloseTo(16, 10);
    });

    it('should keep the un-renormalized cardiovascular weights', () => {
      // 100 - 153*0.35 - 128*0.2 - 30*0.25 - 15*0.15 - 30*0.2
      expect(components.cardiovascular).toBeCloseTo(5.1, 10);
    });

    it('should score the combined pollutant load', () => {
      // load 175 -> 62; 100 - 62*0.25 - 26*0.3 - 15*0.2 - 10*0.15
      expect(components.immune).toBeCloseTo(72.2, 10);
    });

    it('should restrict activity for a sensitive user', () => {
      // 100 - 50*0.4 - 50*0.3 - 35*0.2 - 15*0.15
      expect(components.activityImpact).toBeCloseTo(55.75, 10);
    });
  });

  it('should clamp cardiovascular at 0 under extreme input', () => {
    const context = buildScoringContext(
      makeUser({ age: 80, heightCm: 160, weightKg: 110 }),
      makeHealth({ cardiovascularConditions: ['heart disease'] }),
      makeReading({ pm25: 500, no2: 500 }),
      undefined,
      NOW
    );
    expect(cardiovascularScorer.score(context)).toBe(0);
  });

  it('should apply exposure terms once history is supplied', () => {
    // Ten readings at AQI 150 within the day: aqiPenalty(150) = 40
    const history = Array.from({ length: 10 }, (_, i) => makeReading({ aqi: 150, timestamp: hoursAgo(i + 1) }));
    const context = goodDayContext(history);

    expect(context.dailyAverageAqi).toBe(150);
    expect(context.weeklyAverageAqi).toBe(150);
    // 99 - 40*0.5*0.15
    expect(respiratoryScorer.score(context)).toBeCloseTo(96, 10);
    // 98.65 - 40*0.3*0.2
    expect(immuneScorer.score(context)).toBeCloseTo(96.25, 10);
  });

  it('should treat an empty history as no recent exposure', () => {
    const context = goodDayContext([]);
    expect(respiratoryScorer.score(context)).toBe(99);
  });

  it('should clamp to the 0-100 range', () => {
    expect(clampScore(-4)).toBe(0);
    expect(clampScore(104)).toBe(100);
    expect(clampScore(55.5)).toBe(55.5);
  });
});
