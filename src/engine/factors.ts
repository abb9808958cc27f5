import { activityVulnerability, ageVulnerability, bmiImpact } from './impact.js';
import type { ScoringContext } from './normalize.js';
import type {
  AgeGroup,
  AirCondition,
  AirQualityReading,
  ContributingFactors,
  PollutantName,
} from './types.js';

/** Largest raw value wins; on a tie the earlier entry (PM2.5 first) is kept. */
export function primaryPollutantConcern(reading: AirQualityReading): PollutantName {
  const candidates: Array<[PollutantName, number]> = [
    ['AQI', reading.aqi],
    ['PM10', reading.pm10],
    ['NO2', reading.no2],
    ['O3', reading.o3],
  ];

  let maxName: PollutantName = 'PM2.5';
  let maxValue = reading.pm25;
  for (const [name, value] of candidates) {
    if (value > maxValue) {
      maxName = name;
      maxValue = value;
    }
  }
  return maxName;
}

export function airCondition(aqi: number): AirCondition {
  if (aqi > 150) return 'Poor and worsening';
  if (aqi > 100) return 'Moderate and concerning';
  if (aqi > 50) return 'Acceptable but watch';
  return 'Good conditions';
}

export function ageGroup(age: number): AgeGroup {
  if (age < 18) return 'Child/Youth';
  if (age < 30) return 'Young Adult';
  if (age < 50) return 'Adult';
  if (age < 65) return 'Middle Age';
  return 'Senior';
}

export function analyzeContributingFactors(context: ScoringContext): ContributingFactors {
  const { reading, health, user } = context;

  return {
    airQuality: {
      kind: 'air_quality',
      aqi: reading.aqi,
      pm25: reading.pm25,
      primaryConcern: primaryPollutantConcern(reading),
      condition: airCondition(reading.aqi),
    },
    vulnerability: {
      kind: 'vulnerability',
      ageFactor: ageVulnerability(context.age),
      bmiFactor: bmiImpact(context.bmi),
      activityFactor: activityVulnerability(user.activityLevel),
      healthConditions: {
        respiratory: [...health.respiratoryConditions],
        cardiovascular: [...health.cardiovascularConditions],
        overallRisk: health.riskLevel,
      },
    },
    protective: {
      kind: 'protective',
      activityLevel: user.activityLevel,
      ageGroup: ageGroup(context.age),
      baselineLungCapacity: health.baselineLungCapacity,
    },
    exposure: {
      kind: 'exposure',
      historySamples: context.history?.length ?? 0,
      dailyAverageAqi: context.dailyAverageAqi,
      weeklyAverageAqi: context.weeklyAverageAqi,
    },
  };
}
