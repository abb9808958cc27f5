import { determineRiskCategory } from './aggregate.js';
import { InvalidInputError, formatValidationErrors, type ValidationError } from './errors.js';
import {
  ACTIVITY_LEVELS,
  RECOMMENDATION_PRIORITIES,
  RECOMMENDATION_TYPES,
  RISK_CATEGORIES,
  SELF_REPORTED_RISKS,
  type AgeGroup,
  type AirCondition,
  type ContributingFactors,
  type HealthRecommendation,
  type HealthScoreResult,
  type PollutantName,
} from './types.js';
import { FieldReader, isRecord } from '../utils/fields.js';

const POLLUTANT_NAMES = ['PM2.5', 'AQI', 'PM10', 'NO2', 'O3'] as const satisfies readonly PollutantName[];
const AIR_CONDITIONS = [
  'Good conditions',
  'Acceptable but watch',
  'Moderate and concerning',
  'Poor and worsening',
] as const satisfies readonly AirCondition[];
const AGE_GROUPS = [
  'Child/Youth',
  'Young Adult',
  'Adult',
  'Middle Age',
  'Senior',
] as const satisfies readonly AgeGroup[];

export type HealthRecommendationJson = Omit<HealthRecommendation, 'createdAt'> & { createdAt: string };

export type HealthScoreResultJson = Omit<HealthScoreResult, 'recommendations' | 'timestamp' | 'expiresAt'> & {
  recommendations: HealthRecommendationJson[];
  timestamp: string;
  expiresAt: string;
};

export function serializeResult(result: HealthScoreResult): HealthScoreResultJson {
  const factors = result.contributingFactors;
  return {
    ...result,
    contributingFactors: {
      airQuality: { ...factors.airQuality },
      vulnerability: {
        ...factors.vulnerability,
        healthConditions: {
          ...factors.vulnerability.healthConditions,
          respiratory: [...factors.vulnerability.healthConditions.respiratory],
          cardiovascular: [...factors.vulnerability.healthConditions.cardiovascular],
        },
      },
      protective: { ...factors.protective },
      exposure: { ...factors.exposure },
    },
    recommendations: result.recommendations.map(rec => ({
      ...rec,
      actions: [...rec.actions],
      createdAt: rec.createdAt.toISOString(),
    })),
    timestamp: result.timestamp.toISOString(),
    expiresAt: result.expiresAt.toISOString(),
  };
}

function expectKind(reader: FieldReader, kind: string): void {
  reader.oneOf('kind', [kind]);
}

function readFactors(reader: FieldReader): ContributingFactors {
  const air = reader.nested('airQuality');
  expectKind(air, 'air_quality');
  const vulnerability = reader.nested('vulnerability');
  expectKind(vulnerability, 'vulnerability');
  const conditions = vulnerability.nested('healthConditions');
  const protective = reader.nested('protective');
  expectKind(protective, 'protective');
  const exposure = reader.nested('exposure');
  expectKind(exposure, 'exposure');

  return {
    airQuality: {
      kind: 'air_quality',
      aqi: air.number('aqi'),
      pm25: air.number('pm25'),
      primaryConcern: air.oneOf('primaryConcern', POLLUTANT_NAMES),
      condition: air.oneOf('condition', AIR_CONDITIONS),
    },
    vulnerability: {
      kind: 'vulnerability',
      ageFactor: vulnerability.number('ageFactor'),
      bmiFactor: vulnerability.number('bmiFactor'),
      activityFactor: vulnerability.number('activityFactor'),
      healthConditions: {
        respiratory: conditions.stringArray('respiratory'),
        cardiovascular: conditions.stringArray('cardiovascular'),
        overallRisk: conditions.oneOf('overallRisk', SELF_REPORTED_RISKS),
      },
    },
    protective: {
      kind: 'protective',
      activityLevel: protective.oneOf('activityLevel', ACTIVITY_LEVELS),
      ageGroup: protective.oneOf('ageGroup', AGE_GROUPS),
      baselineLungCapacity: protective.number('baselineLungCapacity'),
    },
    exposure: {
      kind: 'exposure',
      historySamples: exposure.number('historySamples', { integer: true, min: 0 }),
      dailyAverageAqi: exposure.nullableNumber('dailyAverageAqi'),
      weeklyAverageAqi: exposure.nullableNumber('weeklyAverageAqi'),
    },
  };
}

function readRecommendations(reader: FieldReader, errors: ValidationError[]): HealthRecommendation[] {
  const value = reader.raw('recommendations');
  if (!Array.isArray(value)) {
    errors.push({ path: reader.pathOf('recommendations'), message: 'Must be an array' });
    return [];
  }

  return value.map((item: unknown, index: number) => {
    const path = `${reader.pathOf('recommendations')}[${index}]`;
    if (!isRecord(item)) {
      errors.push({ path, message: 'Must be an object' });
    }
    const rec = new FieldReader(isRecord(item) ? item : {}, path, isRecord(item) ? errors : []);
    return {
      id: rec.string('id'),
      type: rec.oneOf('type', RECOMMENDATION_TYPES),
      priority: rec.oneOf('priority', RECOMMENDATION_PRIORITIES),
      title: rec.string('title'),
      description: rec.string('description'),
      actions: rec.stringArray('actions'),
      category: rec.string('category'),
      isUrgent: rec.boolean('isUrgent'),
      createdAt: rec.date('createdAt'),
    };
  });
}

const SCORE_RULE = { min: 0, max: 100, integer: true };

/**
 * Rebuilds a result from its JSON form, e.g. one loaded from a store.
 * Throws InvalidInputError naming every malformed field.
 */
export function deserializeResult(value: unknown): HealthScoreResult {
  const errors: ValidationError[] = [];
  if (!isRecord(value)) {
    throw new InvalidInputError('Invalid health score result: root: Must be an object', [
      { path: 'root', message: 'Must be an object' },
    ]);
  }

  const reader = new FieldReader(value, '', errors);
  const result: HealthScoreResult = {
    id: reader.string('id'),
    userId: reader.string('userId'),
    overallScore: reader.number('overallScore', SCORE_RULE),
    respiratoryScore: reader.number('respiratoryScore', SCORE_RULE),
    cardiovascularScore: reader.number('cardiovascularScore', SCORE_RULE),
    immuneScore: reader.number('immuneScore', SCORE_RULE),
    activityImpactScore: reader.number('activityImpactScore', SCORE_RULE),
    riskLevel: reader.number('riskLevel', { min: 0, max: 1 }),
    riskCategory: reader.oneOf('riskCategory', RISK_CATEGORIES),
    contributingFactors: readFactors(reader.nested('contributingFactors')),
    recommendations: readRecommendations(reader, errors),
    timestamp: reader.date('timestamp'),
    expiresAt: reader.date('expiresAt'),
  };

  if (errors.length === 0 && determineRiskCategory(result.riskLevel) !== result.riskCategory) {
    errors.push({ path: 'riskCategory', message: `Does not match riskLevel ${result.riskLevel}` });
  }

  if (errors.length > 0) {
    throw new InvalidInputError(`Invalid health score result: ${formatValidationErrors(errors)}`, errors);
  }
  return result;
}
