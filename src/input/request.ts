import { InvalidInputError, formatValidationErrors, type ValidationError } from '../engine/errors.js';
import {
  ACTIVITY_LEVELS,
  SELF_REPORTED_RISKS,
  type AirQualityReading,
  type HealthProfile,
  type UserProfile,
} from '../engine/types.js';
import { FieldReader, isRecord } from '../utils/fields.js';

/**
 * One score computation as it arrives over the wire (a JSON file or request body).
 */
export interface ScoreRequest {
  userId: string;
  userProfile: UserProfile;
  healthProfile: HealthProfile;
  currentReading: AirQualityReading | null;
  history?: AirQualityReading[];
}

function readReading(reader: FieldReader): AirQualityReading {
  return {
    latitude: reader.optionalNumber('latitude', 0),
    longitude: reader.optionalNumber('longitude', 0),
    pm25: reader.number('pm25'),
    pm10: reader.number('pm10'),
    no2: reader.number('no2'),
    so2: reader.optionalNumber('so2', 0),
    o3: reader.number('o3'),
    co: reader.optionalNumber('co', 0),
    aqi: reader.number('aqi'),
    temperature: reader.optionalNumber('temperature', 0),
    humidity: reader.optionalNumber('humidity', 0),
    windSpeed: reader.optionalNumber('windSpeed', 0),
    source: reader.has('source') ? reader.string('source') : 'unknown',
    timestamp: reader.date('timestamp'),
  };
}

/** Accepts a tag array or a comma-separated string. */
function readConditions(reader: FieldReader, key: string): string[] {
  if (!reader.has(key)) return [];
  const value = reader.raw(key);
  if (typeof value === 'string') {
    return value
      .split(',')
      .map(part => part.trim())
      .filter(part => part !== '');
  }
  return reader.stringArray(key);
}

// Height and weight may be left out; the score then carries no BMI term
function readUserProfile(reader: FieldReader): UserProfile {
  const profile: UserProfile = {
    id: reader.string('id'),
    age: reader.number('age', { integer: true }),
    activityLevel: reader.oneOf('activityLevel', ACTIVITY_LEVELS),
  };
  const heightCm = reader.maybeNumber('heightCm');
  const weightKg = reader.maybeNumber('weightKg');
  if (heightCm !== undefined) profile.heightCm = heightCm;
  if (weightKg !== undefined) profile.weightKg = weightKg;
  return profile;
}

function readHealthProfile(reader: FieldReader): HealthProfile {
  return {
    respiratoryConditions: readConditions(reader, 'respiratoryConditions'),
    cardiovascularConditions: readConditions(reader, 'cardiovascularConditions'),
    riskLevel: reader.oneOf('riskLevel', SELF_REPORTED_RISKS),
    baselineLungCapacity: reader.optionalNumber('baselineLungCapacity', 0),
  };
}

function readHistory(reader: FieldReader, errors: ValidationError[]): AirQualityReading[] | undefined {
  if (!reader.has('history')) return undefined;
  const value = reader.raw('history');
  if (!Array.isArray(value)) {
    errors.push({ path: reader.pathOf('history'), message: 'Must be an array' });
    return undefined;
  }

  const readings: AirQualityReading[] = [];
  value.forEach((item: unknown, index: number) => {
    const path = `${reader.pathOf('history')}[${index}]`;
    if (!isRecord(item)) {
      errors.push({ path, message: 'Must be an object' });
      return;
    }
    readings.push(readReading(new FieldReader(item, path, errors)));
  });

  // Exposure windows expect time order
  return readings.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

function parse(value: unknown): { request: ScoreRequest | null; errors: ValidationError[] } {
  const errors: ValidationError[] = [];
  if (!isRecord(value)) {
    errors.push({ path: 'root', message: 'Request must be an object' });
    return { request: null, errors };
  }

  const reader = new FieldReader(value, '', errors);
  const userProfile = readUserProfile(reader.nested('userProfile'));
  const healthProfile = readHealthProfile(reader.nested('healthProfile'));
  // Left null here: the engine reports a missing reading itself
  const currentReading = reader.has('currentReading') ? readReading(reader.nested('currentReading')) : null;
  const history = readHistory(reader, errors);
  const userId = reader.has('userId') ? reader.string('userId') : userProfile.id;

  const request: ScoreRequest = { userId, userProfile, healthProfile, currentReading };
  if (history) {
    request.history = history;
  }
  return { request, errors };
}

export function validateScoreRequest(value: unknown): ValidationError[] {
  return parse(value).errors;
}

export function parseScoreRequest(value: unknown): ScoreRequest {
  const { request, errors } = parse(value);
  if (!request || errors.length > 0) {
    throw new InvalidInputError(`Invalid score request: ${formatValidationErrors(errors)}`, errors);
  }
  return request;
}
