import { describe, it, expect } from 'vitest';
import { HealthScoreEngine } from '../src/engine/engine.js';
import { InvalidInputError } from '../src/engine/errors.js';
import { deserializeResult, serializeResult } from '../src/engine/serialize.js';
import { NOW, makeHealth, makeReading, makeUser, sequentialIds } from './helpers/test-utils.js';

const engine = new HealthScoreEngine({ clock: () => NOW, generateId: sequentialIds() });

const pollutedResult = engine.computeHealthScore(
  'user-2',
  makeUser({ id: 'user-2', age: 70, activityLevel: 'sedentary' }),
  makeHealth({ respiratoryConditions: ['asthma'], riskLevel: 'high' }),
  makeReading({ pm25: 180, pm10: 200, no2: 200, o3: 120, aqi: 250 })
);
const cleanResult = engine.computeHealthScore('user-1', makeUser(), makeHealth(), makeReading());

function errorOf(fn: () => unknown): InvalidInputError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidInputError) return error;
    throw error;
  }
  throw new Error('Expected InvalidInputError');
}

describe('Result Serialization', () => {
  it('should write dates as ISO strings', () => {
    const json = serializeResult(cleanResult);
    expect(json.timestamp).toBe('2025-03-10T12:00:00.000Z');
    expect(json.expiresAt).toBe('2025-03-10T14:00:00.000Z');
  });

  it('should survive a trip through JSON text', () => {
    const text = JSON.stringify(serializeResult(pollutedResult));
    expect(deserializeResult(JSON.parse(text))).toEqual(pollutedResult);
  });

  it('should not share arrays with the source result', () => {
    const json = serializeResult(pollutedResult);
    json.contributingFactors.vulnerability.healthConditions.respiratory.push('copd');
    expect(pollutedResult.contributingFactors.vulnerability.healthConditions.respiratory).toEqual(['asthma']);
  });

  it('should reject a non-object', () => {
    expect(() => deserializeResult([])).toThrow('Invalid health score result: root: Must be an object');
  });

  it('should reject scores outside 0-100 or with fractions', () => {
    const json = serializeResult(cleanResult);
    expect(errorOf(() => deserializeResult({ ...json, overallScore: 101 })).details).toEqual([
      { path: 'overallScore', message: 'Must be at most 100' },
    ]);
    expect(errorOf(() => deserializeResult({ ...json, immuneScore: 50.5 })).details).toEqual([
      { path: 'immuneScore', message: 'Must be an integer' },
    ]);
  });

  it('should reject a category that disagrees with the risk level', () => {
    const json = serializeResult(cleanResult);
    expect(() => deserializeResult({ ...json, riskCategory: 'High' })).toThrow(
      'Invalid health score result: riskCategory: Does not match riskLevel 0'
    );
  });

  it('should check factor tags', () => {
    const json = serializeResult(cleanResult);
    const tampered = {
      ...json,
      contributingFactors: {
        ...json.contributingFactors,
        airQuality: { ...json.contributingFactors.airQuality, kind: 'pollution' },
      },
    };
    expect(errorOf(() => deserializeResult(tampered)).details).toEqual([
      { path: 'contributingFactors.airQuality.kind', message: 'Must be one of: air_quality' },
    ]);
  });

  it('should report malformed recommendations and timestamps by path', () => {
    const json = serializeResult(cleanResult);
    expect(errorOf(() => deserializeResult({ ...json, recommendations: ['oops'], timestamp: 'yesterday' })).details).toEqual([
      { path: 'recommendations[0]', message: 'Must be an object' },
      { path: 'timestamp', message: 'Must be an ISO-8601 timestamp' },
    ]);
  });

  it('should report a missing contributing factors block once', () => {
    const { contributingFactors: _dropped, ...rest } = serializeResult(cleanResult);
    expect(errorOf(() => deserializeResult(rest)).details).toEqual([
      { path: 'contributingFactors', message: 'Must be an object' },
    ]);
  });
});
