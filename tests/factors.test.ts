import { describe, it, expect } from 'vitest';
import { ageGroup, airCondition, primaryPollutantConcern } from '../src/engine/factors.js';
import { makeReading } from './helpers/test-utils.js';

describe('Contributing Factors', () => {
  describe('primaryPollutantConcern', () => {
    it('should name the largest raw value', () => {
      expect(primaryPollutantConcern(makeReading({ pm25: 5, aqi: 30, pm10: 80, no2: 10, o3: 20 }))).toBe('PM10');
      expect(primaryPollutantConcern(makeReading({ pm25: 5, aqi: 30, pm10: 10, no2: 10, o3: 90 }))).toBe('O3');
    });

    it('should keep PM2.5 on a tie', () => {
      expect(primaryPollutantConcern(makeReading({ pm25: 50, aqi: 50, pm10: 50, no2: 50, o3: 50 }))).toBe('PM2.5');
    });

    it('should keep the earlier pollutant when later ones only tie', () => {
      expect(primaryPollutantConcern(makeReading({ pm25: 5, aqi: 60, pm10: 60, no2: 60, o3: 1 }))).toBe('AQI');
    });
  });

  describe('airCondition', () => {
    it('should describe AQI bands', () => {
      expect(airCondition(50)).toBe('Good conditions');
      expect(airCondition(51)).toBe('Acceptable but watch');
      expect(airCondition(101)).toBe('Moderate and concerning');
      expect(airCondition(151)).toBe('Poor and worsening');
    });
  });

  describe('ageGroup', () => {
    it('should bucket ages', () => {
      expect(ageGroup(17)).toBe('Child/Youth');
      expect(ageGroup(18)).toBe('Young Adult');
      expect(ageGroup(30)).toBe('Adult');
      expect(ageGroup(50)).toBe('Middle Age');
      expect(ageGroup(65)).toBe('Senior');
    });
  });
});
