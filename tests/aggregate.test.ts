import { describe, it, expect } from 'vitest';
import { calculateOverallScore, calculateRiskLevel, determineRiskCategory } from '../src/engine/aggregate.js';
import type { ComponentScores } from '../src/engine/components/index.js';

function uniform(value: number): ComponentScores {
  return { respiratory: value, cardiovascular: value, immune: value, activityImpact: value };
}

describe('Score Aggregation', () => {
  describe('calculateOverallScore', () => {
    it('should average the four components', () => {
      const components: ComponentScores = { respiratory: 60, cardiovascular: 70, immune: 80, activityImpact: 90 };
      expect(calculateOverallScore(components, 100)).toBe(75);
    });

    it('should reduce the score under severe AQI', () => {
      expect(calculateOverallScore(uniform(80), 250)).toBeCloseTo(72, 10);
      expect(calculateOverallScore(uniform(80), 180)).toBeCloseTo(76, 10);
    });

    it('should lift the score in clean air and cap it at 100', () => {
      expect(calculateOverallScore(uniform(80), 40)).toBeCloseTo(84, 10);
      expect(calculateOverallScore(uniform(99), 40)).toBe(100);
    });
  });

  describe('calculateRiskLevel', () => {
    it('should scale the score deficit by self-reported risk', () => {
      expect(calculateRiskLevel(40, 'high')).toBeCloseTo(0.78, 10);
      expect(calculateRiskLevel(40, 'medium')).toBeCloseTo(0.6, 10);
      expect(calculateRiskLevel(50, 'low')).toBeCloseTo(0.4, 10);
    });

    it('should stay within [0, 1]', () => {
      expect(calculateRiskLevel(0, 'high')).toBe(1);
      expect(calculateRiskLevel(100, 'low')).toBe(0);
    });
  });

  describe('determineRiskCategory', () => {
    it('should map thresholds inclusively from below', () => {
      expect(determineRiskCategory(0.8)).toBe('Critical');
      expect(determineRiskCategory(0.79)).toBe('High');
      expect(determineRiskCategory(0.6)).toBe('High');
      expect(determineRiskCategory(0.59)).toBe('Medium');
      expect(determineRiskCategory(0.3)).toBe('Medium');
      expect(determineRiskCategory(0.29)).toBe('Low');
      expect(determineRiskCategory(0)).toBe('Low');
    });
  });
});
