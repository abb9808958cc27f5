import { type ComponentScorer, BASE_SCORE, clampScore } from './types.js';
import type { ScoringContext } from '../normalize.js';
import {
  ageVulnerability,
  bmiImpact,
  cardiovascularConditionPenalty,
  no2Penalty,
  pm25Penalty,
} from '../impact.js';

// PM2.5 acts on the heart about 20% harder than on the lungs
const PM25_CARDIOVASCULAR_FACTOR = 1.2;

/**
 * The weights below add up to more than 1. Each term is bounded on its own and the
 * sum is clamped, not renormalized, so PM2.5 keeps its outsized weight here.
 */
export const cardiovascularScorer: ComponentScorer = {
  id: 'cardiovascular',
  name: 'Cardiovascular',
  description: 'Heart health impact of PM2.5 and NO2 given age, BMI and conditions',

  score(context: ScoringContext): number {
    const { reading, health } = context;
    let score = BASE_SCORE;

    score -= pm25Penalty(reading.pm25 * PM25_CARDIOVASCULAR_FACTOR) * 0.35;
    score -= no2Penalty(reading.no2) * 0.2;
    score -= ageVulnerability(context.age, { cardio: true }) * 0.25;
    score -= bmiImpact(context.bmi) * 0.15;
    score -= cardiovascularConditionPenalty(health.cardiovascularConditions) * 0.2;

    return clampScore(score);
  },
};
