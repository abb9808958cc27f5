import { type ComponentScorer, BASE_SCORE, clampScore } from './types.js';
import type { ScoringContext } from '../normalize.js';
import { exerciseImpact, locationRestriction, outdoorRestriction, sensitivityScore } from '../impact.js';

export const activityImpactScorer: ComponentScorer = {
  id: 'activityImpact',
  name: 'Activity Impact',
  description: 'How far current conditions restrict outdoor activity and exercise',

  score(context: ScoringContext): number {
    const { reading, health, user } = context;
    let score = BASE_SCORE;

    score -= outdoorRestriction(reading.aqi) * 0.4;
    score -= exerciseImpact(reading.aqi, user.activityLevel) * 0.3;
    score -= sensitivityScore(context.age, health.respiratoryConditions, health.cardiovascularConditions) * 0.2;
    score -= locationRestriction(reading.aqi) * 0.15;

    return clampScore(score);
  },
};
