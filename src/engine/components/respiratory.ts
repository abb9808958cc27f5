import { type ComponentScorer, BASE_SCORE, clampScore } from './types.js';
import type { ScoringContext } from '../normalize.js';
import {
  activityVulnerability,
  ageVulnerability,
  aqiPenalty,
  pm25Penalty,
  respiratoryConditionPenalty,
} from '../impact.js';
import { exposureTimePenalty } from '../exposure.js';

export const respiratoryScorer: ComponentScorer = {
  id: 'respiratory',
  name: 'Respiratory',
  description: 'Breathing health impact of particulates and overall air quality',

  score(context: ScoringContext): number {
    const { reading, health, user } = context;
    let score = BASE_SCORE;

    score -= pm25Penalty(reading.pm25) * 0.3;
    score -= aqiPenalty(reading.aqi) * 0.25;

    const vulnerability =
      ageVulnerability(context.age) +
      respiratoryConditionPenalty(health.respiratoryConditions) +
      activityVulnerability(user.activityLevel);
    score -= vulnerability * 0.2;

    // Skipped entirely without history
    if (context.history) {
      score -= exposureTimePenalty(context.dailyAverageAqi) * 0.15;
    }

    return clampScore(score);
  },
};
