import { type ComponentScorer, BASE_SCORE, clampScore } from './types.js';
import type { ScoringContext } from '../normalize.js';
import {
  activityImmuneImpact,
  ageVulnerability,
  generalHealthPenalty,
  pollutantLoadPenalty,
} from '../impact.js';
import { longTermExposurePenalty } from '../exposure.js';

export const immuneScorer: ComponentScorer = {
  id: 'immune',
  name: 'Immune',
  description: 'Combined pollutant load on the immune system',

  score(context: ScoringContext): number {
    const { reading, health, user } = context;
    let score = BASE_SCORE;

    const load = (reading.pm25 + reading.pm10 + reading.no2 + reading.o3) / 4;
    score -= pollutantLoadPenalty(load) * 0.25;
    score -= ageVulnerability(context.age, { immune: true }) * 0.3;
    score -= generalHealthPenalty(health.riskLevel) * 0.2;
    // Negative for active users, which raises the score
    score -= activityImmuneImpact(user.activityLevel) * 0.15;

    if (context.history) {
      score -= longTermExposurePenalty(context.weeklyAverageAqi) * 0.2;
    }

    return clampScore(score);
  },
};
