export { respiratoryScorer } from './respiratory.js';
export { cardiovascularScorer } from './cardiovascular.js';
export { immuneScorer } from './immune.js';
export { activityImpactScorer } from './activity.js';
export * from './types.js';

import { respiratoryScorer } from './respiratory.js';
import { cardiovascularScorer } from './cardiovascular.js';
import { immuneScorer } from './immune.js';
import { activityImpactScorer } from './activity.js';
import type { ComponentScorer, ComponentScores } from './types.js';
import type { ScoringContext } from '../normalize.js';

export const allScorers: readonly ComponentScorer[] = [
  respiratoryScorer,
  cardiovascularScorer,
  immuneScorer,
  activityImpactScorer,
];

export function scoreComponents(context: ScoringContext): ComponentScores {
  return {
    respiratory: respiratoryScorer.score(context),
    cardiovascular: cardiovascularScorer.score(context),
    immune: immuneScorer.score(context),
    activityImpact: activityImpactScorer.score(context),
  };
}
