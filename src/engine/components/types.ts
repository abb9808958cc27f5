import type { ScoringContext } from '../normalize.js';

export type ComponentId = 'respiratory' | 'cardiovascular' | 'immune' | 'activityImpact';

export type ComponentScores = Record<ComponentId, number>;

export interface ComponentScorer {
  id: ComponentId;
  name: string;
  description: string;
  score(context: ScoringContext): number;
}

/** Every component starts at this value and subtracts weighted penalties. */
export const BASE_SCORE = 100;

export function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value));
}
