import type { BreathscoreConfig } from './schema.js';

export const DEFAULT_SCORE_THRESHOLD = 50;

export function getDefaultConfig(): BreathscoreConfig {
  return {
    logLevel: 'info',
    json: false,
    scoreThreshold: DEFAULT_SCORE_THRESHOLD,
  };
}
