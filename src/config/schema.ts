import type { ValidationError } from '../engine/errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../observability/logger.js';

export type { ValidationError };

export interface BreathscoreConfig {
  logLevel: LogLevel;
  json: boolean;
  scoreThreshold: number; // 0-100, CLI exits non-zero below it
}

export type PartialConfig = Partial<BreathscoreConfig>;

const KNOWN_KEYS: ReadonlyArray<keyof BreathscoreConfig> = ['logLevel', 'json', 'scoreThreshold'];

// Validate and return errors (empty array if valid)
export function validateConfig(config: unknown): ValidationError[] {
  const errors: ValidationError[] = [];

  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    errors.push({ path: 'root', message: 'Config must be an object' });
    return errors;
  }

  const cfg = new Map<string, unknown>(Object.entries(config));

  if (cfg.has('logLevel') && !isLogLevel(cfg.get('logLevel'))) {
    errors.push({
      path: 'logLevel',
      message: `Must be one of: ${LOG_LEVELS.join(', ')}`,
    });
  }

  if (cfg.has('json') && typeof cfg.get('json') !== 'boolean') {
    errors.push({
      path: 'json',
      message: 'Must be a boolean',
    });
  }

  if (cfg.has('scoreThreshold')) {
    const threshold = cfg.get('scoreThreshold');
    if (typeof threshold !== 'number' || !Number.isFinite(threshold) || threshold < 0 || threshold > 100) {
      errors.push({
        path: 'scoreThreshold',
        message: 'Must be a number between 0 and 100',
      });
    }
  }

  for (const key of cfg.keys()) {
    if (!KNOWN_KEYS.some(known => known === key)) {
      errors.push({
        path: key,
        message: 'Unknown configuration key',
      });
    }
  }

  return errors;
}

// Type guard
export function isValidConfig(config: unknown): config is PartialConfig {
  return validateConfig(config).length === 0;
}

export function isCompleteConfig(config: unknown): config is BreathscoreConfig {
  return (
    isValidConfig(config) &&
    config.logLevel !== undefined &&
    config.json !== undefined &&
    config.scoreThreshold !== undefined
  );
}
