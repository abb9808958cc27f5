import type { ValidationError } from '../engine/errors.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinPath(base: string, key: string): string {
  return base ? `${base}.${key}` : key;
}

export interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

/**
 * Reads typed fields out of an untrusted record. Failures are collected into the shared
 * `errors` array and a placeholder is returned, so one pass reports every bad field.
 */
export class FieldReader {
  constructor(
    private readonly record: JsonRecord,
    private readonly path: string,
    private readonly errors: ValidationError[]
  ) {}

  private fail(key: string, message: string): void {
    this.errors.push({ path: joinPath(this.path, key), message });
  }

  has(key: string): boolean {
    return this.record[key] !== undefined && this.record[key] !== null;
  }

  raw(key: string): unknown {
    return this.record[key];
  }

  pathOf(key: string): string {
    return joinPath(this.path, key);
  }

  string(key: string): string {
    const value = this.record[key];
    if (typeof value !== 'string' || value.trim() === '') {
      this.fail(key, 'Must be a non-empty string');
      return '';
    }
    return value;
  }

  number(key: string, rule: NumberRule = {}): number {
    const value = this.record[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.fail(key, 'Must be a finite number');
      return 0;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.fail(key, 'Must be an integer');
    }
    if (rule.min !== undefined && value < rule.min) {
      this.fail(key, `Must be at least ${rule.min}`);
    }
    if (rule.max !== undefined && value > rule.max) {
      this.fail(key, `Must be at most ${rule.max}`);
    }
    return value;
  }

  /** Missing or null becomes `fallback`. */
  optionalNumber(key: string, fallback: number): number {
    return this.has(key) ? this.number(key) : fallback;
  }

  /** Missing or null becomes undefined. */
  maybeNumber(key: string): number | undefined {
    return this.has(key) ? this.number(key) : undefined;
  }

  nullableNumber(key: string): number | null {
    return this.record[key] === null ? null : this.number(key);
  }

  boolean(key: string): boolean {
    const value = this.record[key];
    if (typeof value !== 'boolean') {
      this.fail(key, 'Must be a boolean');
      return false;
    }
    return value;
  }

  date(key: string): Date {
    const value = this.record[key];
    const millis = typeof value === 'string' ? Date.parse(value) : Number.NaN;
    if (!Number.isFinite(millis)) {
      this.fail(key, 'Must be an ISO-8601 timestamp');
      return new Date(0);
    }
    return new Date(millis);
  }

  stringArray(key: string): string[] {
    const value = this.record[key];
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      this.fail(key, 'Must be an array of strings');
      return [];
    }
    return [...value];
  }

  oneOf<T extends string>(key: string, allowed: readonly [T, ...T[]]): T {
    const value = this.record[key];
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      this.fail(key, `Must be one of: ${allowed.join(', ')}`);
      return allowed[0];
    }
    return match;
  }

  // Errors under a malformed parent are not reported twice
  nested(key: string): FieldReader {
    const value = this.record[key];
    if (!isRecord(value)) {
      this.fail(key, 'Must be an object');
      return new FieldReader({}, joinPath(this.path, key), []);
    }
    return new FieldReader(value, joinPath(this.path, key), this.errors);
  }
}
