import { describe, it, expect } from 'vitest';
import { Logger, createLogger, getLogger, isLogLevel } from '../src/observability/logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' | 'silent', json: boolean) {
  const lines: string[] = [];
  const logger = new Logger({ level, json, write: line => lines.push(line) });
  return { logger, lines };
}

describe('Logger', () => {
  it('should drop messages below the configured level', () => {
    const { logger, lines } = capture('warn', true);
    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');
    expect(lines).toHaveLength(2);
  });

  it('should write JSON entries with context', () => {
    const { logger, lines } = capture('info', true);
    logger.info('Computing health score', { userId: 'user-1' });

    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({ level: 'info', msg: 'Computing health score', userId: 'user-1' });
  });

  it('should write human-readable lines', () => {
    const { logger, lines } = capture('info', false);
    logger.warn('Health score below threshold', { score: 42 });
    logger.info('plain');

    expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] WARN  Health score below threshold \{"score":42\}$/);
    expect(lines[1]).toMatch(/^\[[^\]]+\] INFO  plain$/);
  });

  it('should merge child context', () => {
    const { logger, lines } = capture('debug', true);
    logger.child({ command: 'score' }).child({ userId: 'user-1' }).debug('nested', { step: 2 });

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ command: 'score', userId: 'user-1', step: 2 });
  });

  it('should write nothing when silent', () => {
    const { logger, lines } = capture('silent', false);
    logger.error('hidden');
    expect(lines).toEqual([]);
  });

  it('should time an operation at debug level', () => {
    const { logger, lines } = capture('debug', true);
    const done = logger.time('scoring');
    done();

    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 'debug', msg: 'scoring completed' });
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it('should replace the global logger', () => {
    const created = createLogger({ level: 'silent', json: false });
    expect(getLogger()).toBe(created);
  });
});
