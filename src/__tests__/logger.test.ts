import { describe, it, expect } from 'vitest';
import { Logger, isLogLevel, sanitizeString, type LogLevel } from '../utils/logger';

function capture(level: LogLevel = 'info'): { logger: Logger; lines: Array<{ level: LogLevel; line: string }> } {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  return { logger: new Logger(level, (lvl, line) => lines.push({ level: lvl, line })), lines };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { logger, lines } = capture('warn');
    logger.info('ignored');
    logger.warn('kept');
    expect(lines.map(l => l.level)).toEqual(['warn']);
    expect(lines[0].line).toMatch(/^\[\d{4}-\d{2}-\d{2}T[^\]]+\] \[WARN \] kept$/);
  });

  it('redacts sensitive keys in context', () => {
    const { logger, lines } = capture();
    logger.info('connecting', { token: 'test-secret', server: 'docs', nested: { apiKey: 'test-secret' } });
    expect(lines[0].line.endsWith('connecting {"token":"[REDACTED]","server":"docs","nested":{"apiKey":"[REDACTED]"}}')).toBe(
      true
    );
  });

  it('marks circular references', () => {
    const { logger, lines } = capture();
    const loop: Record<string, unknown> = { name: 'loop' };
    loop.self = loop;
    logger.info('state', loop);
    expect(lines[0].line.endsWith('state {"name":"loop","self":"[Circular]"}')).toBe(true);
  });

  it('scopes child loggers and shares their level', () => {
    const { logger, lines } = capture();
    const child = logger.child('session').child('doc-1');
    child.info('started');
    child.setLevel('error');
    logger.warn('hidden');
    expect(lines).toHaveLength(1);
    expect(lines[0].line.endsWith('[INFO ] [session:doc-1] started')).toBe(true);
    expect(logger.getLevel()).toBe('error');
  });
});

describe('sanitizeString', () => {
  it('redacts bearer tokens and URL passwords', () => {
    expect(sanitizeString('sent Bearer test-secret')).toBe('sent Bearer [REDACTED]');
    expect(sanitizeString('postgres://app:test-secret@db:5432/app')).toBe('postgres://app:[REDACTED]@db:5432/app');
    expect(sanitizeString('token=test-secret next')).toBe('token=[REDACTED] next');
  });
});

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
