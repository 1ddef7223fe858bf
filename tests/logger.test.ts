import { afterEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, createLogger, formatLog, parseLogLevel } from '../src/utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatLog', () => {
  it('renders timestamp, level, scope and metadata', () => {
    expect(
      formatLog({
        level: LogLevel.INFO,
        message: 'Parsed 2 jobs',
        timestamp: '2026-03-10T08:00:00.000Z',
        scope: 'linkedin',
        metadata: { skipped: 1 },
      })
    ).toBe('[2026-03-10T08:00:00.000Z] INFO: [linkedin] Parsed 2 jobs {"skipped":1}');
  });

  it('omits empty scope and metadata', () => {
    expect(
      formatLog({ level: LogLevel.WARN, message: 'careful', timestamp: '2026-03-10T08:00:00.000Z' })
    ).toBe('[2026-03-10T08:00:00.000Z] WARN: careful');
  });
});

describe('parseLogLevel', () => {
  it('maps names case-insensitively and defaults to info', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
  });
});

describe('createLogger', () => {
  it('drops messages below the threshold', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = createLogger('ingestion', () => LogLevel.WARN);

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toMatch(/WARN: \[ingestion\] shown$/);
  });

  it('prefixes child scopes with the parent scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = createLogger('scan', () => LogLevel.DEBUG).child('feeds');

    logger.debug('fetching');

    expect(log.mock.calls[0][0]).toMatch(/DEBUG: \[scan:feeds\] fetching$/);
  });

  it('serializes errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logger = createLogger(undefined, () => LogLevel.INFO);

    logger.error('failed', new Error('boom'), { origin: 'q1' });

    const line = String(error.mock.calls[0][0]);
    expect(line).toContain('ERROR: failed');
    expect(line).toContain('"origin":"q1"');
    expect(line).toContain('"message":"boom"');
  });
});
