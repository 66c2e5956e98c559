/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from '@/shared/utils/logger';

describe('Logger', () => {
  let lines: string[];
  let testLogger: Logger;

  beforeEach(() => {
    lines = [];
    testLogger = new Logger();
    testLogger.setColors(false);
    testLogger.setTimestamps(false);
    testLogger.setSink((line) => lines.push(line));
    testLogger.setLevel(LogLevel.DEBUG);
  });

  it('should write level, message and metadata on one line', () => {
    testLogger.info('Stream opened', { sessionId: 'abc', frames: 3 });

    expect(lines).toEqual(['INFO  Stream opened {"sessionId":"abc","frames":3}']);
  });

  it('should omit empty metadata', () => {
    testLogger.warn('No credentials');

    expect(lines).toEqual(['WARN  No credentials']);
  });

  it('should drop messages below the configured level', () => {
    testLogger.setLevel(LogLevel.WARN);

    testLogger.debug('hidden');
    testLogger.info('hidden');
    testLogger.warn('shown');
    testLogger.error('shown too');

    expect(lines).toEqual(['WARN  shown', 'ERROR shown too']);
    expect(testLogger.getLevel()).toBe(LogLevel.WARN);
  });

  it('should expand a bare Error into name and message', () => {
    const error = new Error('boom');

    testLogger.error('Capture failed', error);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('ERROR Capture failed');
    expect(lines[0]).toContain('"name":"Error","message":"boom"');
  });

  it('should serialize Error values nested in metadata', () => {
    testLogger.error('Stream error', { cause: new TypeError('bad input') });

    expect(lines).toEqual(['ERROR Stream error {"cause":{"name":"TypeError","message":"bad input"}}']);
  });

  it('should prefix an ISO timestamp when timestamps are enabled', () => {
    testLogger.setTimestamps(true);

    testLogger.info('tick');

    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO  tick$/);
  });

  it('should wrap the level in ANSI colors when colors are enabled', () => {
    testLogger.setColors(true);

    testLogger.error('red');

    expect(lines).toEqual(['\x1b[31mERROR\x1b[0m red']);
  });
});

describe('parseLogLevel', () => {
  it('should accept known levels case-insensitively', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel(' INFO ')).toBe(LogLevel.INFO);
    expect(parseLogLevel('Error')).toBe(LogLevel.ERROR);
  });

  it('should fall back for unknown or missing values', () => {
    expect(parseLogLevel(undefined)).toBe(LogLevel.WARN);
    expect(parseLogLevel('verbose')).toBe(LogLevel.WARN);
    expect(parseLogLevel('trace', LogLevel.INFO)).toBe(LogLevel.INFO);
  });
});
