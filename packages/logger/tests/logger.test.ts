/**
 * @fileoverview Tests for logger creation, formats and redaction
 */

import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { createLogger, createChildLogger } from '../src/createLogger.js';
import { REDACTED, redactValue } from '../src/formats.js';
import type { LogEntry, LoggerConfig } from '../src/types.js';

function captureStream(): { lines: string[]; stream: Writable } {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString().trimEnd());
      callback();
    },
  });
  return { lines, stream };
}

const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 20));

describe('createLogger', () => {
  it('should create a logger with the configured level', () => {
    const levels: LoggerConfig['level'][] = ['error', 'warn', 'info', 'debug'];

    for (const level of levels) {
      const logger = createLogger({ level, console: false });
      expect(logger.level).toBe(level);
    }
  });

  it('should write structured JSON entries', async () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Pipeline started', { symbol: 'EURUSD', stages: 2 });
    await flush();

    expect(lines).toHaveLength(1);
    const entry: LogEntry = JSON.parse(lines[0] ?? '');
    expect(entry.level).toBe('info');
    expect(entry.message).toBe('Pipeline started');
    expect(entry.symbol).toBe('EURUSD');
    expect(entry['stages']).toBe(2);
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should filter entries below the configured level', async () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.debug('hidden');
    logger.warn('shown');
    await flush();

    expect(lines).toHaveLength(1);
    const entry: LogEntry = JSON.parse(lines[0] ?? '');
    expect(entry.message).toBe('shown');
  });

  it('should redact sensitive fields at any depth', async () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'info', json: true, console: false, stream });

    logger.info('Feed connected', {
      host: 'localhost',
      token: 'test-token',
      auth: { username: 'feed', password: 'test-secret' },
    });
    await flush();

    const entry: LogEntry = JSON.parse(lines[0] ?? '');
    expect(entry['host']).toBe('localhost');
    expect(entry['token']).toBe(REDACTED);
    expect(entry['auth']).toEqual({ username: 'feed', password: REDACTED });
  });

  it('should pretty-print context fields in a fixed order', async () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'info', json: false, console: false, stream });
    const child = createChildLogger(logger, { component: 'sessions-calendar', venue: 'forex' });

    child.info('Exchange created');
    await flush();

    expect(lines[0]).toContain('Exchange created component=sessions-calendar venue=forex');
  });
});

describe('createChildLogger', () => {
  it('should include context fields in every entry', async () => {
    const { lines, stream } = captureStream();
    const logger = createLogger({ level: 'debug', json: true, console: false, stream });
    const child = createChildLogger(logger, { component: 'consolidator-chain' });

    child.debug('first');
    child.info('second');
    await flush();

    const entries: LogEntry[] = lines.map((line) => JSON.parse(line));
    expect(entries.map((e) => e.component)).toEqual(['consolidator-chain', 'consolidator-chain']);
    expect(entries.map((e) => e.message)).toEqual(['first', 'second']);
  });
});

describe('redactValue', () => {
  it('should redact inside arrays and leave other values untouched', () => {
    expect(redactValue([{ apiKey: 'test-key', id: 1 }, 'plain', 3])).toEqual([
      { apiKey: REDACTED, id: 1 },
      'plain',
      3,
    ]);
  });

  it('should pass errors through unchanged', () => {
    const error = new Error('boom');
    expect(redactValue(error)).toBe(error);
  });
});
