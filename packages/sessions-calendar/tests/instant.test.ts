import { describe, it, expect } from 'vitest';
import {
  formatTimeOfDay,
  localInstant,
  parseLocalInstant,
  parseTimeOfDay,
  timeOfDay,
  weekdayOf,
} from '../src/instant.js';
import { Weekday } from '../src/types.js';

describe('local instants', () => {
  it('should carry wall-clock fields in UTC', () => {
    const instant = localInstant(2025, 1, 3, 16, 5, 7, 250);

    expect(instant.toISOString()).toBe('2025-01-03T16:05:07.250Z');
    expect(weekdayOf(instant)).toBe(Weekday.Friday);
    expect(timeOfDay(instant)).toBe(57_907_250);
  });

  it('should parse date and time text', () => {
    expect(parseLocalInstant('2025-01-05T17:00').getTime()).toBe(Date.UTC(2025, 0, 5, 17));
    expect(parseLocalInstant('2025-01-05 16:59:59.500').getTime()).toBe(
      Date.UTC(2025, 0, 5, 16, 59, 59, 500)
    );
    expect(parseLocalInstant('2025-01-04').getTime()).toBe(Date.UTC(2025, 0, 4));
  });

  it('should keep years below 100 as written', () => {
    const instant = parseLocalInstant('0025-01-04T12:00');

    expect(instant.toISOString()).toBe('0025-01-04T12:00:00.000Z');
    expect(localInstant(25, 1, 4, 12).getTime()).toBe(instant.getTime());
    expect(localInstant(99, 12, 31, 25).getUTCFullYear()).toBe(100);
  });

  it('should reject malformed or impossible instants', () => {
    expect(() => parseLocalInstant('2025-1-5')).toThrow('Invalid local instant: 2025-1-5');
    expect(() => parseLocalInstant('2025-02-30')).toThrow('Invalid local instant: 2025-02-30');
    expect(() => parseLocalInstant('2025-01-05T25:00')).toThrow('Invalid local instant');
  });

  it('should compute time of day for instants before the epoch', () => {
    expect(timeOfDay(localInstant(1969, 12, 31, 23))).toBe(82_800_000);
    expect(weekdayOf(localInstant(1969, 12, 31))).toBe(Weekday.Wednesday);
  });
});

describe('time of day', () => {
  it('should parse the supported notations', () => {
    expect(parseTimeOfDay('09:30')).toBe(34_200_000);
    expect(parseTimeOfDay('17:00:00')).toBe(61_200_000);
    expect(parseTimeOfDay('23:59:59.996')).toBe(86_399_996);
    expect(parseTimeOfDay('00:00')).toBe(0);
  });

  it('should reject invalid times', () => {
    expect(() => parseTimeOfDay('24:00')).toThrow('Invalid time of day: 24:00');
    expect(() => parseTimeOfDay('9:30')).toThrow('Invalid time of day: 9:30');
    expect(() => parseTimeOfDay('09:60')).toThrow('Invalid time of day: 09:60');
  });

  it('should format as HH:mm:ss.SSS', () => {
    expect(formatTimeOfDay(0)).toBe('00:00:00.000');
    expect(formatTimeOfDay(34_200_000)).toBe('09:30:00.000');
    expect(formatTimeOfDay(86_399_996)).toBe('23:59:59.996');
  });
});
