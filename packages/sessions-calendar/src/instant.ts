/**
 * Helpers for venue-local instants and times of day.
 *
 * A `LocalInstant` is read exclusively through its UTC fields, so results do
 * not depend on the host timezone.
 */

import type { LocalInstant, TimeOfDay, Weekday } from './types.js';

export const MS_PER_SECOND = 1_000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * `HH:mm`, `HH:mm:ss` or `HH:mm:ss.SSS`, 24-hour clock.
 */
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d)(?:\.(\d{3}))?)?$/;

const LOCAL_INSTANT_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{3}))?)?)?$/;

/**
 * Builds a local instant from wall-clock fields.
 *
 * @param month - 1-12
 *
 * @example
 * ```typescript
 * const fridayClose = localInstant(2025, 1, 3, 16); // Fri 2025-01-03 16:00:00
 * ```
 */
export function localInstant(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0,
  millisecond = 0
): LocalInstant {
  // Date.UTC would map years 0-99 onto 1900-1999
  const instant = new Date(0);
  instant.setUTCFullYear(year, month - 1, day);
  instant.setUTCHours(hour, minute, second, millisecond);
  return instant;
}

/**
 * Parses `YYYY-MM-DD[THH:mm[:ss[.SSS]]]` as a local wall-clock instant.
 *
 * @throws Error if the text does not match the format or names a day that
 *         does not exist (e.g. 2025-02-30)
 */
export function parseLocalInstant(text: string): LocalInstant {
  const match = LOCAL_INSTANT_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Invalid local instant: ${text}`);
  }
  const [, year, month, day, hour, minute, second, millisecond] = match;
  const instant = localInstant(
    Number(year),
    Number(month),
    Number(day),
    Number(hour ?? 0),
    Number(minute ?? 0),
    Number(second ?? 0),
    Number(millisecond ?? 0)
  );
  if (
    instant.getUTCFullYear() !== Number(year) ||
    instant.getUTCMonth() + 1 !== Number(month) ||
    instant.getUTCDate() !== Number(day) ||
    instant.getUTCHours() !== Number(hour ?? 0) ||
    instant.getUTCMinutes() !== Number(minute ?? 0) ||
    instant.getUTCSeconds() !== Number(second ?? 0)
  ) {
    throw new Error(`Invalid local instant: ${text}`);
  }
  return instant;
}

export function weekdayOf(instant: LocalInstant): Weekday {
  return instant.getUTCDay();
}

/**
 * Milliseconds since local midnight of `instant`.
 */
export function timeOfDay(instant: LocalInstant): TimeOfDay {
  const ms = instant.getTime() % MS_PER_DAY;
  return ms < 0 ? ms + MS_PER_DAY : ms;
}

/**
 * Parses `HH:mm`, `HH:mm:ss` or `HH:mm:ss.SSS`.
 *
 * @throws Error if the text is not a valid 24-hour time
 *
 * @example
 * ```typescript
 * parseTimeOfDay('09:30');        // 34_200_000
 * parseTimeOfDay('23:59:59.996'); // 86_399_996
 * ```
 */
export function parseTimeOfDay(text: string): TimeOfDay {
  const match = TIME_OF_DAY_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Invalid time of day: ${text}`);
  }
  const [, hours, minutes, seconds, millis] = match;
  return (
    Number(hours) * MS_PER_HOUR +
    Number(minutes) * MS_PER_MINUTE +
    Number(seconds ?? 0) * MS_PER_SECOND +
    Number(millis ?? 0)
  );
}

/**
 * Formats a time of day as `HH:mm:ss.SSS`.
 */
export function formatTimeOfDay(value: TimeOfDay): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  const hours = Math.floor(value / MS_PER_HOUR);
  const minutes = Math.floor((value % MS_PER_HOUR) / MS_PER_MINUTE);
  const seconds = Math.floor((value % MS_PER_MINUTE) / MS_PER_SECOND);
  const millis = value % MS_PER_SECOND;
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}.${pad(millis, 3)}`;
}
