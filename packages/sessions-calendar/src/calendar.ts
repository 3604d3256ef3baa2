/**
 * Pure-function trading calendar for the supported venues
 *
 * Provides deterministic, zero-I/O functions for:
 * - Checking whether a venue trades at a local instant
 * - Checking whether a local date is a trading day
 *
 * All functions are pure: same inputs always produce same outputs.
 * Venue rules live in `VENUE_PROFILES`; there is no per-venue subclass.
 */

import { MS_PER_HOUR, MS_PER_MINUTE, timeOfDay, weekdayOf } from './instant.js';
import { Weekday } from './types.js';
import type { LocalInstant, Venue, VenueProfile } from './types.js';

const FOREX_FRIDAY_CLOSE = 16 * MS_PER_HOUR;
const FOREX_SUNDAY_OPEN = 17 * MS_PER_HOUR;

const EQUITY_OPEN = 9 * MS_PER_HOUR + 30 * MS_PER_MINUTE;
const EQUITY_CLOSE = 16 * MS_PER_HOUR;

/**
 * Spot currency market: trades around the clock from Sunday 17:00 to
 * Friday 16:00, closed all of Saturday.
 */
const forex: VenueProfile = {
  venue: 'forex',
  description: 'Spot FX, Sunday 17:00 to Friday 16:00',
  // 365 days less 52 Saturdays
  tradingDaysPerYear: 313,
  nominalOpen: 0,
  // 23.999999 hours
  nominalClose: 86_399_996,
  isTradingDay(weekday) {
    return weekday !== Weekday.Saturday;
  },
  isOpen(weekday, time) {
    if (!this.isTradingDay(weekday)) {
      return false;
    }
    if (weekday === Weekday.Friday && time >= FOREX_FRIDAY_CLOSE) {
      return false;
    }
    if (weekday === Weekday.Sunday && time < FOREX_SUNDAY_OPEN) {
      return false;
    }
    return true;
  },
};

/**
 * Cash equity regular session, Monday to Friday 09:30-16:00. Holidays are
 * not modelled.
 */
const equity: VenueProfile = {
  venue: 'equity',
  description: 'Equity regular session, Monday to Friday 09:30-16:00',
  tradingDaysPerYear: 252,
  nominalOpen: EQUITY_OPEN,
  nominalClose: EQUITY_CLOSE,
  isTradingDay(weekday) {
    return weekday >= Weekday.Monday && weekday <= Weekday.Friday;
  },
  isOpen(weekday, time) {
    return this.isTradingDay(weekday) && time >= EQUITY_OPEN && time < EQUITY_CLOSE;
  },
};

/**
 * Trading rules keyed by venue.
 */
export const VENUE_PROFILES: Readonly<Record<Venue, VenueProfile>> = {
  forex,
  equity,
};

/**
 * Returns true when `input` names a supported venue.
 */
export function isVenue(input: string): input is Venue {
  return Object.prototype.hasOwnProperty.call(VENUE_PROFILES, input);
}

/**
 * Check whether a venue is trading at a local instant
 *
 * @example
 * ```typescript
 * isOpen('forex', localInstant(2025, 1, 3, 15, 59, 59)); // true  (Fri 15:59:59)
 * isOpen('forex', localInstant(2025, 1, 3, 16));         // false (Fri 16:00:00)
 * isOpen('forex', localInstant(2025, 1, 5, 17));         // true  (Sun 17:00:00)
 * ```
 */
export function isOpen(venue: Venue, instant: LocalInstant): boolean {
  return VENUE_PROFILES[venue].isOpen(weekdayOf(instant), timeOfDay(instant));
}

/**
 * Check whether the local date of `instant` is a trading day for a venue
 *
 * @example
 * ```typescript
 * isTradingDay('forex', localInstant(2025, 1, 4)); // false (Saturday)
 * isTradingDay('forex', localInstant(2025, 1, 5)); // true  (Sunday)
 * ```
 */
export function isTradingDay(venue: Venue, instant: LocalInstant): boolean {
  return VENUE_PROFILES[venue].isTradingDay(weekdayOf(instant));
}
