/**
 * Type definitions for sessions-calendar package
 */

/**
 * Day of week as returned by `Date.prototype.getUTCDay`.
 */
export enum Weekday {
  Sunday = 0,
  Monday = 1,
  Tuesday = 2,
  Wednesday = 3,
  Thursday = 4,
  Friday = 5,
  Saturday = 6,
}

/**
 * A venue-local wall-clock instant.
 *
 * The UTC fields of the Date (`getUTCDay`, `getUTCHours`, ...) carry the
 * local date and time at the venue. No timezone conversion is performed
 * anywhere in this package; build instants with `localInstant` or
 * `parseLocalInstant`.
 */
export type LocalInstant = Date;

/**
 * Milliseconds elapsed since local midnight, in [0, 86_400_000).
 */
export type TimeOfDay = number;

/**
 * Supported venues
 */
export type Venue = 'forex' | 'equity';

/**
 * Trading-hours capability of a venue.
 */
export interface TradingCalendar {
  /** True when the venue trades at `instant` */
  isOpen(instant: LocalInstant): boolean;

  /** True when the date of `instant` is a trading day (time of day ignored) */
  isTradingDay(instant: LocalInstant): boolean;

  /** Nominal session open. Informational only, never consulted by `isOpen` */
  nominalOpen: TimeOfDay;

  /** Nominal session close. Informational only, never consulted by `isOpen` */
  nominalClose: TimeOfDay;

  /** Number of trading days in a year */
  readonly tradingDaysPerYear: number;
}

/**
 * Static definition of one venue's trading rules.
 */
export interface VenueProfile {
  venue: Venue;

  /** Human-readable description */
  description: string;

  tradingDaysPerYear: number;

  /** Default nominal open */
  nominalOpen: TimeOfDay;

  /** Default nominal close */
  nominalClose: TimeOfDay;

  isTradingDay(weekday: Weekday): boolean;

  isOpen(weekday: Weekday, timeOfDay: TimeOfDay): boolean;
}
