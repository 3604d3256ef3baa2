/**
 * Exchange model: a venue calendar plus the owner's current local time.
 */

import type { Logger } from '@tickline/logger';
import { VENUE_PROFILES } from './calendar.js';
import { formatTimeOfDay, timeOfDay, weekdayOf } from './instant.js';
import type { LocalInstant, TimeOfDay, TradingCalendar, Venue, VenueProfile } from './types.js';

export interface ExchangeOptions {
  /** Initial local time (default: 1970-01-01 00:00:00) */
  time?: LocalInstant;

  /** Overrides the profile's nominal open */
  nominalOpen?: TimeOfDay;

  /** Overrides the profile's nominal close */
  nominalClose?: TimeOfDay;

  /** Receives a debug entry when the exchange is created */
  logger?: Logger;
}

/**
 * Trading calendar of one venue, holding the current local time set by its
 * owner.
 *
 * `nominalOpen` and `nominalClose` are informational. `isOpen` follows the
 * venue profile only, whatever they are set to.
 *
 * @example
 * ```typescript
 * const exchange = createExchange('forex');
 * exchange.setLocalDateTime(localInstant(2025, 1, 3, 15, 59, 59));
 * exchange.exchangeOpen; // true
 * ```
 */
export class SecurityExchange implements TradingCalendar {
  nominalOpen: TimeOfDay;
  nominalClose: TimeOfDay;

  private readonly profile: VenueProfile;
  private current: LocalInstant;

  constructor(profile: VenueProfile, options: Omit<ExchangeOptions, 'logger'> = {}) {
    this.profile = profile;
    this.nominalOpen = options.nominalOpen ?? profile.nominalOpen;
    this.nominalClose = options.nominalClose ?? profile.nominalClose;
    this.current = new Date(options.time?.getTime() ?? 0);
  }

  get venue(): Venue {
    return this.profile.venue;
  }

  get tradingDaysPerYear(): number {
    return this.profile.tradingDaysPerYear;
  }

  /** Current local time. A copy; mutate through `setLocalDateTime` */
  get time(): LocalInstant {
    return new Date(this.current.getTime());
  }

  setLocalDateTime(instant: LocalInstant): void {
    this.current = new Date(instant.getTime());
  }

  /** Whether the venue is trading at the current local time */
  get exchangeOpen(): boolean {
    return this.isOpen(this.current);
  }

  isOpen(instant: LocalInstant): boolean {
    return this.profile.isOpen(weekdayOf(instant), timeOfDay(instant));
  }

  isTradingDay(instant: LocalInstant): boolean {
    return this.profile.isTradingDay(weekdayOf(instant));
  }
}

/**
 * Creates the exchange for a venue.
 *
 * @example
 * ```typescript
 * const exchange = createExchange('equity', { logger });
 * exchange.isOpen(localInstant(2025, 1, 6, 9, 30)); // true (Mon 09:30)
 * ```
 */
export function createExchange(venue: Venue, options: ExchangeOptions = {}): SecurityExchange {
  const { logger, ...rest } = options;
  const exchange = new SecurityExchange(VENUE_PROFILES[venue], rest);

  logger?.debug('Exchange created', {
    component: 'sessions-calendar',
    venue,
    nominalOpen: formatTimeOfDay(exchange.nominalOpen),
    nominalClose: formatTimeOfDay(exchange.nominalClose),
  });

  return exchange;
}
