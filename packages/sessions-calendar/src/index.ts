/**
 * @tickline/sessions-calendar
 *
 * Venue trading calendars over venue-local instants.
 */

export { Weekday } from './types.js';
export type { LocalInstant, TimeOfDay, Venue, TradingCalendar, VenueProfile } from './types.js';

export {
  MS_PER_SECOND,
  MS_PER_MINUTE,
  MS_PER_HOUR,
  MS_PER_DAY,
  TIME_OF_DAY_PATTERN,
  localInstant,
  parseLocalInstant,
  weekdayOf,
  timeOfDay,
  parseTimeOfDay,
  formatTimeOfDay,
} from './instant.js';

export { VENUE_PROFILES, isVenue, isOpen, isTradingDay } from './calendar.js';

export { SecurityExchange, createExchange } from './exchange.js';
export type { ExchangeOptions } from './exchange.js';

export {
  calendarConfigSchema,
  calendarEnvMapping,
  loadCalendarConfig,
  createExchangeFromConfig,
} from './config.js';
export type { CalendarConfig } from './config.js';
