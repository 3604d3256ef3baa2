import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@tickline/logger';
import { SecurityExchange, createExchange } from '../src/exchange.js';
import { VENUE_PROFILES } from '../src/calendar.js';
import { localInstant, parseTimeOfDay } from '../src/instant.js';

describe('SecurityExchange', () => {
  it('should follow the venue profile', () => {
    const exchange = createExchange('forex');

    expect(exchange.venue).toBe('forex');
    expect(exchange.tradingDaysPerYear).toBe(313);
    expect(exchange.nominalOpen).toBe(0);
    expect(exchange.nominalClose).toBe(86_399_996);
    expect(exchange.isOpen(localInstant(2025, 1, 3, 16))).toBe(false);
    expect(exchange.isTradingDay(localInstant(2025, 1, 4))).toBe(false);
  });

  it('should report exchangeOpen for the current local time', () => {
    const exchange = createExchange('forex');

    exchange.setLocalDateTime(localInstant(2025, 1, 3, 15, 59, 59));
    expect(exchange.exchangeOpen).toBe(true);

    exchange.setLocalDateTime(localInstant(2025, 1, 3, 16));
    expect(exchange.exchangeOpen).toBe(false);

    exchange.setLocalDateTime(localInstant(2025, 1, 5, 17));
    expect(exchange.exchangeOpen).toBe(true);
  });

  it('should start at the epoch unless a time is given', () => {
    expect(createExchange('forex').time.getTime()).toBe(0);
    expect(createExchange('forex', { time: localInstant(2025, 1, 4, 12) }).exchangeOpen).toBe(false);
  });

  it('should keep its own copy of the current time', () => {
    const exchange = createExchange('forex');
    const instant = localInstant(2025, 1, 6, 10);
    exchange.setLocalDateTime(instant);

    instant.setUTCDate(4);
    exchange.time.setUTCDate(4);

    expect(exchange.time.getTime()).toBe(Date.UTC(2025, 0, 6, 10));
  });

  it('should not consult nominal open and close', () => {
    const exchange = new SecurityExchange(VENUE_PROFILES.forex, {
      nominalOpen: parseTimeOfDay('09:00'),
      nominalClose: parseTimeOfDay('10:00'),
    });

    exchange.nominalClose = parseTimeOfDay('00:30');

    expect(exchange.nominalOpen).toBe(32_400_000);
    expect(exchange.nominalClose).toBe(1_800_000);
    expect(exchange.isOpen(localInstant(2025, 1, 7, 22))).toBe(true);
  });

  it('should log creation at debug level', () => {
    const logger = createLogger({ level: 'debug', console: false });
    const debug = vi.spyOn(logger, 'debug');

    createExchange('equity', { logger });

    expect(debug).toHaveBeenCalledWith('Exchange created', {
      component: 'sessions-calendar',
      venue: 'equity',
      nominalOpen: '09:30:00.000',
      nominalClose: '16:00:00.000',
    });
  });
});
