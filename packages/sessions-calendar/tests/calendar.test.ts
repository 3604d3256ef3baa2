import { describe, it, expect } from 'vitest';
import { VENUE_PROFILES, isOpen, isTradingDay, isVenue } from '../src/calendar.js';
import { localInstant } from '../src/instant.js';

// Week of 2025-01-03: Fri 3, Sat 4, Sun 5, Mon 6 ... Thu 9
const at = (day: number, hour = 0, minute = 0, second = 0, ms = 0) =>
  localInstant(2025, 1, day, hour, minute, second, ms);

describe('forex calendar', () => {
  it('should stay open until Friday 16:00', () => {
    expect(isOpen('forex', at(3, 15, 59, 59))).toBe(true);
    expect(isOpen('forex', at(3, 15, 59, 59, 999))).toBe(true);
    expect(isOpen('forex', at(3, 16))).toBe(false);
    expect(isOpen('forex', at(3, 23, 59))).toBe(false);
  });

  it('should be closed all of Saturday', () => {
    expect(isOpen('forex', at(4))).toBe(false);
    expect(isOpen('forex', at(4, 12))).toBe(false);
    expect(isOpen('forex', at(4, 23, 59, 59, 999))).toBe(false);
  });

  it('should open at Sunday 17:00', () => {
    expect(isOpen('forex', at(5))).toBe(false);
    expect(isOpen('forex', at(5, 16, 59, 59))).toBe(false);
    expect(isOpen('forex', at(5, 17))).toBe(true);
    expect(isOpen('forex', at(5, 23, 59, 59))).toBe(true);
  });

  it('should be open around the clock Monday to Thursday', () => {
    for (let day = 6; day <= 9; day++) {
      for (const hour of [0, 9, 16, 17, 23]) {
        expect(isOpen('forex', at(day, hour))).toBe(true);
      }
    }
    expect(isOpen('forex', at(3, 0))).toBe(true);
  });

  it('should treat only Saturday as a non-trading day', () => {
    expect(isTradingDay('forex', at(4))).toBe(false);
    expect(isTradingDay('forex', at(4, 23))).toBe(false);
    for (const day of [3, 5, 6, 7, 8, 9]) {
      expect(isTradingDay('forex', at(day))).toBe(true);
    }
  });

  it('should judge trading days independently of time of day', () => {
    expect(isTradingDay('forex', at(5, 1))).toBe(true);
    expect(isOpen('forex', at(5, 1))).toBe(false);
    expect(isTradingDay('forex', at(3, 20))).toBe(true);
    expect(isOpen('forex', at(3, 20))).toBe(false);
  });

  it('should answer repeated queries identically', () => {
    const instant = at(5, 17);
    const answers = Array.from({ length: 3 }, () => isOpen('forex', instant));

    expect(answers).toEqual([true, true, true]);
    expect(instant.getTime()).toBe(Date.UTC(2025, 0, 5, 17));
  });

  it('should expose the forex profile constants', () => {
    expect(VENUE_PROFILES.forex.tradingDaysPerYear).toBe(313);
    expect(VENUE_PROFILES.forex.nominalOpen).toBe(0);
    expect(VENUE_PROFILES.forex.nominalClose).toBe(86_399_996);
  });
});

describe('equity calendar', () => {
  it('should trade 09:30 to 16:00 on weekdays', () => {
    expect(isOpen('equity', at(6, 9, 29, 59))).toBe(false);
    expect(isOpen('equity', at(6, 9, 30))).toBe(true);
    expect(isOpen('equity', at(6, 15, 59, 59))).toBe(true);
    expect(isOpen('equity', at(6, 16))).toBe(false);
  });

  it('should be closed on weekends', () => {
    expect(isTradingDay('equity', at(4))).toBe(false);
    expect(isTradingDay('equity', at(5))).toBe(false);
    expect(isOpen('equity', at(5, 12))).toBe(false);
    expect(isTradingDay('equity', at(3))).toBe(true);
  });

  it('should expose the equity profile constants', () => {
    expect(VENUE_PROFILES.equity.tradingDaysPerYear).toBe(252);
    expect(VENUE_PROFILES.equity.nominalOpen).toBe(34_200_000);
    expect(VENUE_PROFILES.equity.nominalClose).toBe(57_600_000);
  });
});

describe('isVenue', () => {
  it('should recognize supported venues only', () => {
    expect(isVenue('forex')).toBe(true);
    expect(isVenue('equity')).toBe(true);
    expect(isVenue('crypto')).toBe(false);
    expect(isVenue('constructor')).toBe(false);
  });
});
