/**
 * Quota Manager Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  QuotaExhaustedError,
  canSpend,
  createQuota,
  dayKeyFor,
  msLeftInDay,
  remaining,
  rollDay,
  spend,
  steadySpacingMs,
  type QuotaLimits,
} from '../../../src/core/index.js';

const LIMITS: QuotaLimits = { maxDaily: 13, minSecondsBetweenCalls: 30 };

describe('dayKeyFor', () => {
  it('should use the calendar date of the reference timezone', () => {
    // 03:30 UTC is still the previous evening in New York
    const now = new Date('2024-03-11T03:30:00Z');
    expect(dayKeyFor(now, 'UTC')).toBe('2024-03-11');
    expect(dayKeyFor(now, 'America/New_York')).toBe('2024-03-10');
  });

  it('should accept epoch milliseconds', () => {
    expect(dayKeyFor(Date.UTC(2024, 0, 31, 23, 59), 'UTC')).toBe('2024-01-31');
  });
});

describe('spend', () => {
  it('should increment usage and stamp the call time', () => {
    const next = spend(createQuota('2024-03-10'), 5000, LIMITS);
    expect(next).toEqual({ callsUsedToday: 1, dayKey: '2024-03-10', lastCallAt: 5000 });
  });

  it('should never decrease usage within a day', () => {
    let quota = createQuota('2024-03-10');
    let previous = 0;
    for (let i = 0; i < LIMITS.maxDaily; i++) {
      quota = spend(quota, i * 1000, LIMITS);
      expect(quota.callsUsedToday).toBeGreaterThan(previous);
      expect(quota.callsUsedToday).toBeLessThanOrEqual(LIMITS.maxDaily);
      previous = quota.callsUsedToday;
    }
    expect(remaining(quota, LIMITS)).toBe(0);
  });

  it('should throw QuotaExhaustedError when nothing remains', () => {
    const exhausted = { callsUsedToday: 13, dayKey: '2024-03-10', lastCallAt: 1 };
    expect(() => spend(exhausted, 2, LIMITS)).toThrow(QuotaExhaustedError);
  });

  it('should throw immediately with a zero daily limit', () => {
    expect(() => spend(createQuota('2024-03-10'), 1, { ...LIMITS, maxDaily: 0 }))
      .toThrow('Daily AI quota exhausted (0/0)');
  });
});

describe('canSpend', () => {
  const quota = { callsUsedToday: 2, dayKey: '2024-03-10', lastCallAt: 100_000 };

  it('should enforce the minimum spacing', () => {
    expect(canSpend(quota, 129_999, LIMITS)).toBe(false);
    expect(canSpend(quota, 130_000, LIMITS)).toBe(true);
  });

  it('should use an explicit spacing over the minimum', () => {
    expect(canSpend(quota, 130_000, LIMITS, { spacingMs: 60_000 })).toBe(false);
    expect(canSpend(quota, 160_000, LIMITS, { spacingMs: 60_000 })).toBe(true);
  });

  it('should skip spacing when asked', () => {
    expect(canSpend(quota, 100_001, LIMITS, { ignoreSpacing: true })).toBe(true);
  });

  it('should refuse when the daily limit is reached', () => {
    const used = { ...quota, callsUsedToday: 13 };
    expect(canSpend(used, 10_000_000, LIMITS, { ignoreSpacing: true })).toBe(false);
  });
});

describe('rollDay', () => {
  it('should reset usage exactly once per new day', () => {
    const used = { callsUsedToday: 13, dayKey: '2024-03-10', lastCallAt: 42 };

    const first = rollDay(used, '2024-03-11');
    expect(first.rolled).toBe(true);
    expect(first.quota).toEqual({ callsUsedToday: 0, dayKey: '2024-03-11', lastCallAt: 42 });

    const spent = spend(first.quota, 50, LIMITS);
    const second = rollDay(spent, '2024-03-11');
    expect(second.rolled).toBe(false);
    expect(second.quota.callsUsedToday).toBe(1);
  });

  it('should leave the quota untouched on the same day', () => {
    const quota = createQuota('2024-03-10');
    expect(rollDay(quota, '2024-03-10').quota).toBe(quota);
  });
});

describe('msLeftInDay', () => {
  it('should count to midnight in the reference timezone', () => {
    expect(msLeftInDay(Date.parse('2024-03-10T12:00:00Z'), 'UTC')).toBe(12 * 60 * 60 * 1000);
    // 23:30 in New York (EDT)
    expect(msLeftInDay(Date.parse('2024-06-11T03:30:00Z'), 'America/New_York')).toBe(30 * 60 * 1000);
  });
});

describe('steadySpacingMs', () => {
  const noon = Date.parse('2024-03-10T12:00:00Z');

  it('should split the rest of the day over the calls left', () => {
    const quota = { callsUsedToday: 9, dayKey: '2024-03-10', lastCallAt: noon };
    // 12 hours over 4 calls
    expect(steadySpacingMs(quota, noon, LIMITS, 'UTC')).toBe(3 * 60 * 60 * 1000);
  });

  it('should never go below the configured minimum', () => {
    const quota = { callsUsedToday: 0, dayKey: '2024-03-10', lastCallAt: 0 };
    const lateEvening = Date.parse('2024-03-10T23:59:00Z');
    // 60 seconds over 13 calls is under 30 seconds
    expect(steadySpacingMs(quota, lateEvening, LIMITS, 'UTC')).toBe(30_000);
  });

  it('should fall back to the minimum when nothing remains', () => {
    const quota = { callsUsedToday: 13, dayKey: '2024-03-10', lastCallAt: noon };
    expect(steadySpacingMs(quota, noon, LIMITS, 'UTC')).toBe(30_000);
  });
});
