/**
 * Daily AI-call quota.
 *
 * Pure functions over QuotaState. The day key is recomputed from the clock on
 * every tick and compared against the persisted one; nothing here caches it.
 */

import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import { QuotaExhaustedError } from './errors.js';
import type { QuotaLimits, QuotaState } from './types.js';

dayjs.extend(utc);
dayjs.extend(timezone);

/**
 * Calendar date (YYYY-MM-DD) of `now` in the reference timezone.
 */
export function dayKeyFor(now: Date | number, tz: string): string {
  return dayjs(now).tz(tz).format('YYYY-MM-DD');
}

export function createQuota(dayKey: string): QuotaState {
  return { callsUsedToday: 0, dayKey, lastCallAt: 0 };
}

export function remaining(quota: QuotaState, limits: QuotaLimits): number {
  return Math.max(0, limits.maxDaily - quota.callsUsedToday);
}

/**
 * Milliseconds from `now` to the next midnight in the reference timezone.
 */
export function msLeftInDay(now: number, tz: string): number {
  return dayjs(now).tz(tz).endOf('day').valueOf() + 1 - now;
}

/**
 * Gap required before the next steady-mode call: the rest of the day split
 * evenly over the calls left, never below the configured minimum.
 */
export function steadySpacingMs(quota: QuotaState, now: number, limits: QuotaLimits, tz: string): number {
  const floor = limits.minSecondsBetweenCalls * 1000;
  const left = remaining(quota, limits);
  if (left === 0) return floor;
  return Math.max(floor, msLeftInDay(now, tz) / left);
}

export interface SpendOptions {
  /** Burst mode: skip the gap check. */
  ignoreSpacing?: boolean;
  /** Required gap since the last call; defaults to the configured minimum. */
  spacingMs?: number;
}

/**
 * Whether one more analysis call is allowed at `now` (epoch ms).
 */
export function canSpend(
  quota: QuotaState,
  now: number,
  limits: QuotaLimits,
  options: SpendOptions = {}
): boolean {
  if (remaining(quota, limits) <= 0) return false;
  if (options.ignoreSpacing) return true;
  const spacingMs = options.spacingMs ?? limits.minSecondsBetweenCalls * 1000;
  return now - quota.lastCallAt >= spacingMs;
}

/**
 * Record one call. Throws QuotaExhaustedError when nothing remains.
 */
export function spend(quota: QuotaState, now: number, limits: QuotaLimits): QuotaState {
  if (remaining(quota, limits) === 0) {
    throw new QuotaExhaustedError(quota.callsUsedToday, limits.maxDaily);
  }
  return {
    ...quota,
    callsUsedToday: quota.callsUsedToday + 1,
    lastCallAt: now,
  };
}

export interface RollResult {
  quota: QuotaState;
  rolled: boolean;
}

/**
 * Reset the counter when the calendar day has changed.
 * `lastCallAt` is kept: spacing still applies across midnight once burst ends.
 */
export function rollDay(quota: QuotaState, todayKey: string): RollResult {
  if (quota.dayKey === todayKey) {
    return { quota, rolled: false };
  }
  return {
    quota: { ...quota, callsUsedToday: 0, dayKey: todayKey },
    rolled: true,
  };
}
