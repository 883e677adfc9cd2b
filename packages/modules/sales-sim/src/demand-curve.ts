import { addUtcDays, diffUtcDays, startOfUtcDay } from '@salesim/shared';
import { randFloat, randInt, type Rng } from './random';
import type { SimulationWindow } from './types';

// ── Configuration ───────────────────────────────────────────────

export const DEFAULT_WINDOW_DAYS = 730;

export const BASE_DAILY_ORDERS = { min: 5, max: 15 } as const;
export const NOISE_RANGE = { min: 0.8, max: 1.2 } as const;
export const TREND_GROWTH = 0.5;

// Indexed by UTC month (0 = January).
const SEASONAL_BY_MONTH: readonly number[] = [
  0.7, // Jan: post-holiday slump
  0.7, // Feb
  1.0,
  1.0,
  1.0,
  1.2, // Jun: pre-winter-holiday build-up
  1.3, // Jul: mid-year sales
  1.3, // Aug
  1.0,
  1.0,
  1.2, // Nov: pre-Christmas
  1.5, // Dec: holiday peak
];

// Indexed by UTC weekday (0 = Sunday).
const WEEKDAY_BY_DAY: readonly number[] = [1.3, 1.0, 1.0, 1.0, 1.0, 1.1, 1.3];

// ── Window ──────────────────────────────────────────────────────

/** `days` whole days ending on the UTC day containing `now`. */
export function createSimulationWindow(now: Date, days: number = DEFAULT_WINDOW_DAYS): SimulationWindow {
  if (!Number.isInteger(days) || days < 0) {
    throw new RangeError(`Window length must be a non-negative integer, got ${days}`);
  }
  const end = startOfUtcDay(now);
  return { start: addUtcDays(end, -days), end, totalDays: days };
}

export function* eachSimulatedDay(window: SimulationWindow): Generator<Date> {
  for (let offset = 0; offset <= window.totalDays; offset++) {
    yield addUtcDays(window.start, offset);
  }
}

// ── Multipliers ─────────────────────────────────────────────────

export function seasonalMultiplier(date: Date): number {
  return SEASONAL_BY_MONTH[date.getUTCMonth()] ?? 1.0;
}

/** Linear ramp from 1.0 at the window start to 1.5 at the window end. */
export function trendMultiplier(date: Date, window: SimulationWindow): number {
  if (window.totalDays <= 0) return 1.0;
  const progress = diffUtcDays(window.start, date) / window.totalDays;
  return 1.0 + TREND_GROWTH * Math.min(1, Math.max(0, progress));
}

export function weekdayMultiplier(date: Date): number {
  return WEEKDAY_BY_DAY[date.getUTCDay()] ?? 1.0;
}

// ── Sampling ────────────────────────────────────────────────────

export interface DemandSample {
  base: number;
  seasonal: number;
  trend: number;
  weekday: number;
  noise: number;
  /** seasonal × trend × weekday × noise */
  intensity: number;
  /** max(1, round(base × intensity)) */
  count: number;
}

/**
 * Draws a fresh demand sample for `date`. Nothing is memoized: two calls for the
 * same day draw independent base and noise values.
 */
export function sampleDailyDemand(date: Date, window: SimulationWindow, rng: Rng): DemandSample {
  const base = randInt(rng, BASE_DAILY_ORDERS.min, BASE_DAILY_ORDERS.max);
  const seasonal = seasonalMultiplier(date);
  const trend = trendMultiplier(date, window);
  const weekday = weekdayMultiplier(date);
  const noise = randFloat(rng, NOISE_RANGE.min, NOISE_RANGE.max);
  const intensity = seasonal * trend * weekday * noise;
  return {
    base,
    seasonal,
    trend,
    weekday,
    noise,
    intensity,
    count: Math.max(1, Math.round(base * intensity)),
  };
}

export function demandIntensity(date: Date, window: SimulationWindow, rng: Rng): number {
  return (
    seasonalMultiplier(date) *
    trendMultiplier(date, window) *
    weekdayMultiplier(date) *
    randFloat(rng, NOISE_RANGE.min, NOISE_RANGE.max)
  );
}

export function dailyOrderCount(date: Date, window: SimulationWindow, rng: Rng): number {
  return sampleDailyDemand(date, window, rng).count;
}
