import { describe, it, expect } from 'vitest';
import { toIsoDate } from '@salesim/shared';
import {
  createSimulationWindow,
  dailyOrderCount,
  demandIntensity,
  eachSimulatedDay,
  sampleDailyDemand,
  seasonalMultiplier,
  trendMultiplier,
  weekdayMultiplier,
} from '../demand-curve';
import { mulberry32 } from '../random';

const utc = (iso: string) => new Date(`${iso}T00:00:00.000Z`);

describe('createSimulationWindow', () => {
  it('ends on the UTC day of `now` and spans `days` days back', () => {
    const window = createSimulationWindow(new Date('2024-06-15T13:45:00Z'), 730);
    expect(toIsoDate(window.end)).toBe('2024-06-15');
    expect(toIsoDate(window.start)).toBe('2022-06-16');
    expect(window.totalDays).toBe(730);
  });

  it('covers both ends when iterated', () => {
    const window = createSimulationWindow(new Date('2024-06-15T13:45:00Z'), 730);
    const days = [...eachSimulatedDay(window)];
    expect(days).toHaveLength(731);
    expect(toIsoDate(days[0] ?? new Date(0))).toBe('2022-06-16');
    expect(toIsoDate(days[730] ?? new Date(0))).toBe('2024-06-15');
  });

  it('yields a single day for a zero-length window', () => {
    const window = createSimulationWindow(utc('2024-03-01'), 0);
    expect([...eachSimulatedDay(window)].map(toIsoDate)).toEqual(['2024-03-01']);
  });

  it('rejects negative or fractional lengths', () => {
    expect(() => createSimulationWindow(utc('2024-03-01'), -1)).toThrow(RangeError);
    expect(() => createSimulationWindow(utc('2024-03-01'), 1.5)).toThrow(RangeError);
  });
});

describe('multipliers', () => {
  it('peaks in December and dips in January', () => {
    expect(seasonalMultiplier(utc('2023-12-10'))).toBe(1.5);
    expect(seasonalMultiplier(utc('2024-01-10'))).toBe(0.7);
    expect(seasonalMultiplier(utc('2024-07-10'))).toBe(1.3);
    expect(seasonalMultiplier(utc('2024-04-10'))).toBe(1.0);
  });

  it('favours weekends', () => {
    expect(weekdayMultiplier(utc('2024-06-15'))).toBe(1.3); // Saturday
    expect(weekdayMultiplier(utc('2024-06-16'))).toBe(1.3); // Sunday
    expect(weekdayMultiplier(utc('2024-06-17'))).toBe(1.0); // Monday
    expect(weekdayMultiplier(utc('2024-06-14'))).toBe(1.1); // Friday
  });

  it('ramps the trend from 1.0 to 1.5 across the window', () => {
    const window = createSimulationWindow(utc('2024-06-15'), 730);
    expect(trendMultiplier(window.start, window)).toBe(1.0);
    expect(trendMultiplier(utc('2023-06-16'), window)).toBe(1.25);
    expect(trendMultiplier(window.end, window)).toBe(1.5);
  });

  it('clamps the trend outside the window and on empty windows', () => {
    const window = createSimulationWindow(utc('2024-06-15'), 10);
    expect(trendMultiplier(utc('2025-01-01'), window)).toBe(1.5);
    expect(trendMultiplier(utc('2020-01-01'), window)).toBe(1.0);
    expect(trendMultiplier(utc('2024-06-15'), createSimulationWindow(utc('2024-06-15'), 0))).toBe(1.0);
  });
});

describe('sampleDailyDemand', () => {
  it('uses the lowest base and noise on a low draw', () => {
    const window = createSimulationWindow(utc('2024-01-11'), 10);
    const sample = sampleDailyDemand(utc('2024-01-01'), window, () => 0);
    expect(sample.base).toBe(5);
    expect(sample.noise).toBe(0.8);
    expect(sample.intensity).toBeCloseTo(0.56);
    expect(sample.count).toBe(3);
  });

  it('reaches the high end on a December Saturday at the window end', () => {
    const window = createSimulationWindow(utc('2023-12-30'), 365);
    const sample = sampleDailyDemand(utc('2023-12-30'), window, () => 0.9999);
    expect(sample.base).toBe(15);
    expect(sample.count).toBe(53);
  });

  it('never drops below one order a day', () => {
    const window = createSimulationWindow(utc('2024-06-15'), 730);
    const rng = mulberry32(11);
    for (const day of eachSimulatedDay(window)) {
      expect(dailyOrderCount(day, window, rng)).toBeGreaterThanOrEqual(1);
      expect(demandIntensity(day, window, rng)).toBeGreaterThan(0);
    }
  });

  it('draws independently on repeated calls for the same day', () => {
    const window = createSimulationWindow(utc('2024-06-15'), 30);
    const draws = [0, 0, 0.9999, 0.9999];
    const rng = () => draws.shift() ?? 0;
    const first = sampleDailyDemand(utc('2024-06-10'), window, rng);
    const second = sampleDailyDemand(utc('2024-06-10'), window, rng);
    expect(first.base).toBe(5);
    expect(second.base).toBe(15);
  });
});
