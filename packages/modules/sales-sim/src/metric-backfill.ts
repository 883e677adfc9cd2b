import { getErrorMessage, toDollars } from '@salesim/shared';
import { randFloat, randInt, type Rng } from './random';
import type { MetricPatch, SalesSimStore } from './store';
import type { CatalogItem } from './types';

// ── Rating ──────────────────────────────────────────────────────

export const RATING_BASE = 3.5;
export const RATING_NOISE = 0.3;
const PRICE_FOR_MAX_RATING_BONUS = 2000;

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Display rating in [0, 5]. Popular items rate higher; without a popularity
 * figure, pricier items do.
 */
export function deriveRating(item: CatalogItem, popularity: number | undefined, rng: Rng): number {
  let base: number;
  if (popularity !== undefined) {
    if (!Number.isFinite(popularity)) {
      throw new RangeError(`Popularity for ${item.id} is not a number`);
    }
    base = RATING_BASE + (popularity - 0.5) * 2;
  } else {
    if (!Number.isFinite(item.unitPriceCents) || item.unitPriceCents < 0) {
      throw new RangeError(`Price for ${item.id} is not a valid amount`);
    }
    base = RATING_BASE + Math.min(1.5, toDollars(item.unitPriceCents) / PRICE_FOR_MAX_RATING_BONUS);
  }
  const noisy = base + randFloat(rng, -RATING_NOISE, RATING_NOISE);
  return Math.max(0, Math.min(5, roundTo2(noisy)));
}

// ── Energy ──────────────────────────────────────────────────────

export interface EnergyProfile {
  name: string;
  keywords: readonly string[];
  min: number;
  max: number;
  /** Odds that the item is a gas model drawing no electricity at all. */
  gasShare?: number;
}

// First match wins. A keyword matches at the start of a word in the lower-cased
// category name, so 'range' matches "ranges" but not "orange".
export const ENERGY_PROFILES: readonly EnergyProfile[] = [
  { name: 'refrigeration', keywords: ['refrigerat', 'fridge', 'freezer'], min: 250, max: 550 },
  { name: 'laundry', keywords: ['washing', 'washer', 'laundry', 'dryer'], min: 50, max: 200 },
  { name: 'microwave', keywords: ['microwave'], min: 50, max: 120 },
  { name: 'television', keywords: ['television', 'smart tv'], min: 30, max: 200 },
  { name: 'cooling', keywords: ['air condition', 'cooling', 'heat pump'], min: 500, max: 2000 },
  { name: 'cooking', keywords: ['cooktop', 'range', 'oven', 'stove'], min: 200, max: 800, gasShare: 0.5 },
];

export const FALLBACK_ENERGY_PROFILE: EnergyProfile = {
  name: 'general',
  keywords: [],
  min: 20,
  max: 500,
};

// Keywords are plain lower-case text with no regex metacharacters.
function startsWord(name: string, keyword: string): boolean {
  return new RegExp(`\\b${keyword}`).test(name);
}

export function energyProfileFor(categoryName: string | null): EnergyProfile {
  const name = (categoryName ?? '').toLowerCase();
  if (!name) return FALLBACK_ENERGY_PROFILE;
  return (
    ENERGY_PROFILES.find((profile) => profile.keywords.some((kw) => startsWord(name, kw))) ??
    FALLBACK_ENERGY_PROFILE
  );
}

/** Whole kWh/year drawn from the category's range, returned as a float column value. */
export function deriveEnergyEstimate(categoryName: string | null, rng: Rng): number {
  const profile = energyProfileFor(categoryName);
  if (profile.gasShare !== undefined && rng() < profile.gasShare) {
    return 0;
  }
  return randInt(rng, profile.min, profile.max);
}

// ── Backfill ────────────────────────────────────────────────────

export type MetricField = 'rating' | 'energyKwhPerYear';

export interface MetricFault {
  field: MetricField;
  stage: 'derive' | 'persist';
  message: string;
}

export interface MetricBackfillResult {
  /** The item with whatever metrics are stored after the call. */
  item: CatalogItem;
  /** True when this call changed at least one stored value. */
  updated: boolean;
  faults: MetricFault[];
}

export interface EnsureMetricsOptions {
  rng: Rng;
  popularity?: number;
}

/**
 * Fills in rating and energy estimate where they are missing. Values already
 * set are never touched, so a second call on the same item is a no-op. Faults
 * are reported on the result; the affected field stays unset for a later pass.
 */
export async function ensureMetrics(
  store: SalesSimStore,
  item: CatalogItem,
  options: EnsureMetricsOptions,
): Promise<MetricBackfillResult> {
  const faults: MetricFault[] = [];
  const patch: MetricPatch = {};

  if (item.rating === null) {
    try {
      patch.rating = deriveRating(item, options.popularity, options.rng);
    } catch (err) {
      faults.push({ field: 'rating', stage: 'derive', message: getErrorMessage(err) });
    }
  }
  if (item.energyKwhPerYear === null) {
    try {
      patch.energyKwhPerYear = deriveEnergyEstimate(item.categoryName, options.rng);
    } catch (err) {
      faults.push({ field: 'energyKwhPerYear', stage: 'derive', message: getErrorMessage(err) });
    }
  }

  if (patch.rating === undefined && patch.energyKwhPerYear === undefined) {
    return { item, updated: false, faults };
  }

  try {
    const stored = await store.assignMissingMetrics(item.id, patch);
    const next: CatalogItem = { ...item, ...stored };
    const updated =
      next.rating !== item.rating || next.energyKwhPerYear !== item.energyKwhPerYear;
    return { item: next, updated, faults };
  } catch (err) {
    const message = getErrorMessage(err);
    if (patch.rating !== undefined) faults.push({ field: 'rating', stage: 'persist', message });
    if (patch.energyKwhPerYear !== undefined) {
      faults.push({ field: 'energyKwhPerYear', stage: 'persist', message });
    }
    return { item, updated: false, faults };
  }
}
