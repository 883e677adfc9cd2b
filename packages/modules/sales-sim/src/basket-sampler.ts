import { EmptyCatalogError, lineExtensionCents, sumCents } from '@salesim/shared';
import { weightedPick, type Rng } from './random';
import type { BasketLine, CatalogItem, PopularityWeights, SalesCatalog } from './types';

// Most purchases are a single line; large baskets are rare.
export const BASKET_SIZES = [1, 2, 3, 4] as const;
export const BASKET_SIZE_WEIGHTS = [0.5, 0.3, 0.15, 0.05] as const;

export const LINE_QUANTITIES = [1, 2, 3] as const;
export const LINE_QUANTITY_WEIGHTS = [0.7, 0.2, 0.1] as const;

/** Weight used for catalog items the simulation has no popularity figure for. */
export const DEFAULT_POPULARITY = 0.5;

export function popularityOf(weights: PopularityWeights, itemId: string): number {
  return weights.get(itemId) ?? DEFAULT_POPULARITY;
}

/**
 * Draws one basket. Slots are sampled with replacement, so the same item may
 * show up on two lines; those lines are kept separate.
 */
export function sampleBasket(catalog: SalesCatalog, rng: Rng): BasketLine[] {
  const { items, weights } = catalog;
  if (items.length === 0) {
    throw new EmptyCatalogError();
  }
  const itemWeights = items.map((item) => popularityOf(weights, item.id));
  const size = weightedPick(rng, BASKET_SIZES, BASKET_SIZE_WEIGHTS);

  const lines: BasketLine[] = [];
  for (let slot = 0; slot < size; slot++) {
    const item: CatalogItem = weightedPick(rng, items, itemWeights);
    const qty = weightedPick(rng, LINE_QUANTITIES, LINE_QUANTITY_WEIGHTS);
    lines.push({ item, qty, unitPriceCents: item.unitPriceCents });
  }
  return lines;
}

export function basketTotalCents(lines: readonly BasketLine[]): number {
  return sumCents(lines.map((line) => lineExtensionCents(line.unitPriceCents, line.qty)));
}
