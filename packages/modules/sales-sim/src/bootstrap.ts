import bcrypt from 'bcryptjs';
import type { Logger } from '@salesim/core';
import { getErrorMessage, parseCents } from '@salesim/shared';
import { ensureMetrics } from './metric-backfill';
import { ensurePlaceholderImage } from './placeholder-image';
import { randInt, type Rng } from './random';
import { demoBuyers, demoCatalog } from './seed-data';
import type { SalesSimStore } from './store';
import type { Buyer, CatalogItem, SalesCatalog } from './types';

// An existing catalog/buyer pool at least this large is reused as-is.
export const MIN_REUSABLE_CATALOG = 30;
export const MIN_REUSABLE_BUYERS = 15;
export const BUYER_POOL_LIMIT = 30;

export const INITIAL_STOCK = { min: 20, max: 200 } as const;

export interface CatalogBootstrapOptions {
  rng: Rng;
  mediaRoot: string;
  logger: Logger;
}

export interface CatalogBootstrapResult {
  catalog: SalesCatalog;
  metricFaults: number;
  imageFaults: number;
}

function mergeById<T extends { id: string }>(first: readonly T[], second: readonly T[]): T[] {
  const byId = new Map<string, T>();
  for (const entry of [...first, ...second]) byId.set(entry.id, entry);
  return [...byId.values()];
}

/**
 * Ensures the demo catalog exists and every item on it carries display
 * metrics. Reuses a large enough existing catalog; otherwise seeds the demo
 * products (idempotently, by name) and sells those plus whatever already exists.
 */
export async function ensureCatalog(
  store: SalesSimStore,
  options: CatalogBootstrapOptions,
): Promise<CatalogBootstrapResult> {
  const { rng, logger } = options;
  const log = logger.child({ step: 'catalog-bootstrap' });
  const popularityByName = new Map(demoCatalog.products.map((p) => [p.name, p.popularity]));
  const weights = new Map<string, number>();
  let metricFaults = 0;
  let imageFaults = 0;

  const backfill = async (item: CatalogItem): Promise<CatalogItem> => {
    const popularity = weights.get(item.id);
    const result = await ensureMetrics(store, item, popularity === undefined ? { rng } : { rng, popularity });
    for (const fault of result.faults) {
      metricFaults++;
      log.warn('metric backfill skipped', {
        catalogItemId: item.id,
        field: fault.field,
        error: { kind: fault.stage, message: fault.message },
      });
    }
    return result.item;
  };

  const existing = await store.listCatalogItems(MIN_REUSABLE_CATALOG);
  for (const item of existing) {
    const popularity = popularityByName.get(item.name);
    if (popularity !== undefined) weights.set(item.id, popularity);
  }

  if (existing.length >= MIN_REUSABLE_CATALOG) {
    const items: CatalogItem[] = [];
    for (const item of existing) items.push(await backfill(item));
    log.info('reusing existing catalog', { items: items.length });
    return { catalog: { items, weights }, metricFaults, imageFaults };
  }

  const categoryIds = new Map<string, string>();
  for (const category of demoCatalog.categories) {
    const row = await store.getOrCreateCategory(category);
    categoryIds.set(category.slug, row.id);
  }
  for (const name of demoCatalog.brands) {
    await store.getOrCreateBrand(name);
  }
  for (const warranty of demoCatalog.warranties) {
    await store.getOrCreateWarranty(warranty);
  }
  const brands = await store.listBrands();
  const warranties = await store.listWarranties();

  let placeholder: string | null = null;
  try {
    placeholder = await ensurePlaceholderImage(options.mediaRoot);
  } catch (err) {
    imageFaults++;
    log.warn('placeholder image unavailable', { error: { message: getErrorMessage(err) } });
  }

  const seeded: CatalogItem[] = [];
  for (const [i, product] of demoCatalog.products.entries()) {
    const created = await store.getOrCreateCatalogItem({
      name: product.name,
      description: `Demo product: ${product.name}`,
      unitPriceCents: parseCents(product.price),
      categoryId: categoryIds.get(product.category) ?? null,
      brandId: brands.length > 0 ? (brands[i % brands.length]?.id ?? null) : null,
      warrantyId: warranties.length > 0 ? (warranties[i % warranties.length]?.id ?? null) : null,
      stockQuantity: randInt(rng, INITIAL_STOCK.min, INITIAL_STOCK.max),
    });
    weights.set(created.id, product.popularity);

    let item = await backfill(created);
    if (placeholder !== null && item.imagePath === null) {
      try {
        await store.setImageIfMissing(item.id, placeholder);
        item = { ...item, imagePath: placeholder };
      } catch (err) {
        imageFaults++;
        log.warn('placeholder image not assigned', {
          catalogItemId: item.id,
          error: { message: getErrorMessage(err) },
        });
      }
    }
    seeded.push(item);
  }

  const backfilledExisting: CatalogItem[] = [];
  for (const item of existing) {
    if (!seeded.some((s) => s.id === item.id)) backfilledExisting.push(await backfill(item));
  }

  const items = mergeById(backfilledExisting, seeded);
  log.info('catalog ready', { items: items.length, seeded: seeded.length });
  return { catalog: { items, weights }, metricFaults, imageFaults };
}

export interface BuyerPoolOptions {
  demoPassword: string;
  passwordRounds: number;
  logger: Logger;
}

/**
 * Ensures at least the demo buyers exist. A pool of MIN_REUSABLE_BUYERS or more
 * is reused as-is; otherwise the demo buyers are created by username and added
 * to the existing ones.
 */
export async function ensureBuyerPool(
  store: SalesSimStore,
  options: BuyerPoolOptions,
): Promise<Buyer[]> {
  const log = options.logger.child({ step: 'buyer-bootstrap' });
  const existing = await store.listBuyers(BUYER_POOL_LIMIT);
  if (existing.length >= MIN_REUSABLE_BUYERS) {
    log.info('reusing existing buyers', { buyers: existing.length });
    return existing;
  }

  // One hash for the whole demo pool; they all share the demo password.
  const passwordHash = await bcrypt.hash(options.demoPassword, options.passwordRounds);
  const seeded: Buyer[] = [];
  for (const [i, name] of demoBuyers.entries()) {
    const username = `buyer${i + 1}`;
    seeded.push(
      await store.getOrCreateBuyer({
        username,
        email: `${username}@demo.test`,
        firstName: name.firstName,
        lastName: name.lastName,
        passwordHash,
      }),
    );
  }

  const buyers = mergeById(existing, seeded);
  log.info('buyers ready', { buyers: buyers.length, seeded: seeded.length });
  return buyers;
}
