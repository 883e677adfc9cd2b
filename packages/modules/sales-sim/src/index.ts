export const MODULE_KEY = 'sales-sim' as const;
export const MODULE_NAME = 'Synthetic Sales History';
export const MODULE_VERSION = '1.0.0';

/** SQL tables this module writes to */
export const MODULE_TABLES = [
  'catalog_categories',
  'catalog_brands',
  'catalog_warranties',
  'catalog_items',
  'customers',
  'orders',
  'order_lines',
] as const;

// Commands
export { generateSalesHistory } from './commands/generate-sales-history';
export type { GenerateSalesHistoryDeps } from './commands/generate-sales-history';
export { backfillCatalogMetrics } from './commands/backfill-catalog-metrics';
export type { BackfillCatalogMetricsDeps } from './commands/backfill-catalog-metrics';

// Building blocks
export {
  createSimulationWindow,
  eachSimulatedDay,
  seasonalMultiplier,
  trendMultiplier,
  weekdayMultiplier,
  sampleDailyDemand,
  demandIntensity,
  dailyOrderCount,
} from './demand-curve';
export type { DemandSample } from './demand-curve';
export { sampleBasket, basketTotalCents, popularityOf } from './basket-sampler';
export { ensureMetrics, deriveRating, deriveEnergyEstimate, energyProfileFor } from './metric-backfill';
export type { MetricBackfillResult, MetricFault } from './metric-backfill';
export { ensureCatalog, ensureBuyerPool } from './bootstrap';
export { writeSalesHistory } from './batch-writer';
export type { BatchWriteStats } from './batch-writer';
export { runIsolated, classifyPersistFault } from './isolation';
export { createRng, mulberry32 } from './random';
export type { Rng } from './random';

// Persistence
export { getSalesSimStore, setSalesSimStore } from './store';
export type { SalesSimStore } from './store';
export { DrizzleSalesSimStore } from './drizzle-store';

// Validation
export { generateSalesHistorySchema, backfillCatalogMetricsSchema, parseIntegerFlag } from './validation';
export type { GenerateSalesHistoryInput, BackfillCatalogMetricsInput } from './validation';

export type * from './types';
