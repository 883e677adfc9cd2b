import { createLogger, type Logger } from '@salesim/core';
import { ensureMetrics } from '../metric-backfill';
import { createRng } from '../random';
import { getSalesSimStore, type SalesSimStore } from '../store';
import type { MetricsBackfillSummary } from '../types';
import {
  backfillCatalogMetricsSchema,
  parseInput,
  type BackfillCatalogMetricsInput,
} from '../validation';

export interface BackfillCatalogMetricsDeps {
  store?: SalesSimStore;
  logger?: Logger;
}

/** Maintenance pass: fills missing rating/energy metrics on existing catalog items. */
export async function backfillCatalogMetrics(
  input: BackfillCatalogMetricsInput = {},
  deps: BackfillCatalogMetricsDeps = {},
): Promise<MetricsBackfillSummary> {
  const params = parseInput(backfillCatalogMetricsSchema, input);
  const store = deps.store ?? getSalesSimStore();
  const log = (deps.logger ?? createLogger()).child({ job: 'catalog-metrics-backfill' });
  const rng = createRng(params.seed);

  const items = await store.listCatalogItems(params.limit === 0 ? undefined : params.limit);
  let productsUpdated = 0;
  let metricFaults = 0;
  for (const item of items) {
    const result = await ensureMetrics(store, item, { rng });
    if (result.updated) productsUpdated++;
    for (const fault of result.faults) {
      metricFaults++;
      log.warn('metric backfill skipped', {
        catalogItemId: item.id,
        field: fault.field,
        error: { kind: fault.stage, message: fault.message },
      });
    }
  }

  const summary = { productsChecked: items.length, productsUpdated, metricFaults };
  log.info('catalog metrics backfilled', { ...summary });
  return summary;
}
