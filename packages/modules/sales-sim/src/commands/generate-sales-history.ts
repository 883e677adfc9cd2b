import { createLogger, getRuntimeConfig, type Logger, type RuntimeConfig } from '@salesim/core';
import {
  EmptyCatalogError,
  EmptyCustomerPoolError,
  SalesHistoryClearError,
  formatMoney,
  generateUlid,
  toDollars,
  toIsoDate,
} from '@salesim/shared';
import { writeSalesHistory } from '../batch-writer';
import { ensureBuyerPool, ensureCatalog } from '../bootstrap';
import { createSimulationWindow } from '../demand-curve';
import { createRng } from '../random';
import { getSalesSimStore, type SalesSimStore } from '../store';
import type { SalesHistorySummary } from '../types';
import { generateSalesHistorySchema, parseInput, type GenerateSalesHistoryInput } from '../validation';

export interface GenerateSalesHistoryDeps {
  store?: SalesSimStore;
  config?: RuntimeConfig;
  logger?: Logger;
  /** The instant the window ends on; defaults to the current time. */
  now?: Date;
}

/**
 * Generates a window of synthetic sales history on top of whatever is already
 * stored. With `clearExisting`, every existing order is deleted first; that step
 * is the only one whose failure aborts the run.
 */
export async function generateSalesHistory(
  input: GenerateSalesHistoryInput = {},
  deps: GenerateSalesHistoryDeps = {},
): Promise<SalesHistorySummary> {
  const params = parseInput(generateSalesHistorySchema, input);
  const config = deps.config ?? getRuntimeConfig();
  const store = deps.store ?? getSalesSimStore();
  const log = (deps.logger ?? createLogger()).child({ job: 'sales-sim', runId: generateUlid() });
  const seed = params.seed ?? config.seed;
  const rng = createRng(seed);
  const startedAt = Date.now();

  if (params.clearExisting) {
    try {
      const cleared = await store.clearSalesHistory();
      log.info('existing sales history cleared', { ...cleared });
    } catch (err) {
      throw new SalesHistoryClearError(err);
    }
  }

  const { catalog, metricFaults, imageFaults } = await ensureCatalog(store, {
    rng,
    mediaRoot: config.mediaRoot,
    logger: log,
  });
  const buyers = await ensureBuyerPool(store, {
    demoPassword: config.demoPassword,
    passwordRounds: config.passwordRounds,
    logger: log,
  });
  if (catalog.items.length === 0) throw new EmptyCatalogError();
  if (buyers.length === 0) throw new EmptyCustomerPoolError();

  const window = createSimulationWindow(deps.now ?? new Date(), params.windowDays ?? config.windowDays);
  log.info('generating sales history', {
    products: catalog.items.length,
    customers: buyers.length,
    startDate: toIsoDate(window.start),
    endDate: toIsoDate(window.end),
    seed,
    metricFaults,
    imageFaults,
  });

  const stats = await writeSalesHistory({ store, catalog, buyers, window, rng, logger: log });

  const summary: SalesHistorySummary = {
    totalOrders: stats.ordersPersisted,
    totalRevenue: toDollars(stats.revenueCents),
    totalRevenueCents: stats.revenueCents,
    startDate: toIsoDate(window.start),
    endDate: toIsoDate(window.end),
    productsCount: catalog.items.length,
    customersCount: buyers.length,
    failedOrders: stats.ordersFailed,
    failedLineItems: stats.linesFailed,
    stockUpdateFailures: stats.stockUpdateFailures,
    timestampOverrideFailures: stats.timestampOverrideFailures,
    statusUpdateFailures: stats.statusUpdateFailures,
    faultsByKind: stats.faultsByKind,
  };

  log.info('sales history generated', {
    ...summary,
    revenue: formatMoney(stats.revenueCents),
    durationMs: Date.now() - startedAt,
  });
  return summary;
}
