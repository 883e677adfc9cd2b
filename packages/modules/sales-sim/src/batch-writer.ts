import type { Logger } from '@salesim/core';
import { atUtcTime, generateUlidAt, toIsoDate } from '@salesim/shared';
import { basketTotalCents, sampleBasket } from './basket-sampler';
import { eachSimulatedDay, sampleDailyDemand } from './demand-curve';
import { emptyFaultCounts, runIsolated } from './isolation';
import { pick, randInt, type Rng } from './random';
import type { SalesSimStore } from './store';
import type {
  BasketLine,
  Buyer,
  PersistFault,
  PersistFaultKind,
  SalesCatalog,
  SimulationWindow,
} from './types';

// Simulated orders land between 08:00 and 20:59 on their business day.
export const OPENING_HOUR = 8;
export const CLOSING_HOUR = 20;

export interface BatchWriterDeps {
  store: SalesSimStore;
  catalog: SalesCatalog;
  buyers: readonly Buyer[];
  window: SimulationWindow;
  rng: Rng;
  logger: Logger;
}

export interface BatchWriteStats {
  daysSimulated: number;
  ordersPersisted: number;
  ordersFailed: number;
  linesPersisted: number;
  linesFailed: number;
  stockUpdateFailures: number;
  timestampOverrideFailures: number;
  statusUpdateFailures: number;
  /** Sum of persisted order totals, integer cents. */
  revenueCents: number;
  faultsByKind: Record<PersistFaultKind, number>;
}

export function emptyBatchWriteStats(): BatchWriteStats {
  return {
    daysSimulated: 0,
    ordersPersisted: 0,
    ordersFailed: 0,
    linesPersisted: 0,
    linesFailed: 0,
    stockUpdateFailures: 0,
    timestampOverrideFailures: 0,
    statusUpdateFailures: 0,
    revenueCents: 0,
    faultsByKind: emptyFaultCounts(),
  };
}

function faultFields(fault: PersistFault) {
  return { error: { kind: fault.kind, code: fault.code, message: fault.message } };
}

/**
 * Walks the window day by day and persists the simulated orders. Each order
 * header, each line, each stock decrement and each timestamp fix is its own
 * unit of work: a failure is logged and counted and the walk goes on.
 */
export async function writeSalesHistory(deps: BatchWriterDeps): Promise<BatchWriteStats> {
  const stats = emptyBatchWriteStats();
  for (const day of eachSimulatedDay(deps.window)) {
    const demand = sampleDailyDemand(day, deps.window, deps.rng);
    const log = deps.logger.child({ businessDate: toIsoDate(day) });
    for (let n = 0; n < demand.count; n++) {
      await simulateOrder(deps, day, stats, log);
    }
    stats.daysSimulated++;
    log.debug('day simulated', { orders: demand.count, intensity: demand.intensity });
  }
  return stats;
}

async function simulateOrder(
  deps: BatchWriterDeps,
  day: Date,
  stats: BatchWriteStats,
  log: Logger,
): Promise<void> {
  const { store, rng } = deps;
  const buyer = pick(rng, deps.buyers);
  const basket = sampleBasket(deps.catalog, rng);
  const totalCents = basketTotalCents(basket);
  const placedAt = atUtcTime(day, randInt(rng, OPENING_HOUR, CLOSING_HOUR), randInt(rng, 0, 59));

  const header = await runIsolated(() =>
    store.createOrder({
      id: generateUlidAt(placedAt),
      customerId: buyer.id,
      totalCents,
      status: 'completed',
      businessDate: toIsoDate(day),
    }),
  );
  if (!header.ok) {
    stats.ordersFailed++;
    stats.faultsByKind[header.fault.kind]++;
    log.warn('order skipped', { customerId: buyer.id, ...faultFields(header.fault) });
    return;
  }
  const orderId = header.value.id;
  stats.ordersPersisted++;
  stats.revenueCents += totalCents;

  const stamped = await runIsolated(() => store.overrideOrderTimestamps(orderId, placedAt));
  if (!stamped.ok) {
    stats.timestampOverrideFailures++;
    stats.faultsByKind[stamped.fault.kind]++;
    log.warn('order timestamp not overridden', { orderId, ...faultFields(stamped.fault) });
  }

  let failedLines = 0;
  for (const line of basket) {
    if (!(await persistLine(store, orderId, line, stats, log))) failedLines++;
  }

  if (failedLines > 0) {
    const flagged = await runIsolated(() => store.setOrderStatus(orderId, 'incomplete'));
    if (!flagged.ok) {
      stats.statusUpdateFailures++;
      stats.faultsByKind[flagged.fault.kind]++;
      log.warn('order status not updated', { orderId, ...faultFields(flagged.fault) });
    }
  }
}

async function persistLine(
  store: SalesSimStore,
  orderId: string,
  line: BasketLine,
  stats: BatchWriteStats,
  log: Logger,
): Promise<boolean> {
  const created = await runIsolated(() =>
    store.createOrderLine({
      orderId,
      catalogItemId: line.item.id,
      qty: line.qty,
      unitPriceCents: line.unitPriceCents,
    }),
  );
  if (!created.ok) {
    stats.linesFailed++;
    stats.faultsByKind[created.fault.kind]++;
    log.warn('order line skipped', {
      orderId,
      catalogItemId: line.item.id,
      ...faultFields(created.fault),
    });
    return false;
  }
  stats.linesPersisted++;

  const stock = await runIsolated(() => store.decrementStock(line.item.id, line.qty));
  if (!stock.ok) {
    stats.stockUpdateFailures++;
    stats.faultsByKind[stock.fault.kind]++;
    log.warn('stock not decremented', {
      orderId,
      catalogItemId: line.item.id,
      ...faultFields(stock.fault),
    });
  }
  return true;
}
