// ── Reference entities ──────────────────────────────────────────

export interface CatalogCategory {
  id: string;
  slug: string;
  name: string;
}

export interface Brand {
  id: string;
  name: string;
}

export interface Warranty {
  id: string;
  name: string;
  durationDays: number;
}

export interface CatalogItem {
  id: string;
  name: string;
  categoryId: string | null;
  categoryName: string | null;
  unitPriceCents: number;
  stockQuantity: number;
  imagePath: string | null;
  /** 0–5, two decimals. Write-once. */
  rating: number | null;
  /** Non-negative kWh/year. Write-once. */
  energyKwhPerYear: number | null;
}

/**
 * Relative popularity in [0, 1] keyed by catalog item id. Kept apart from the
 * items because it is a property of the simulation, not of the catalog.
 */
export type PopularityWeights = ReadonlyMap<string, number>;

export interface SalesCatalog {
  items: readonly CatalogItem[];
  weights: PopularityWeights;
}

export interface Buyer {
  id: string;
  username: string;
  role: 'buyer';
}

// ── Simulation ──────────────────────────────────────────────────

/** Inclusive range of UTC calendar days. `start` and `end` are midnights. */
export interface SimulationWindow {
  start: Date;
  end: Date;
  totalDays: number;
}

export interface BasketLine {
  item: CatalogItem;
  qty: number;
  /** Price captured at sale time; later catalog changes do not touch it. */
  unitPriceCents: number;
}

// ── Sales records ───────────────────────────────────────────────

export type OrderStatus = 'completed' | 'incomplete';

export interface OrderHeader {
  id: string;
  customerId: string;
  totalCents: number;
  status: OrderStatus;
  businessDate: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderLineRecord {
  id: string;
  orderId: string;
  catalogItemId: string;
  qty: number;
  unitPriceCents: number;
  lineTotalCents: number;
}

// ── Persistence outcomes ────────────────────────────────────────

export type PersistFaultKind = 'schema_mismatch' | 'constraint_violation' | 'connection' | 'unexpected';

export interface PersistFault {
  kind: PersistFaultKind;
  code?: string;
  message: string;
}

export type PersistOutcome<T> = { ok: true; value: T } | { ok: false; fault: PersistFault };

// ── Command results ─────────────────────────────────────────────

export interface SalesHistorySummary {
  totalOrders: number;
  /** Dollars, exact to the cent. */
  totalRevenue: number;
  totalRevenueCents: number;
  startDate: string;
  endDate: string;
  productsCount: number;
  customersCount: number;
  failedOrders: number;
  failedLineItems: number;
  stockUpdateFailures: number;
  timestampOverrideFailures: number;
  statusUpdateFailures: number;
  faultsByKind: Record<PersistFaultKind, number>;
}

export interface MetricsBackfillSummary {
  productsChecked: number;
  productsUpdated: number;
  metricFaults: number;
}
