import type {
  Brand,
  Buyer,
  CatalogCategory,
  CatalogItem,
  OrderHeader,
  OrderLineRecord,
  OrderStatus,
  Warranty,
} from './types';
import { DrizzleSalesSimStore } from './drizzle-store';

// ── Inputs ──────────────────────────────────────────────────────

export interface CatalogItemSeed {
  name: string;
  description: string | null;
  unitPriceCents: number;
  categoryId: string | null;
  brandId: string | null;
  warrantyId: string | null;
  stockQuantity: number;
}

export interface BuyerSeed {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
}

export interface NewOrder {
  id: string;
  customerId: string;
  totalCents: number;
  status: OrderStatus;
  businessDate: string;
}

export interface NewOrderLine {
  orderId: string;
  catalogItemId: string;
  qty: number;
  unitPriceCents: number;
}

export interface MetricPatch {
  rating?: number;
  energyKwhPerYear?: number;
}

export interface StoredMetrics {
  rating: number | null;
  energyKwhPerYear: number | null;
}

export interface ClearedHistory {
  ordersDeleted: number;
  linesDeleted: number;
}

// ── Interface ───────────────────────────────────────────────────

/**
 * Persistence boundary of the generator. Every write is its own unit of work:
 * callers wrap calls in `runIsolated` and a failed call leaves nothing behind.
 */
export interface SalesSimStore {
  /** Oldest first. `limit` of undefined returns every item. */
  listCatalogItems(limit?: number): Promise<CatalogItem[]>;
  getOrCreateCategory(input: { slug: string; name: string }): Promise<CatalogCategory>;
  getOrCreateBrand(name: string): Promise<Brand>;
  getOrCreateWarranty(input: { name: string; durationDays: number }): Promise<Warranty>;
  listBrands(): Promise<Brand[]>;
  listWarranties(): Promise<Warranty[]>;
  /** Looks the item up by name; only inserts when it does not exist yet. */
  getOrCreateCatalogItem(seed: CatalogItemSeed): Promise<CatalogItem>;
  setImageIfMissing(itemId: string, imagePath: string): Promise<void>;
  /**
   * Writes each provided metric only where the stored value is still null and
   * returns what is stored afterwards.
   */
  assignMissingMetrics(itemId: string, patch: MetricPatch): Promise<StoredMetrics>;

  listBuyers(limit: number): Promise<Buyer[]>;
  getOrCreateBuyer(seed: BuyerSeed): Promise<Buyer>;

  createOrder(order: NewOrder): Promise<OrderHeader>;
  /** Sets created/updated timestamps directly, bypassing the column defaults. */
  overrideOrderTimestamps(orderId: string, at: Date): Promise<void>;
  setOrderStatus(orderId: string, status: OrderStatus): Promise<void>;
  createOrderLine(line: NewOrderLine): Promise<OrderLineRecord>;
  /** Decrements stock by `qty`, floored at zero. Returns the new stock. */
  decrementStock(itemId: string, qty: number): Promise<number>;

  /** Deletes every order and order line in one atomic scope. */
  clearSalesHistory(): Promise<ClearedHistory>;
}

// ── Singleton ───────────────────────────────────────────────────

let _store: SalesSimStore | null = null;

export function getSalesSimStore(): SalesSimStore {
  if (!_store) {
    _store = new DrizzleSalesSimStore();
  }
  return _store;
}

export function setSalesSimStore(store: SalesSimStore | null): void {
  _store = store;
}
