import { and, asc, eq, isNull, sql } from 'drizzle-orm';
import {
  db as defaultDb,
  catalogBrands,
  catalogCategories,
  catalogItems,
  catalogWarranties,
  customers,
  orderLines,
  orders,
  type Database,
} from '@salesim/db';
import { AppError, NotFoundError, centsToDecimal, parseCents } from '@salesim/shared';
import type {
  BuyerSeed,
  CatalogItemSeed,
  ClearedHistory,
  MetricPatch,
  NewOrder,
  NewOrderLine,
  SalesSimStore,
  StoredMetrics,
} from './store';
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

// ── Row mapping ─────────────────────────────────────────────────

const catalogItemColumns = {
  id: catalogItems.id,
  name: catalogItems.name,
  categoryId: catalogItems.categoryId,
  categoryName: catalogCategories.name,
  defaultPrice: catalogItems.defaultPrice,
  stockQuantity: catalogItems.stockQuantity,
  imagePath: catalogItems.imagePath,
  rating: catalogItems.rating,
  energyKwhPerYear: catalogItems.energyKwhPerYear,
};

interface CatalogItemRow {
  id: string;
  name: string;
  categoryId: string | null;
  categoryName: string | null;
  defaultPrice: string;
  stockQuantity: number;
  imagePath: string | null;
  rating: string | null;
  energyKwhPerYear: number | null;
}

function toCatalogItem(row: CatalogItemRow): CatalogItem {
  return {
    id: row.id,
    name: row.name,
    categoryId: row.categoryId,
    categoryName: row.categoryName,
    unitPriceCents: parseCents(row.defaultPrice),
    stockQuantity: row.stockQuantity,
    imagePath: row.imagePath,
    rating: row.rating === null ? null : Number(row.rating),
    energyKwhPerYear: row.energyKwhPerYear,
  };
}

function toOrderStatus(value: string): OrderStatus {
  return value === 'incomplete' ? 'incomplete' : 'completed';
}

function toOrderHeader(row: typeof orders.$inferSelect): OrderHeader {
  return {
    id: row.id,
    customerId: row.customerId,
    totalCents: row.total,
    status: toOrderStatus(row.status),
    businessDate: row.businessDate,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toBuyer(row: { id: string; username: string }): Buyer {
  return { id: row.id, username: row.username, role: 'buyer' };
}

function firstOrThrow<T>(rows: T[], entity: string, key: string): T {
  const [row] = rows;
  if (!row) {
    throw new NotFoundError(entity, key);
  }
  return row;
}

// ── Implementation ──────────────────────────────────────────────

export class DrizzleSalesSimStore implements SalesSimStore {
  constructor(private readonly db: Database = defaultDb) {}

  private selectCatalogItems() {
    return this.db
      .select(catalogItemColumns)
      .from(catalogItems)
      .leftJoin(catalogCategories, eq(catalogItems.categoryId, catalogCategories.id));
  }

  async listCatalogItems(limit?: number): Promise<CatalogItem[]> {
    const query = this.selectCatalogItems().orderBy(asc(catalogItems.createdAt), asc(catalogItems.id));
    const rows = limit === undefined ? await query : await query.limit(limit);
    return rows.map(toCatalogItem);
  }

  async getOrCreateCategory(input: { slug: string; name: string }): Promise<CatalogCategory> {
    await this.db
      .insert(catalogCategories)
      .values({ slug: input.slug, name: input.name })
      .onConflictDoNothing({ target: catalogCategories.slug });
    const rows = await this.db
      .select({ id: catalogCategories.id, slug: catalogCategories.slug, name: catalogCategories.name })
      .from(catalogCategories)
      .where(eq(catalogCategories.slug, input.slug))
      .limit(1);
    return firstOrThrow(rows, 'CatalogCategory', input.slug);
  }

  async getOrCreateBrand(name: string): Promise<Brand> {
    await this.db
      .insert(catalogBrands)
      .values({ name })
      .onConflictDoNothing({ target: catalogBrands.name });
    const rows = await this.db
      .select({ id: catalogBrands.id, name: catalogBrands.name })
      .from(catalogBrands)
      .where(eq(catalogBrands.name, name))
      .limit(1);
    return firstOrThrow(rows, 'Brand', name);
  }

  async getOrCreateWarranty(input: { name: string; durationDays: number }): Promise<Warranty> {
    await this.db
      .insert(catalogWarranties)
      .values({ name: input.name, durationDays: input.durationDays })
      .onConflictDoNothing({ target: catalogWarranties.name });
    const rows = await this.db
      .select({
        id: catalogWarranties.id,
        name: catalogWarranties.name,
        durationDays: catalogWarranties.durationDays,
      })
      .from(catalogWarranties)
      .where(eq(catalogWarranties.name, input.name))
      .limit(1);
    return firstOrThrow(rows, 'Warranty', input.name);
  }

  async listBrands(): Promise<Brand[]> {
    return this.db
      .select({ id: catalogBrands.id, name: catalogBrands.name })
      .from(catalogBrands)
      .orderBy(asc(catalogBrands.createdAt), asc(catalogBrands.id));
  }

  async listWarranties(): Promise<Warranty[]> {
    return this.db
      .select({
        id: catalogWarranties.id,
        name: catalogWarranties.name,
        durationDays: catalogWarranties.durationDays,
      })
      .from(catalogWarranties)
      .orderBy(asc(catalogWarranties.createdAt), asc(catalogWarranties.id));
  }

  async getOrCreateCatalogItem(seed: CatalogItemSeed): Promise<CatalogItem> {
    await this.db
      .insert(catalogItems)
      .values({
        name: seed.name,
        description: seed.description,
        defaultPrice: centsToDecimal(seed.unitPriceCents),
        categoryId: seed.categoryId,
        brandId: seed.brandId,
        warrantyId: seed.warrantyId,
        stockQuantity: seed.stockQuantity,
      })
      .onConflictDoNothing({ target: catalogItems.name });
    const rows = await this.selectCatalogItems().where(eq(catalogItems.name, seed.name)).limit(1);
    return toCatalogItem(firstOrThrow(rows, 'CatalogItem', seed.name));
  }

  async setImageIfMissing(itemId: string, imagePath: string): Promise<void> {
    await this.db
      .update(catalogItems)
      .set({ imagePath, updatedAt: new Date() })
      .where(and(eq(catalogItems.id, itemId), isNull(catalogItems.imagePath)));
  }

  async assignMissingMetrics(itemId: string, patch: MetricPatch): Promise<StoredMetrics> {
    return this.db.transaction(async (tx) => {
      // The IS NULL guards make each write a compare-and-set: a concurrent
      // backfill that got there first wins and this one becomes a no-op.
      if (patch.rating !== undefined) {
        await tx
          .update(catalogItems)
          .set({ rating: patch.rating.toFixed(2), updatedAt: new Date() })
          .where(and(eq(catalogItems.id, itemId), isNull(catalogItems.rating)));
      }
      if (patch.energyKwhPerYear !== undefined) {
        await tx
          .update(catalogItems)
          .set({ energyKwhPerYear: patch.energyKwhPerYear, updatedAt: new Date() })
          .where(and(eq(catalogItems.id, itemId), isNull(catalogItems.energyKwhPerYear)));
      }
      const rows = await tx
        .select({ rating: catalogItems.rating, energyKwhPerYear: catalogItems.energyKwhPerYear })
        .from(catalogItems)
        .where(eq(catalogItems.id, itemId))
        .limit(1);
      const row = firstOrThrow(rows, 'CatalogItem', itemId);
      return {
        rating: row.rating === null ? null : Number(row.rating),
        energyKwhPerYear: row.energyKwhPerYear,
      };
    });
  }

  async listBuyers(limit: number): Promise<Buyer[]> {
    const rows = await this.db
      .select({ id: customers.id, username: customers.username })
      .from(customers)
      .where(eq(customers.role, 'buyer'))
      .orderBy(asc(customers.createdAt), asc(customers.id))
      .limit(limit);
    return rows.map(toBuyer);
  }

  async getOrCreateBuyer(seed: BuyerSeed): Promise<Buyer> {
    await this.db
      .insert(customers)
      .values({
        username: seed.username,
        email: seed.email,
        firstName: seed.firstName,
        lastName: seed.lastName,
        passwordHash: seed.passwordHash,
        role: 'buyer',
      })
      .onConflictDoNothing({ target: customers.username });
    const rows = await this.db
      .select({ id: customers.id, username: customers.username })
      .from(customers)
      .where(eq(customers.username, seed.username))
      .limit(1);
    return toBuyer(firstOrThrow(rows, 'Customer', seed.username));
  }

  async createOrder(order: NewOrder): Promise<OrderHeader> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx
        .insert(orders)
        .values({
          id: order.id,
          customerId: order.customerId,
          total: order.totalCents,
          status: order.status,
          businessDate: order.businessDate,
        })
        .returning();
      if (!created) {
        throw new AppError('ORDER_NOT_CREATED', `Order ${order.id} was not returned by insert`, 500);
      }
      return toOrderHeader(created);
    });
  }

  async overrideOrderTimestamps(orderId: string, at: Date): Promise<void> {
    const updated = await this.db
      .update(orders)
      .set({ createdAt: at, updatedAt: at })
      .where(eq(orders.id, orderId))
      .returning({ id: orders.id });
    firstOrThrow(updated, 'Order', orderId);
  }

  async setOrderStatus(orderId: string, status: OrderStatus): Promise<void> {
    const updated = await this.db
      .update(orders)
      .set({ status })
      .where(eq(orders.id, orderId))
      .returning({ id: orders.id });
    firstOrThrow(updated, 'Order', orderId);
  }

  async createOrderLine(line: NewOrderLine): Promise<OrderLineRecord> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx
        .insert(orderLines)
        .values({
          orderId: line.orderId,
          catalogItemId: line.catalogItemId,
          qty: line.qty,
          unitPrice: line.unitPriceCents,
          lineTotal: line.unitPriceCents * line.qty,
        })
        .returning();
      if (!created) {
        throw new AppError('ORDER_LINE_NOT_CREATED', `Line for order ${line.orderId} was not returned by insert`, 500);
      }
      return {
        id: created.id,
        orderId: created.orderId,
        catalogItemId: created.catalogItemId,
        qty: created.qty,
        unitPriceCents: created.unitPrice,
        lineTotalCents: created.lineTotal,
      };
    });
  }

  async decrementStock(itemId: string, qty: number): Promise<number> {
    const updated = await this.db
      .update(catalogItems)
      .set({
        stockQuantity: sql`GREATEST(${catalogItems.stockQuantity} - ${qty}, 0)`,
        updatedAt: new Date(),
      })
      .where(eq(catalogItems.id, itemId))
      .returning({ stockQuantity: catalogItems.stockQuantity });
    return firstOrThrow(updated, 'CatalogItem', itemId).stockQuantity;
  }

  async clearSalesHistory(): Promise<ClearedHistory> {
    return this.db.transaction(async (tx) => {
      const lines = await tx.delete(orderLines).returning({ id: orderLines.id });
      const removed = await tx.delete(orders).returning({ id: orders.id });
      return { ordersDeleted: removed.length, linesDeleted: lines.length };
    });
  }
}
