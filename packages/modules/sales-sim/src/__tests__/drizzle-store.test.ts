import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NotFoundError } from '@salesim/shared';

// ── Hoisted mocks ─────────────────────────────────────────────────────

const { mockDb } = vi.hoisted(() => ({
  mockDb: {
    insert: vi.fn(),
    select: vi.fn(),
    update: vi.fn(),
    delete: vi.fn(),
    transaction: vi.fn(),
  },
}));

vi.mock('@salesim/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@salesim/db')>();
  return { ...actual, db: mockDb };
});

import { DrizzleSalesSimStore } from '../drizzle-store';

// ── Mock chain builder ──────────────────────────────────────────────

// Every builder step returns the chain itself; awaiting it at any point
// resolves to `result`.
function chain(result: unknown) {
  const p = Promise.resolve(result);
  const c = {
    from: vi.fn(),
    leftJoin: vi.fn(),
    where: vi.fn(),
    orderBy: vi.fn(),
    limit: vi.fn(),
    values: vi.fn(),
    set: vi.fn(),
    returning: vi.fn(),
    onConflictDoNothing: vi.fn(),
    then: p.then.bind(p),
    catch: p.catch.bind(p),
  };
  for (const step of [
    c.from,
    c.leftJoin,
    c.where,
    c.orderBy,
    c.limit,
    c.values,
    c.set,
    c.returning,
    c.onConflictDoNothing,
  ]) {
    step.mockReturnValue(c);
  }
  return c;
}

const itemRow = {
  id: 'item-1',
  name: 'No Frost Refrigerator 320L',
  categoryId: 'cat-1',
  categoryName: 'Refrigerators',
  defaultPrice: '1500.00',
  stockQuantity: 42,
  imagePath: null,
  rating: '4.35',
  energyKwhPerYear: 410,
};

const orderRow = {
  id: '01HX0000000000000000000000',
  customerId: 'cust-1',
  total: 301_998,
  status: 'completed',
  source: 'sales_sim',
  businessDate: '2024-06-15',
  createdAt: new Date('2024-06-15T09:30:00Z'),
  updatedAt: new Date('2024-06-15T09:30:00Z'),
};

describe('DrizzleSalesSimStore', () => {
  let store: DrizzleSalesSimStore;

  beforeEach(() => {
    vi.resetAllMocks();
    mockDb.transaction.mockImplementation(async (cb: (tx: typeof mockDb) => Promise<unknown>) => cb(mockDb));
    store = new DrizzleSalesSimStore();
  });

  describe('listCatalogItems', () => {
    it('converts numeric columns into cents and numbers', async () => {
      const select = chain([itemRow, { ...itemRow, id: 'item-2', defaultPrice: '89.9', rating: null }]);
      mockDb.select.mockReturnValue(select);

      const items = await store.listCatalogItems();

      expect(items).toEqual([
        {
          id: 'item-1',
          name: 'No Frost Refrigerator 320L',
          categoryId: 'cat-1',
          categoryName: 'Refrigerators',
          unitPriceCents: 150_000,
          stockQuantity: 42,
          imagePath: null,
          rating: 4.35,
          energyKwhPerYear: 410,
        },
        expect.objectContaining({ id: 'item-2', unitPriceCents: 8_990, rating: null }),
      ]);
      expect(select.limit).not.toHaveBeenCalled();
    });

    it('applies the limit when one is given', async () => {
      const select = chain([itemRow]);
      mockDb.select.mockReturnValue(select);

      await store.listCatalogItems(30);

      expect(select.limit).toHaveBeenCalledWith(30);
    });
  });

  describe('getOrCreateCatalogItem', () => {
    it('inserts with a decimal price and reads the row back', async () => {
      const insert = chain(undefined);
      mockDb.insert.mockReturnValue(insert);
      mockDb.select.mockReturnValue(chain([itemRow]));

      const item = await store.getOrCreateCatalogItem({
        name: itemRow.name,
        description: null,
        unitPriceCents: 150_000,
        categoryId: 'cat-1',
        brandId: null,
        warrantyId: null,
        stockQuantity: 42,
      });

      expect(insert.values).toHaveBeenCalledWith(expect.objectContaining({ defaultPrice: '1500.00' }));
      expect(insert.onConflictDoNothing).toHaveBeenCalledTimes(1);
      expect(item.unitPriceCents).toBe(150_000);
    });

    it('throws when the row cannot be read back', async () => {
      mockDb.insert.mockReturnValue(chain(undefined));
      mockDb.select.mockReturnValue(chain([]));

      await expect(store.getOrCreateBrand('HomeTech')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('createOrder', () => {
    it('writes the header inside its own transaction', async () => {
      const insert = chain([orderRow]);
      mockDb.insert.mockReturnValue(insert);

      const header = await store.createOrder({
        id: orderRow.id,
        customerId: 'cust-1',
        totalCents: 301_998,
        status: 'completed',
        businessDate: '2024-06-15',
      });

      expect(mockDb.transaction).toHaveBeenCalledTimes(1);
      expect(insert.values).toHaveBeenCalledWith({
        id: orderRow.id,
        customerId: 'cust-1',
        total: 301_998,
        status: 'completed',
        businessDate: '2024-06-15',
      });
      expect(header).toEqual({
        id: orderRow.id,
        customerId: 'cust-1',
        totalCents: 301_998,
        status: 'completed',
        businessDate: '2024-06-15',
        createdAt: orderRow.createdAt,
        updatedAt: orderRow.updatedAt,
      });
    });

    it('reads unknown statuses as completed', async () => {
      mockDb.insert.mockReturnValue(chain([{ ...orderRow, status: 'legacy' }]));

      const header = await store.createOrder({
        id: orderRow.id,
        customerId: 'cust-1',
        totalCents: 1,
        status: 'completed',
        businessDate: '2024-06-15',
      });

      expect(header.status).toBe('completed');
    });
  });

  describe('createOrderLine', () => {
    it('stores the extended line total', async () => {
      const insert = chain([
        { id: 'line-1', orderId: 'order-1', catalogItemId: 'item-1', qty: 2, unitPrice: 2_999, lineTotal: 5_998 },
      ]);
      mockDb.insert.mockReturnValue(insert);

      const line = await store.createOrderLine({
        orderId: 'order-1',
        catalogItemId: 'item-1',
        qty: 2,
        unitPriceCents: 2_999,
      });

      expect(insert.values).toHaveBeenCalledWith({
        orderId: 'order-1',
        catalogItemId: 'item-1',
        qty: 2,
        unitPrice: 2_999,
        lineTotal: 5_998,
      });
      expect(line).toEqual({
        id: 'line-1',
        orderId: 'order-1',
        catalogItemId: 'item-1',
        qty: 2,
        unitPriceCents: 2_999,
        lineTotalCents: 5_998,
      });
    });
  });

  describe('updates', () => {
    it('returns the stock left after a decrement', async () => {
      mockDb.update.mockReturnValue(chain([{ stockQuantity: 0 }]));

      await expect(store.decrementStock('item-1', 3)).resolves.toBe(0);
    });

    it('throws NotFoundError when the item is gone', async () => {
      mockDb.update.mockReturnValue(chain([]));

      await expect(store.decrementStock('missing', 1)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('throws NotFoundError when overriding timestamps of a missing order', async () => {
      mockDb.update.mockReturnValue(chain([]));

      await expect(store.overrideOrderTimestamps('missing', new Date())).rejects.toBeInstanceOf(NotFoundError);
    });

    it('sets both timestamps to the simulated instant', async () => {
      const update = chain([{ id: 'order-1' }]);
      mockDb.update.mockReturnValue(update);
      const at = new Date('2023-12-24T18:05:00Z');

      await store.overrideOrderTimestamps('order-1', at);

      expect(update.set).toHaveBeenCalledWith({ createdAt: at, updatedAt: at });
    });
  });

  describe('assignMissingMetrics', () => {
    it('only issues the writes the patch asks for', async () => {
      const update = chain(undefined);
      mockDb.update.mockReturnValue(update);
      mockDb.select.mockReturnValue(chain([{ rating: '3.70', energyKwhPerYear: 120 }]));

      const stored = await store.assignMissingMetrics('item-1', { rating: 3.7 });

      expect(mockDb.update).toHaveBeenCalledTimes(1);
      expect(update.set).toHaveBeenCalledWith(expect.objectContaining({ rating: '3.70' }));
      expect(stored).toEqual({ rating: 3.7, energyKwhPerYear: 120 });
    });
  });

  describe('clearSalesHistory', () => {
    it('deletes lines before headers in one transaction', async () => {
      const lines = chain([{ id: 'l1' }, { id: 'l2' }, { id: 'l3' }]);
      const headers = chain([{ id: 'o1' }]);
      mockDb.delete.mockReturnValueOnce(lines).mockReturnValueOnce(headers);

      const cleared = await store.clearSalesHistory();

      expect(mockDb.transaction).toHaveBeenCalledTimes(1);
      expect(cleared).toEqual({ ordersDeleted: 1, linesDeleted: 3 });
    });

    it('propagates a failed delete', async () => {
      mockDb.delete.mockImplementation(() => {
        throw new Error('connection lost');
      });

      await expect(store.clearSalesHistory()).rejects.toThrow('connection lost');
    });
  });
});
