import {
  pgTable,
  text,
  timestamp,
  integer,
  date,
  index,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { generateUlid } from '@salesim/shared';
import { customers } from './customers';
import { catalogItems } from './catalog';

// ── Orders ──────────────────────────────────────────────────────
// Money columns are integer cents.
export const orders = pgTable(
  'orders',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    customerId: text('customer_id')
      .notNull()
      .references(() => customers.id),
    status: text('status').notNull().default('completed'),
    source: text('source').notNull().default('sales_sim'),
    total: integer('total').notNull().default(0),
    businessDate: date('business_date').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_orders_business_date').on(table.businessDate),
    index('idx_orders_customer').on(table.customerId),
  ],
);

// ── Order Lines ─────────────────────────────────────────────────
export const orderLines = pgTable(
  'order_lines',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    orderId: text('order_id')
      .notNull()
      .references(() => orders.id, { onDelete: 'cascade' }),
    catalogItemId: text('catalog_item_id')
      .notNull()
      .references(() => catalogItems.id),
    qty: integer('qty').notNull(),
    unitPrice: integer('unit_price').notNull(),
    lineTotal: integer('line_total').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_order_lines_order').on(table.orderId),
    index('idx_order_lines_item').on(table.catalogItemId),
    check('chk_order_lines_qty_positive', sql`${table.qty} > 0`),
  ],
);
