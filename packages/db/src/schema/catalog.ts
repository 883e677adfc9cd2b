import {
  pgTable,
  text,
  timestamp,
  numeric,
  integer,
  doublePrecision,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { generateUlid } from '@salesim/shared';

// ── Catalog Categories ──────────────────────────────────────────
export const catalogCategories = pgTable(
  'catalog_categories',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    slug: text('slug').notNull(),
    name: text('name').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_catalog_categories_slug').on(table.slug)],
);

// ── Brands ──────────────────────────────────────────────────────
export const catalogBrands = pgTable(
  'catalog_brands',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    name: text('name').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_catalog_brands_name').on(table.name)],
);

// ── Warranties ──────────────────────────────────────────────────
export const catalogWarranties = pgTable(
  'catalog_warranties',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    name: text('name').notNull(),
    durationDays: integer('duration_days').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_catalog_warranties_name').on(table.name)],
);

// ── Catalog Items ───────────────────────────────────────────────
// rating and energy_kwh_per_year are write-once: backfills only ever set them
// WHERE they are still NULL.
export const catalogItems = pgTable(
  'catalog_items',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    categoryId: text('category_id').references(() => catalogCategories.id),
    brandId: text('brand_id').references(() => catalogBrands.id),
    warrantyId: text('warranty_id').references(() => catalogWarranties.id),
    name: text('name').notNull(),
    description: text('description'),
    defaultPrice: numeric('default_price', { precision: 10, scale: 2 }).notNull(),
    stockQuantity: integer('stock_quantity').notNull().default(0),
    imagePath: text('image_path'),
    rating: numeric('rating', { precision: 3, scale: 2 }),
    energyKwhPerYear: doublePrecision('energy_kwh_per_year'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_catalog_items_name').on(table.name),
    index('idx_catalog_items_category').on(table.categoryId),
    check('chk_catalog_items_stock_non_negative', sql`${table.stockQuantity} >= 0`),
    check(
      'chk_catalog_items_rating_range',
      sql`${table.rating} IS NULL OR (${table.rating} >= 0 AND ${table.rating} <= 5)`,
    ),
    check(
      'chk_catalog_items_energy_non_negative',
      sql`${table.energyKwhPerYear} IS NULL OR ${table.energyKwhPerYear} >= 0`,
    ),
  ],
);
