import { pgTable, text, timestamp, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { generateUlid } from '@salesim/shared';

// ── Customers ───────────────────────────────────────────────────
export const customers = pgTable(
  'customers',
  {
    id: text('id').primaryKey().$defaultFn(generateUlid),
    username: text('username').notNull(),
    email: text('email'),
    firstName: text('first_name'),
    lastName: text('last_name'),
    passwordHash: text('password_hash'),
    role: text('role').notNull().default('buyer'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_customers_username').on(table.username),
    index('idx_customers_role').on(table.role),
  ],
);
