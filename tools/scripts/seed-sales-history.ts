/**
 * Generates synthetic sales history (orders + order lines) on top of the demo
 * catalog and buyer pool, creating both when they are missing.
 *
 * Usage:
 *   npx tsx tools/scripts/seed-sales-history.ts
 *   npx tsx tools/scripts/seed-sales-history.ts --clean          # delete existing orders first
 *   npx tsx tools/scripts/seed-sales-history.ts --seed=20260224  # reproducible run
 *   npx tsx tools/scripts/seed-sales-history.ts --days=365
 *   npx tsx tools/scripts/seed-sales-history.ts --remote         # load .env.remote
 */
import dotenv from 'dotenv';
import { closeDb } from '@salesim/db';
import { logger, setLogLevel, getRuntimeConfig } from '@salesim/core';
import { formatMoney } from '@salesim/shared';
import { generateSalesHistory, parseIntegerFlag } from '@salesim/module-sales-sim';

// ── CLI Flags ──────────────────────────────────────────────────────
const args = process.argv.slice(2);
const cleanFirst = args.includes('--clean');
const isRemote = args.includes('--remote');
const seedArg = args.find((a) => a.startsWith('--seed='))?.split('=')[1];
const daysArg = args.find((a) => a.startsWith('--days='))?.split('=')[1];

if (isRemote) {
  dotenv.config({ path: '.env.remote', override: true });
}
dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  // The logger read LOG_LEVEL before dotenv ran.
  setLogLevel(getRuntimeConfig().logLevel);
  console.log(`\n══ Sales history seed (${isRemote ? 'REMOTE' : 'LOCAL'}) ══`);

  const summary = await generateSalesHistory({
    clearExisting: cleanFirst,
    seed: parseIntegerFlag('seed', seedArg),
    windowDays: parseIntegerFlag('days', daysArg),
  }).finally(() => closeDb());

  console.log(`✓ Window ${summary.startDate} → ${summary.endDate}`);
  console.log(`✓ ${summary.productsCount} products, ${summary.customersCount} buyers`);
  console.log(`✓ ${summary.totalOrders} orders, revenue ${formatMoney(summary.totalRevenueCents)}`);
  if (summary.failedOrders > 0 || summary.failedLineItems > 0) {
    console.log(
      `⚠ ${summary.failedOrders} orders and ${summary.failedLineItems} lines skipped ` +
        `(${JSON.stringify(summary.faultsByKind)})`,
    );
  }
}

main().catch((err: unknown) => {
  logger.error('sales history seed failed', {
    error: { message: err instanceof Error ? err.message : String(err) },
  });
  process.exitCode = 1;
});
