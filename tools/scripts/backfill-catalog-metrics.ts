/**
 * Backfill: fills catalog_items.rating and catalog_items.energy_kwh_per_year
 * where they are NULL. Safe to run repeatedly; values already set are kept.
 *
 * Usage:
 *   npx tsx tools/scripts/backfill-catalog-metrics.ts              # every item
 *   npx tsx tools/scripts/backfill-catalog-metrics.ts --limit=100
 *   npx tsx tools/scripts/backfill-catalog-metrics.ts --remote
 */
import dotenv from 'dotenv';
import { closeDb } from '@salesim/db';
import { logger, setLogLevel, getRuntimeConfig } from '@salesim/core';
import { backfillCatalogMetrics, parseIntegerFlag } from '@salesim/module-sales-sim';

const args = process.argv.slice(2);
const isRemote = args.includes('--remote');
const limitArg = args.find((a) => a.startsWith('--limit='))?.split('=')[1];

if (isRemote) {
  dotenv.config({ path: '.env.remote', override: true });
}
dotenv.config({ path: '.env.local' });
dotenv.config();

async function main() {
  setLogLevel(getRuntimeConfig().logLevel);
  const limit = parseIntegerFlag('limit', limitArg) ?? 0;
  console.log(`Backfilling catalog metrics on ${isRemote ? 'REMOTE' : 'LOCAL'} database...`);
  const result = await backfillCatalogMetrics({ limit }).finally(() => closeDb());
  console.log(`✓ Checked ${result.productsChecked} products, updated ${result.productsUpdated}`);
  if (result.metricFaults > 0) {
    console.log(`⚠ ${result.metricFaults} metrics could not be derived; they stay NULL for the next pass`);
  }
}

main().catch((err: unknown) => {
  logger.error('catalog metrics backfill failed', {
    error: { message: err instanceof Error ? err.message : String(err) },
  });
  process.exitCode = 1;
});
