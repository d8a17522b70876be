// Loads a sales CSV into the `vendite` table.
// Usage: npm run ingest -- [path/to/sales.csv] [--dedupe]
import 'dotenv/config';
import { loadConfig } from '../src/config.js';
import { createPool } from '../src/db.js';
import { loadAndIngest } from '../src/services/sales-loader.js';
import { withSalesStore } from '../src/services/sales-store.js';

const args = process.argv.slice(2);
const config = loadConfig();
const source = args.find((arg) => !arg.startsWith('--')) ?? config.ingest.csvPath;
const dedupe = args.includes('--dedupe') || config.ingest.dedupe;

const pool = createPool(config.database);

try {
  const report = await withSalesStore(pool, async (store) => {
    await store.initialize();
    return loadAndIngest(store, source, { dedupe });
  });
  console.log(JSON.stringify(report, null, 2));
  if (report.rejected.length > 0) {
    process.exitCode = 2;
  }
} catch (error) {
  console.error('[ingest] failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
} finally {
  await pool.end();
}
