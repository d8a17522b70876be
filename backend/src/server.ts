import 'dotenv/config';
import { loadConfig } from './config.js';
import { createPool } from './db.js';
import { createApp } from './app.js';
import { loadAndIngest } from './services/sales-loader.js';
import { withSalesStore } from './services/sales-store.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.database);

  try {
    await withSalesStore(pool, async (store) => {
      await store.initialize();
      if (!config.ingest.onStart) {
        return;
      }
      const report = await loadAndIngest(store, config.ingest.csvPath, { dedupe: config.ingest.dedupe });
      console.log(
        `[ingest] ${report.source}: ${report.inserted} inserted, ${report.duplicates} duplicates, ${report.rejected.length} rejected`
      );
    });
  } catch (error) {
    await pool.end();
    throw error;
  }

  const app = createApp({ db: pool, config });
  const server = app.listen(config.apiPort, () => {
    console.log(`[api] up on :${config.apiPort}`);
  });

  const shutdown = () => {
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[api] pool shutdown failed:', error);
          process.exit(1);
        }
      );
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[api] startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
