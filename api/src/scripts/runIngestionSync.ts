/**
 * Run one ingestion sync from the secondary keyword index into the
 * object store, then request an indexing job.
 *
 * Usage:
 *   cd api
 *   npx tsx src/scripts/runIngestionSync.ts
 *
 * Required env:
 *   DATABASE_URL, KEYWORD_INDEX_URL
 * Optional env:
 *   INDEXING_TRIGGER_URL, SYNC_PREFIX
 */

import 'dotenv/config';
import { createRuntime } from '@/bootstrap';
import { loadEnv } from '@/config/env';
import { closeDatabase } from '@/db/client';
import { runIngestionSync } from '@/services/ingestionSync.service';
import { logger } from '@/utils/logger';

async function main(): Promise<void> {
  const env = loadEnv();
  const { syncDeps } = createRuntime(env);
  if (!syncDeps) {
    logger.error('Ingestion sync requires KEYWORD_INDEX_URL and DATABASE_URL');
    process.exit(1);
  }

  const report = await runIngestionSync(syncDeps);
  console.log(JSON.stringify(report, null, 2));
  await closeDatabase();
}

main().catch(async (error) => {
  logger.error('Ingestion sync failed', { error: String(error) });
  await closeDatabase();
  process.exit(1);
});
