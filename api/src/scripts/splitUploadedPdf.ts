/**
 * Split (or move) one uploaded PDF in the object store.
 *
 * Usage:
 *   cd api
 *   npx tsx src/scripts/splitUploadedPdf.ts input/annual-report.pdf
 *
 * Required env:
 *   DATABASE_URL
 * Optional env:
 *   PDF_MAX_PAGES (default 20)
 */

import 'dotenv/config';
import { createObjectStore } from '@/bootstrap';
import { loadEnv } from '@/config/env';
import { closeDatabase } from '@/db/client';
import { processUploadedPdf } from '@/services/pdfChunking.service';
import { logger } from '@/utils/logger';

async function main(): Promise<void> {
  const key = process.argv[2];
  if (!key) {
    console.error('Usage: splitUploadedPdf.ts <object-key>');
    process.exit(1);
  }

  const env = loadEnv();
  const store = createObjectStore(env);
  if (!store) {
    logger.error('PDF processing requires DATABASE_URL');
    process.exit(1);
  }

  const report = await processUploadedPdf(store, key, { maxPages: env.PDF_MAX_PAGES });
  console.log(JSON.stringify(report, null, 2));
  await closeDatabase();
}

main().catch(async (error) => {
  logger.error('PDF processing failed', { error: String(error) });
  await closeDatabase();
  process.exit(1);
});
