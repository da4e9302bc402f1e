/**
 * Ingestion Validation Schemas
 */

import { z } from 'zod';

/**
 * POST /v1/ingestion/pdf
 * { "key": "uploads/annual-report.pdf" }
 */
export const pdfRequestSchema = z
  .object({
    key: z.string().trim().min(1, 'key is required').max(1024),
  })
  .strict();

export type PdfRequest = z.infer<typeof pdfRequestSchema>;
