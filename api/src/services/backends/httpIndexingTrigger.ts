/**
 * Starts an ingestion job on the secondary index after new content has
 * been staged.
 */

import { z } from 'zod';
import { withTimeout } from '@/utils/timeout';
import { DEFAULT_BACKEND_TIMEOUT_MS, type IndexingTrigger } from './types';

const jobResponseSchema = z.object({ job_id: z.string() });

export class HttpIndexingTrigger implements IndexingTrigger {
  constructor(
    private readonly url: string,
    private readonly apiKey?: string,
    private readonly timeoutMs: number = DEFAULT_BACKEND_TIMEOUT_MS,
  ) {}

  async startIngestionJob(description: string): Promise<{ jobId: string }> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;

    return withTimeout('indexing trigger', this.timeoutMs, async (signal) => {
      const response = await fetch(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({ description }),
        signal,
      });
      if (!response.ok) {
        throw new Error(`Indexing trigger error (${response.status}): ${await response.text()}`);
      }

      const { job_id } = jobResponseSchema.parse(await response.json());
      return { jobId: job_id };
    });
  }
}
