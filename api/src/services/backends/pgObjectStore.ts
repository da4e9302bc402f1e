/**
 * ObjectStore backed by the staged_objects table.
 */

import { eq } from 'drizzle-orm';
import type { Database } from '@/db/client';
import { stagedObjects } from '@/db/schema';
import type { ObjectStore, StoredObject } from './types';

const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

export class PgObjectStore implements ObjectStore {
  constructor(private readonly db: Database) {}

  async get(key: string): Promise<StoredObject | null> {
    const rows = await this.db.select().from(stagedObjects).where(eq(stagedObjects.key, key)).limit(1);
    const row = rows.at(0);
    if (!row) return null;
    return { body: row.body, contentType: row.contentType, metadata: row.metadata };
  }

  async put(
    key: string,
    body: Uint8Array,
    options: { contentType?: string; metadata?: Record<string, string> } = {},
  ): Promise<void> {
    const contentType = options.contentType ?? DEFAULT_CONTENT_TYPE;
    const metadata = options.metadata ?? {};
    await this.db
      .insert(stagedObjects)
      .values({ key, body, contentType, metadata })
      .onConflictDoUpdate({
        target: stagedObjects.key,
        set: { body, contentType, metadata, updatedAt: new Date() },
      });
  }

  async delete(key: string): Promise<void> {
    await this.db.delete(stagedObjects).where(eq(stagedObjects.key, key));
  }
}
