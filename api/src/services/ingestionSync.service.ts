/**
 * Ingestion Sync Service
 *
 * Copies documents from the secondary keyword index into the object
 * store that feeds the primary knowledge store. Each document's ACL is
 * normalized and flattened into canonical metadata, so the primary
 * store can enforce the same access rules through its filter predicate.
 *
 * Pipeline per document:
 *   ACL lookup -> normalize -> classify -> canonical metadata -> stage
 * followed by one indexing job for the whole batch.
 */

import { describeError } from '@/errors/gateway';
import { normalizeAcl, policyToMetadata } from '@/services/aclNormalizer.service';
import { classifyDocument } from '@/services/classification.service';
import type { IndexingTrigger, KeywordIndex, ObjectStore } from '@/services/backends/types';
import { logger as rootLogger, type Logger } from '@/utils/logger';
import type { AttributeValue, RawAttributes, SourceDocument, StagedDocument } from '@/types/documents';

export const SYNC_SOURCE = 'enterprise_search';

const STAGED_CONTENT_TYPE = 'text/plain; charset=utf-8';

export interface IngestionSyncDeps {
  index: KeywordIndex;
  store: ObjectStore;
  trigger: IndexingTrigger | null;
  prefix: string;
  log?: Logger;
  now?: () => Date;
}

export interface SyncReport {
  documentsListed: number;
  staged: number;
  skipped: number;
  failed: number;
  stagedKeys: string[];
  ingestionJobId: string | null;
}

// ── Attribute Helpers ──────────────────────────────────────────────────

function formatAttribute(value: AttributeValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  if (value instanceof Date) return value.toISOString().slice(0, 10);
  if (Array.isArray(value)) return value.join('|');
  return String(value);
}

/** First present attribute among `keys`, formatted as a string */
function attribute(raw: RawAttributes, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = formatAttribute(raw[key]);
    if (value !== undefined && value !== '') return value;
  }
  return undefined;
}

/** "https://contoso.example/sites/Finance/Shared/q1.docx" -> "Finance" */
export function extractSiteFromUri(uri: string): string {
  const marker = '/sites/';
  const at = uri.indexOf(marker);
  if (at === -1) return 'unknown';
  const site = uri.slice(at + marker.length).split('/')[0];
  return site || 'unknown';
}

/** "<clean title>_<first 8 chars of id>.txt" */
export function generateFilename(title: string, id: string): string {
  const cleanTitle = Array.from(title)
    .filter((ch) => /[\p{L}\p{N} _-]/u.test(ch))
    .join('')
    .trim()
    .replace(/ /g, '_');
  return `${cleanTitle || 'document'}_${id.slice(0, 8)}.txt`;
}

export function createMetadataHeader(metadata: Record<string, string>): string {
  return [
    `Title: ${metadata.title ?? ''}`,
    `Source: ${metadata.source ?? ''} (${metadata.site ?? ''})`,
    `Author: ${metadata.author ?? ''}`,
    `Created: ${metadata.created_date ?? ''}`,
    `Modified: ${metadata.modified_date ?? ''}`,
    `Department: ${metadata.department ?? ''}`,
    `Classification: ${metadata.classification ?? ''}`,
    '---',
  ].join('\n');
}

// ── Conversion ─────────────────────────────────────────────────────────

/**
 * Build the staged form of one source document.
 * `aclAttributes` is the dedicated ACL lookup result, when there was one.
 */
export function buildStagedDocument(
  document: SourceDocument,
  aclAttributes: RawAttributes | null,
  options: { prefix: string; today: string; log?: Logger },
): StagedDocument {
  const raw = document.attributes;
  const policy = normalizeAcl(aclAttributes ?? raw, { documentId: document.id, log: options.log });
  const { classification, department, createdBy } = classifyDocument({
    policy,
    pathHint: attribute(raw, ['path', 'file_path']),
    filenameHint: document.title,
  });

  const metadata: Record<string, string> = {
    source: SYNC_SOURCE,
    source_uri: document.uri,
    source_id: document.id,
    title: document.title,
    content_type: attribute(raw, ['content_type', 'ContentType']) ?? 'text/plain',
    created_date: attribute(raw, ['created_date', 'Created', '_created_at']) ?? options.today,
    modified_date: attribute(raw, ['modified_date', 'Modified', '_last_updated_at']) ?? options.today,
    author: attribute(raw, ['author', 'Author', '_authors']) ?? '',
    ...policyToMetadata(policy),
    classification,
    department,
    created_by: createdBy ?? attribute(raw, ['created_by']) ?? '',
    site: extractSiteFromUri(document.uri),
  };

  const filename = generateFilename(document.title, document.id);
  return {
    key: `${options.prefix}/${filename}`,
    filename,
    body: `${createMetadataHeader(metadata)}\n\n${document.content}`,
    metadata,
  };
}

async function lookupAcl(index: KeywordIndex, id: string, log: Logger): Promise<RawAttributes | null> {
  try {
    return await index.getDocumentAcl(id);
  } catch (error) {
    log.warn('ACL lookup failed, using listing attributes', { documentId: id, error: describeError(error) });
    return null;
  }
}

// ── Sync ───────────────────────────────────────────────────────────────

export async function runIngestionSync(deps: IngestionSyncDeps): Promise<SyncReport> {
  const log = (deps.log ?? rootLogger).child({ job: 'ingestion-sync' });
  const today = (deps.now ?? (() => new Date()))().toISOString().slice(0, 10);
  const encoder = new TextEncoder();

  const documents = await deps.index.listDocuments();
  log.info('Listed documents for sync', { count: documents.length });

  const report: SyncReport = {
    documentsListed: documents.length,
    staged: 0,
    skipped: 0,
    failed: 0,
    stagedKeys: [],
    ingestionJobId: null,
  };

  for (const document of documents) {
    if (!document.content.trim()) {
      report.skipped += 1;
      log.debug('Skipping document without content', { documentId: document.id });
      continue;
    }

    try {
      const acl = await lookupAcl(deps.index, document.id, log);
      const staged = buildStagedDocument(document, acl, { prefix: deps.prefix, today, log });
      await deps.store.put(staged.key, encoder.encode(staged.body), {
        contentType: STAGED_CONTENT_TYPE,
        metadata: staged.metadata,
      });
      report.staged += 1;
      report.stagedKeys.push(staged.key);
    } catch (error) {
      report.failed += 1;
      log.error('Failed to stage document', { documentId: document.id, error: describeError(error) });
    }
  }

  if (report.staged > 0) {
    if (deps.trigger) {
      const job = await deps.trigger.startIngestionJob(`Secondary index sync - ${new Date().toISOString()}`);
      report.ingestionJobId = job.jobId;
    } else {
      log.warn('No indexing trigger configured; staged content will be indexed on the next scheduled run');
    }
  }

  log.info('Ingestion sync finished', {
    listed: report.documentsListed,
    staged: report.staged,
    skipped: report.skipped,
    failed: report.failed,
    ingestionJobId: report.ingestionJobId,
  });
  return report;
}

// ── Scheduler ──────────────────────────────────────────────────────────

let syncTimer: NodeJS.Timeout | null = null;
let syncActive = false;

async function runScheduledSync(deps: IngestionSyncDeps, log: Logger): Promise<void> {
  if (syncActive) {
    log.warn('Previous ingestion sync still running, skipping this cycle');
    return;
  }
  syncActive = true;
  try {
    await runIngestionSync(deps);
  } finally {
    syncActive = false;
  }
}

/**
 * Run the sync every `intervalMinutes`, plus once at startup.
 * A non-positive interval leaves the scheduler off.
 */
export function startIngestionScheduler(deps: IngestionSyncDeps, intervalMinutes: number): void {
  if (intervalMinutes <= 0 || syncTimer) return;
  const log = deps.log ?? rootLogger;
  const intervalMs = intervalMinutes * 60 * 1000;

  syncTimer = setInterval(() => {
    runScheduledSync(deps, log).catch((error) => {
      log.error('Scheduled ingestion sync failed', { error: describeError(error) });
    });
  }, intervalMs);
  syncTimer.unref();

  runScheduledSync(deps, log).catch((error) => {
    log.error('Initial ingestion sync failed', { error: describeError(error) });
  });

  log.info('Ingestion sync scheduler started', { intervalMs });
}

export function stopIngestionScheduler(): void {
  if (!syncTimer) return;
  clearInterval(syncTimer);
  syncTimer = null;
  rootLogger.info('Ingestion sync scheduler stopped');
}

export function isIngestionSchedulerRunning(): boolean {
  return syncTimer !== null;
}
