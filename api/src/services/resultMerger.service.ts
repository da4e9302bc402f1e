/**
 * Hybrid Result Merger
 *
 * Combines per-backend outcomes into one ranked, authorized list.
 *
 * Steps, in order:
 *   1. concatenate in backend order, tagging each hit with its source kind
 *   2. drop duplicates (same source kind + id); the first occurrence stays
 *   3. drop documents whose deny sets name the caller or one of their groups
 *   4. stable sort by score, descending
 *   5. truncate to the limit
 *
 * Scores are compared as returned. Similarity and keyword-confidence
 * scales differ, so interleaving across backends is approximate.
 */

import { isCallerDenied } from '@/services/aclNormalizer.service';
import type { BackendOutcome } from '@/services/backends/types';
import type {
  BackendProvenance,
  CallerContext,
  MergedResultSet,
  ScoredDocument,
} from '@/types/documents';

export function mergeResults(
  outcomes: readonly BackendOutcome[],
  caller: CallerContext,
  limit: number,
): MergedResultSet {
  const seen = new Set<string>();
  const authorized: ScoredDocument[] = [];
  const provenance: MergedResultSet['provenance'] = {};

  for (const outcome of outcomes) {
    const stats: BackendProvenance = provenance[outcome.sourceKind] ?? { returned: 0, denied: 0, kept: 0 };
    if (outcome.error) stats.error = outcome.error;

    for (const document of outcome.documents) {
      stats.returned += 1;
      const identity = `${outcome.sourceKind}:${document.id}`;
      if (seen.has(identity)) continue;
      seen.add(identity);

      if (isCallerDenied(document.accessPolicy, caller)) {
        stats.denied += 1;
        continue;
      }

      stats.kept += 1;
      authorized.push({ ...document, sourceKind: outcome.sourceKind });
    }

    provenance[outcome.sourceKind] = stats;
  }

  // Array.prototype.sort is stable, so equal scores keep backend order.
  authorized.sort((a, b) => b.score - a.score);

  return {
    documents: authorized.slice(0, Math.max(0, limit)),
    total: authorized.length,
    provenance,
  };
}
