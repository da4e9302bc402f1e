/**
 * Primary-store adapter. The retriever pushes the access predicate down
 * into its own query, so results come back already filtered.
 */

import type { AccessPredicate, CallerContext } from '@/types/documents';
import type { BackendAdapter, RetrievedDocument, VectorRetriever } from './types';

export class VectorStoreAdapter implements BackendAdapter {
  readonly name = 'knowledge_base';
  readonly sourceKind = 'PRIMARY_STORE';

  constructor(private readonly retriever: VectorRetriever) {}

  query(
    text: string,
    predicate: AccessPredicate,
    limit: number,
    _caller: CallerContext,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    return this.retriever.query(text, predicate, limit, signal);
  }
}
