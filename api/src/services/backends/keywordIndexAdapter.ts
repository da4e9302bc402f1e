/**
 * Secondary-index adapter.
 *
 * With a caller token the index enforces its own ACLs and results are
 * trusted as returned. Without one the predicate is sent as an attribute
 * filter and re-applied here, since not every index honours it.
 */

import { matchesAccessPredicate } from '@/services/accessFilter.service';
import { policyToMetadata } from '@/services/aclNormalizer.service';
import type { AccessPredicate, CallerContext, DocumentMetadata } from '@/types/documents';
import type { BackendAdapter, KeywordIndex, RetrievedDocument } from './types';

/** Canonical access fields derived from the policy take precedence over raw metadata */
export function accessMetadataFor(document: RetrievedDocument): DocumentMetadata {
  const merged: DocumentMetadata = { ...document.metadata };
  for (const [field, value] of Object.entries(policyToMetadata(document.accessPolicy))) {
    if (value) merged[field] = value;
  }
  return merged;
}

export class KeywordIndexAdapter implements BackendAdapter {
  readonly name = 'enterprise_search';
  readonly sourceKind = 'SECONDARY_INDEX';

  constructor(private readonly index: KeywordIndex) {}

  async query(
    text: string,
    predicate: AccessPredicate,
    limit: number,
    caller: CallerContext,
    signal?: AbortSignal,
  ): Promise<RetrievedDocument[]> {
    const callerToken = caller.userToken?.trim();
    if (callerToken) {
      return this.index.query(text, { kind: 'token', callerToken }, limit, signal);
    }

    const documents = await this.index.query(text, { kind: 'attributes', filter: predicate }, limit, signal);
    return documents.filter((document) => matchesAccessPredicate(predicate, accessMetadataFor(document)));
  }
}
