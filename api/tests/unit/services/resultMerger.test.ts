import { describe, it, expect } from 'vitest';
import { mergeResults } from '@/services/resultMerger.service';
import type { BackendOutcome } from '@/services/backends/types';
import type { CallerContext } from '@/types/documents';
import { makeDocument, makePolicy } from '../../helpers/fakes';

const caller: CallerContext = { userId: 'a@x.com', groups: ['finance', 'contractors'] };

function primary(documents: BackendOutcome['documents'], error?: string): BackendOutcome {
  return { backend: 'knowledge_base', sourceKind: 'PRIMARY_STORE', documents, error };
}

function secondary(documents: BackendOutcome['documents'], error?: string): BackendOutcome {
  return { backend: 'enterprise_search', sourceKind: 'SECONDARY_INDEX', documents, error };
}

describe('mergeResults', () => {
  const outcomes = [
    primary([
      makeDocument({ id: 'd1', score: 0.9 }),
      makeDocument({ id: 'd2', score: 0.4 }),
      makeDocument({ id: 'd1', score: 0.95, title: 'duplicate' }),
    ]),
    secondary([
      makeDocument({ id: 'd1', score: 0.7 }),
      makeDocument({ id: 'denied', score: 0.99, accessPolicy: makePolicy({ deniedGroups: ['contractors'] }) }),
    ]),
  ];

  it('dedupes per source kind, drops denied documents and sorts by score', () => {
    const merged = mergeResults(outcomes, caller, 10);

    expect(merged.documents.map((d) => [d.sourceKind, d.id, d.score])).toEqual([
      ['PRIMARY_STORE', 'd1', 0.9],
      ['SECONDARY_INDEX', 'd1', 0.7],
      ['PRIMARY_STORE', 'd2', 0.4],
    ]);
    expect(merged.total).toBe(3);
  });

  it('keeps the first occurrence of a duplicate', () => {
    const merged = mergeResults(outcomes, caller, 10);
    const primaryD1 = merged.documents.find((d) => d.sourceKind === 'PRIMARY_STORE' && d.id === 'd1');

    expect(primaryD1?.title).toBe('Title d1');
  });

  it('truncates to the limit but reports the authorized total', () => {
    const merged = mergeResults(outcomes, caller, 2);

    expect(merged.documents).toHaveLength(2);
    expect(merged.total).toBe(3);
    expect(mergeResults(outcomes, caller, 0).documents).toEqual([]);
  });

  it('counts provenance per backend', () => {
    const merged = mergeResults(outcomes, caller, 10);

    expect(merged.provenance).toEqual({
      PRIMARY_STORE: { returned: 3, denied: 0, kept: 2 },
      SECONDARY_INDEX: { returned: 2, denied: 1, kept: 1 },
    });
  });

  it('drops documents that deny the caller by user id', () => {
    const merged = mergeResults(
      [primary([makeDocument({ id: 'x', accessPolicy: makePolicy({ deniedUsers: ['a@x.com'] }) })])],
      caller,
      10,
    );

    expect(merged.documents).toEqual([]);
    expect(merged.total).toBe(0);
  });

  it('matches deny sets against trimmed caller groups and ids', () => {
    const merged = mergeResults(
      [
        primary([
          makeDocument({ id: 'by-group', accessPolicy: makePolicy({ deniedGroups: ['contractors'] }) }),
          makeDocument({ id: 'by-user', accessPolicy: makePolicy({ deniedUsers: ['b@x.com'] }) }),
          makeDocument({ id: 'open' }),
        ]),
      ],
      { userId: ' b@x.com ', groups: [' contractors '] },
      10,
    );

    expect(merged.documents.map((d) => d.id)).toEqual(['open']);
    expect(merged.provenance.PRIMARY_STORE).toEqual({ returned: 3, denied: 2, kept: 1 });
  });

  it('keeps backend order for equal scores', () => {
    const merged = mergeResults(
      [
        primary([makeDocument({ id: 'p', score: 0.5 })]),
        secondary([makeDocument({ id: 's', score: 0.5 })]),
      ],
      caller,
      10,
    );

    expect(merged.documents.map((d) => d.id)).toEqual(['p', 's']);
  });

  it('records backend errors while merging the rest', () => {
    const merged = mergeResults(
      [primary([], 'knowledge_base timed out'), secondary([makeDocument({ id: 's' })])],
      caller,
      10,
    );

    expect(merged.documents.map((d) => d.id)).toEqual(['s']);
    expect(merged.provenance.PRIMARY_STORE).toEqual({
      returned: 0,
      denied: 0,
      kept: 0,
      error: 'knowledge_base timed out',
    });
  });
});
