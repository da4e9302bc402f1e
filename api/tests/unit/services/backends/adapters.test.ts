import { describe, it, expect, vi, afterEach } from 'vitest';
import { compileAccessPredicate } from '@/services/accessFilter.service';
import { KeywordIndexAdapter, accessMetadataFor } from '@/services/backends/keywordIndexAdapter';
import { VectorStoreAdapter } from '@/services/backends/vectorStoreAdapter';
import { createOpenAiEmbedder } from '@/services/backends/embeddings';
import {
  KNOWLEDGE_SEARCH_SQL,
  predicateToColumnFilters,
  rowToDocument,
} from '@/services/backends/pgVectorRetriever';
import { ConfigurationError } from '@/errors/gateway';
import type { CallerContext } from '@/types/documents';
import { createFetchMock, jsonResponse, requestJson } from '../../../helpers/fetch';
import { FakeKeywordIndex, FakeVectorRetriever, makeDocument, makePolicy } from '../../../helpers/fakes';

const caller: CallerContext = { userId: 'a@x.com', groups: ['finance'] };
const predicate = compileAccessPredicate(caller);

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('accessMetadataFor', () => {
  it('prefers non-empty policy fields over raw metadata', () => {
    const document = makeDocument({
      id: 'd1',
      metadata: { access_groups: 'legal', classification: 'internal' },
      accessPolicy: makePolicy({ allowedGroups: ['finance'] }),
    });

    expect(accessMetadataFor(document)).toEqual({ access_groups: 'finance', classification: 'internal' });
  });
});

describe('KeywordIndexAdapter', () => {
  const visible = makeDocument({ id: 'visible', metadata: { access_groups: 'finance' } });
  const hidden = makeDocument({ id: 'hidden', metadata: { access_groups: 'legal' } });

  it('re-applies the predicate to results of an attribute-filtered query', async () => {
    const index = new FakeKeywordIndex([visible, hidden]);

    const documents = await new KeywordIndexAdapter(index).query('q', predicate, 10, caller);

    expect(documents.map((d) => d.id)).toEqual(['visible']);
    expect(index.queries[0].authorization).toEqual({ kind: 'attributes', filter: predicate });
  });

  it('trusts results of a token-authorized query', async () => {
    const index = new FakeKeywordIndex([visible, hidden]);

    const documents = await new KeywordIndexAdapter(index).query('q', predicate, 10, {
      ...caller,
      userToken: ' caller-token ',
    });

    expect(documents.map((d) => d.id)).toEqual(['visible', 'hidden']);
    expect(index.queries[0].authorization).toEqual({ kind: 'token', callerToken: 'caller-token' });
  });
});

describe('VectorStoreAdapter', () => {
  it('delegates to the retriever with the predicate', async () => {
    const retriever = new FakeVectorRetriever([makeDocument({ id: 'pub', metadata: { classification: 'public' } })]);

    const documents = await new VectorStoreAdapter(retriever).query('q', predicate, 3, caller);

    expect(documents.map((d) => d.id)).toEqual(['pub']);
    expect(retriever.calls).toEqual([{ text: 'q', predicate, limit: 3 }]);
  });
});

describe('pgvector retrieval', () => {
  it('splits the predicate into column filters', () => {
    expect(predicateToColumnFilters(predicate)).toEqual({
      accessUsers: ['a@x.com'],
      createdBy: ['a@x.com'],
      accessGroups: ['finance'],
      classifications: ['public'],
    });
  });

  it('filters on every ACL column in the query', () => {
    expect(KNOWLEDGE_SEARCH_SQL).toContain('access_users && $2::text[]');
    expect(KNOWLEDGE_SEARCH_SQL).toContain('access_groups && $4::text[]');
    expect(KNOWLEDGE_SEARCH_SQL).toContain('classification = ANY($5::text[])');
  });

  it('maps rows to documents with their access policy', () => {
    const document = rowToDocument({
      id: 'row-1',
      title: 'Q1 Forecast',
      source_uri: 'https://docs.example/row-1',
      content: 'Forecast body',
      metadata: { department: 'finance' },
      access_users: null,
      access_groups: ['finance'],
      denied_users: ['intern@x.com'],
      denied_groups: null,
      created_by: 'jdoe',
      classification: 'confidential',
      similarity: 0.83,
    });

    expect(document.score).toBe(0.83);
    expect(document.metadata).toEqual({ department: 'finance', classification: 'confidential', created_by: 'jdoe' });
    expect([...document.accessPolicy.allowedGroups]).toEqual(['finance']);
    expect([...document.accessPolicy.deniedUsers]).toEqual(['intern@x.com']);
  });
});

describe('createOpenAiEmbedder', () => {
  it('requires an API key', () => {
    expect(() => createOpenAiEmbedder({ model: 'text-embedding-3-small' })).toThrow(ConfigurationError);
  });

  it('returns the first embedding', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ data: [{ embedding: [0.1, 0.2] }] }));
    vi.stubGlobal('fetch', fetchMock);

    const embed = createOpenAiEmbedder({ apiKey: 'test-key', model: 'text-embedding-3-small' });

    expect(await embed('Q1 revenue')).toEqual([0.1, 0.2]);
    expect(requests[0].url).toBe('https://api.openai.com/v1/embeddings');
    expect(requestJson(requests[0])).toEqual({ input: 'Q1 revenue', model: 'text-embedding-3-small' });
  });
});
