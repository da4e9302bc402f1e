import { describe, it, expect, vi, afterEach } from 'vitest';
import { HttpKeywordIndex } from '@/services/backends/httpKeywordIndex';
import { HttpIndexingTrigger } from '@/services/backends/httpIndexingTrigger';
import { compileAccessPredicate } from '@/services/accessFilter.service';
import { createFetchMock, jsonResponse, requestJson } from '../../../helpers/fetch';
import { createTestLogger } from '../../../helpers/fakes';

function createIndex(timeoutMs?: number) {
  return new HttpKeywordIndex({
    baseUrl: 'https://search.example/api/',
    apiKey: 'test-key',
    pageSize: 2,
    timeoutMs,
    log: createTestLogger().log,
  });
}

const hangingFetch = () => createFetchMock(() => new Promise<Response>(() => undefined));

const searchItems = [
  {
    id: 'kb-1',
    title: 'Revenue Guide',
    excerpt: 'Revenue is reported monthly.',
    uri: 'https://wiki.example/kb-1',
    score_confidence: 'HIGH',
    attributes: [
      { key: 'access_groups', value: { string_value: 'finance|hr' } },
      { key: '_created_at', value: { date_value: '2024-02-01T00:00:00.000Z' } },
      { key: 'page_count', value: { long_value: 3 } },
    ],
  },
  { id: 'kb-2', title: '', excerpt: '', uri: '' },
  {
    id: 'kb-3',
    title: 'Only a title',
    score: 0.42,
    attributes: [{ key: 'allowed_users', value: { string_list_value: ['a@x.com'] } }],
  },
];

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('HttpKeywordIndex.query', () => {
  const predicate = compileAccessPredicate({ userId: 'a@x.com', groups: ['finance'] });

  it('sends the predicate as an attribute filter without a caller token', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ items: searchItems }));
    vi.stubGlobal('fetch', fetchMock);

    await createIndex().query('Q1 revenue', { kind: 'attributes', filter: predicate }, 5);

    expect(requests[0].url).toBe('https://search.example/api/search');
    expect(requests[0].init?.headers).toEqual({
      Authorization: 'Bearer test-key',
      'Content-Type': 'application/json',
    });
    expect(requestJson(requests[0])).toEqual({ query: 'Q1 revenue', page_size: 5, attribute_filter: predicate });
  });

  it('forwards the caller token instead of a filter', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ items: [] }));
    vi.stubGlobal('fetch', fetchMock);

    await createIndex().query('Q1 revenue', { kind: 'token', callerToken: 'caller-token' }, 5);

    expect(requestJson(requests[0])).toEqual({
      query: 'Q1 revenue',
      page_size: 5,
      user_context: { token: 'caller-token' },
    });
  });

  it('maps items to documents with normalized policies', async () => {
    const { fetchMock } = createFetchMock(() => jsonResponse({ items: searchItems }));
    vi.stubGlobal('fetch', fetchMock);

    const documents = await createIndex().query('Q1 revenue', { kind: 'attributes', filter: predicate }, 5);

    expect(documents.map((d) => [d.id, d.content, d.score])).toEqual([
      ['kb-1', 'Revenue is reported monthly.', 0.75],
      ['kb-3', 'Only a title', 0.42],
    ]);
    expect(documents[0].metadata).toEqual({
      access_groups: 'finance|hr',
      _created_at: '2024-02-01T00:00:00.000Z',
      page_count: 3,
    });
    expect([...documents[0].accessPolicy.allowedGroups]).toEqual(['finance', 'hr']);
    expect([...documents[1].accessPolicy.allowedUsers]).toEqual(['a@x.com']);
  });

  it('fails on an error status', async () => {
    const { fetchMock } = createFetchMock(() => new Response('index unavailable', { status: 503 }));
    vi.stubGlobal('fetch', fetchMock);

    await expect(
      createIndex().query('Q1 revenue', { kind: 'attributes', filter: predicate }, 5),
    ).rejects.toThrow('Keyword index error (503): index unavailable');
  });
});

describe('HttpKeywordIndex.listDocuments', () => {
  it('follows page tokens until the listing ends', async () => {
    const { fetchMock, requests } = createFetchMock((request) => {
      const body = requestJson(request);
      const secondPage = typeof body === 'object' && body !== null && 'page_token' in body;
      return secondPage
        ? jsonResponse({ items: [searchItems[2]] })
        : jsonResponse({ items: [searchItems[0], searchItems[1]], next_page_token: 'p2' });
    });
    vi.stubGlobal('fetch', fetchMock);

    const documents = await createIndex().listDocuments();

    expect(requests.map(requestJson)).toEqual([
      { query: '*', page_size: 2 },
      { query: '*', page_size: 2, page_token: 'p2' },
    ]);
    expect(documents.map((d) => [d.id, d.content])).toEqual([
      ['kb-1', 'Revenue is reported monthly.'],
      ['kb-2', ''],
      ['kb-3', 'Only a title'],
    ]);
    expect(documents[0].attributes._created_at).toEqual(new Date('2024-02-01T00:00:00.000Z'));
  });

  it('gives up on a page that never arrives and aborts the request', async () => {
    const { fetchMock, requests } = hangingFetch();
    vi.stubGlobal('fetch', fetchMock);

    await expect(createIndex(20).listDocuments()).rejects.toThrow('keyword index listing timed out after 20ms');
    expect(requests[0].init?.signal?.aborted).toBe(true);
  });
});

describe('HttpKeywordIndex.getDocumentAcl', () => {
  it('returns the ACL attributes of a document', async () => {
    const { fetchMock, requests } = createFetchMock(() =>
      jsonResponse({ attributes: [{ key: 'allowed_groups', value: { string_list_value: ['legal'] } }] }),
    );
    vi.stubGlobal('fetch', fetchMock);

    const acl = await createIndex().getDocumentAcl('doc 1');

    expect(requests[0].url).toBe('https://search.example/api/documents/doc%201/acl');
    expect(acl).toEqual({ allowed_groups: ['legal'] });
  });

  it('returns null for unknown documents and empty ACLs', async () => {
    vi.stubGlobal('fetch', createFetchMock(() => new Response('', { status: 404 })).fetchMock);
    expect(await createIndex().getDocumentAcl('missing')).toBeNull();

    vi.stubGlobal('fetch', createFetchMock(() => jsonResponse({ attributes: [] })).fetchMock);
    expect(await createIndex().getDocumentAcl('open')).toBeNull();
  });

  it('times out a lookup that never answers', async () => {
    vi.stubGlobal('fetch', hangingFetch().fetchMock);

    await expect(createIndex(20).getDocumentAcl('doc-1')).rejects.toThrow(
      'keyword index ACL lookup timed out after 20ms',
    );
  });
});

describe('HttpIndexingTrigger', () => {
  it('starts a job and returns its id', async () => {
    const { fetchMock, requests } = createFetchMock(() => jsonResponse({ job_id: 'job-42' }));
    vi.stubGlobal('fetch', fetchMock);

    const job = await new HttpIndexingTrigger('https://search.example/api/jobs', 'test-key').startIngestionJob(
      'nightly sync',
    );

    expect(job).toEqual({ jobId: 'job-42' });
    expect(requestJson(requests[0])).toEqual({ description: 'nightly sync' });
    expect(requests[0].init?.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-key',
    });
  });

  it('times out a job start that never answers', async () => {
    vi.stubGlobal('fetch', hangingFetch().fetchMock);

    await expect(
      new HttpIndexingTrigger('https://search.example/api/jobs', 'test-key', 20).startIngestionJob('nightly sync'),
    ).rejects.toThrow('indexing trigger timed out after 20ms');
  });
});
