import { describe, it, expect, vi } from 'vitest';
import type { Mock } from 'vitest';
import { pino } from 'pino';
import { CouchDocumentStore } from '../../src/couch/couch-store.js';
import { StoreError } from '../../src/errors.js';
import { query } from '../../src/query/query-object.js';
import { eq } from '../../src/query/predicate.js';
import { DocumentRepository } from '../../src/repository.js';
import { User } from '../support/schemas.js';

const logger = pino({ level: 'silent' });

function reply(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function makeStore(fetchMock: typeof fetch, timeoutMs?: number) {
  return new CouchDocumentStore({
    url: 'http://couch.test:5984/',
    database: 'app',
    username: 'admin',
    password: 'test-secret',
    fetch: fetchMock,
    logger,
    ...(timeoutMs !== undefined ? { timeoutMs } : {}),
  });
}

function lastCall(fetchMock: Mock<typeof fetch>): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls.at(-1);
  if (call === undefined) throw new Error('fetch was not called');
  return { url: String(call[0]), init: call[1] ?? {} };
}

describe('CouchDocumentStore (unit)', () => {
  describe('get', () => {
    it('fetches the encoded id with basic auth', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(200, { _id: 'user/u1', _rev: '1-a', name: 'Ann' }));
      const store = makeStore(fetchMock);
      expect(await store.get('user/u1')).toEqual({ _id: 'user/u1', _rev: '1-a', name: 'Ann' });

      const { url, init } = lastCall(fetchMock);
      expect(url).toBe('http://couch.test:5984/app/user%2Fu1');
      expect(init.method).toBe('GET');
      expect(init.body).toBeUndefined();
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        Accept: 'application/json',
        Authorization: `Basic ${Buffer.from('admin:test-secret').toString('base64')}`,
      });
    });

    it('omits the auth header without credentials', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(404, { error: 'not_found', reason: 'missing' }));
      const store = new CouchDocumentStore({ url: 'http://couch.test:5984', database: 'app', fetch: fetchMock, logger });
      await store.get('user/u1');
      expect(lastCall(fetchMock).init.headers).toEqual({ 'Content-Type': 'application/json', Accept: 'application/json' });
    });

    it('returns null on 404', async () => {
      const store = makeStore(vi.fn<typeof fetch>().mockResolvedValue(reply(404, { error: 'not_found', reason: 'deleted' })));
      expect(await store.get('user/u1')).toBeNull();
    });

    it('maps an error body to a StoreError with its code', async () => {
      const store = makeStore(
        vi.fn<typeof fetch>().mockResolvedValue(reply(500, { error: 'internal_server_error', reason: 'boom' })),
      );
      await expect(store.get('user/u1')).rejects.toMatchObject({
        name: 'StoreError',
        code: 'internal_server_error',
        message: 'internal_server_error :: boom',
      });
    });

    it('wraps transport failures', async () => {
      const store = makeStore(vi.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed')));
      await expect(store.get('user/u1')).rejects.toMatchObject({
        code: 'store_error',
        message: 'Request failed: GET /user%2Fu1: TypeError: fetch failed',
      });
    });

    it('reports a timeout when the request is aborted', async () => {
      const fetchMock = vi.fn<typeof fetch>(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
            });
          }),
      );
      const store = makeStore(fetchMock, 10);
      await expect(store.get('user/u1')).rejects.toMatchObject({ code: 'timeout' });
    });

    it('rejects a body that is not JSON', async () => {
      const store = makeStore(vi.fn<typeof fetch>().mockResolvedValue(new Response('oops', { status: 200 })));
      await expect(store.get('user/u1')).rejects.toMatchObject({ code: 'malformed_response' });
    });
  });

  describe('getMany', () => {
    it('posts keys to _all_docs and keeps missing and deleted rows', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
        reply(200, {
          total_rows: 9,
          offset: 0,
          rows: [
            { id: 'user/a', key: 'user/a', value: { rev: '1-a' }, doc: { _id: 'user/a', _rev: '1-a', n: 1 } },
            { key: 'user/x', error: 'not_found' },
            { id: 'user/d', key: 'user/d', value: { rev: '2-d', deleted: true }, doc: null },
          ],
        }),
      );
      const store = makeStore(fetchMock);
      const result = await store.getMany(['user/a', 'user/x', 'user/d']);

      expect(result).toEqual({
        total_rows: 9,
        offset: 0,
        rows: [
          { id: 'user/a', key: 'user/a', value: { rev: '1-a' }, doc: { _id: 'user/a', _rev: '1-a', n: 1 } },
          { id: 'user/x', key: 'user/x', error: 'not_found' },
          { id: 'user/d', key: 'user/d', value: { rev: '2-d', deleted: true }, doc: null },
        ],
      });
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe('http://couch.test:5984/app/_all_docs?include_docs=true');
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{"keys":["user/a","user/x","user/d"]}');
    });
  });

  describe('put', () => {
    it('sends the revision in the body', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(201, { ok: true, id: 'user/u1', rev: '2-b' }));
      const store = makeStore(fetchMock);
      expect(await store.put('user/u1', { _id: 'user/u1', name: 'Bob' }, '1-a')).toEqual({ id: 'user/u1', rev: '2-b' });

      const { url, init } = lastCall(fetchMock);
      expect(url).toBe('http://couch.test:5984/app/user%2Fu1');
      expect(init.method).toBe('PUT');
      expect(init.body).toBe('{"_id":"user/u1","name":"Bob","_rev":"1-a"}');
    });

    it('drops a stale _rev when creating', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(201, { ok: true, id: 'user/u1', rev: '1-a' }));
      await makeStore(fetchMock).put('user/u1', { _id: 'user/u1', _rev: '9-z' });
      expect(lastCall(fetchMock).init.body).toBe('{"_id":"user/u1"}');
    });

    it('surfaces a conflict', async () => {
      const store = makeStore(
        vi.fn<typeof fetch>().mockResolvedValue(reply(409, { error: 'conflict', reason: 'Document update conflict.' })),
      );
      await expect(store.put('user/u1', { _id: 'user/u1' })).rejects.toMatchObject({ code: 'conflict' });
    });
  });

  describe('bulkPut', () => {
    it('maps per-item outcomes', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
        reply(201, [
          { ok: true, id: 'user/a', rev: '1-a' },
          { id: 'user/b', error: 'conflict', reason: 'Document update conflict.' },
        ]),
      );
      const results = await makeStore(fetchMock).bulkPut([{ _id: 'user/a' }, { _id: 'user/b' }]);
      expect(results).toEqual([
        { id: 'user/a', rev: '1-a' },
        { id: 'user/b', error: 'conflict', reason: 'Document update conflict.' },
      ]);
      expect(lastCall(fetchMock).url).toBe('http://couch.test:5984/app/_bulk_docs');
    });

    it('rejects a response that is not a list', async () => {
      const store = makeStore(vi.fn<typeof fetch>().mockResolvedValue(reply(201, { ok: true })));
      await expect(store.bulkPut([{ _id: 'user/a' }])).rejects.toBeInstanceOf(StoreError);
    });
  });

  describe('find', () => {
    it('posts the request to _find', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(
        reply(200, { docs: [{ _id: 'user/a', name: 'Ann' }], bookmark: 'nil', warning: 'No matching index found' }),
      );
      const result = await makeStore(fetchMock).find({ selector: { type: 'user' }, limit: 5 });
      expect(result).toEqual({
        docs: [{ _id: 'user/a', name: 'Ann' }],
        bookmark: 'nil',
        warning: 'No matching index found',
      });
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe('http://couch.test:5984/app/_find');
      expect(init.body).toBe('{"selector":{"type":"user"},"limit":5}');
    });

    it('keeps projected documents that carry only the requested fields', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(200, { docs: [{ name: 'Ann' }, { name: 'Bob' }] }));
      const result = await makeStore(fetchMock).find({ selector: { type: 'user' }, fields: ['name'] });
      expect(result).toEqual({ docs: [{ name: 'Ann' }, { name: 'Bob' }] });
    });
  });

  describe('rangeScan', () => {
    it('passes JSON-encoded keys and options as query parameters', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(200, { total_rows: 0, offset: 2, rows: [] }));
      const result = await makeStore(fetchMock).rangeScan({
        startKey: 'user/{}',
        endKey: 'user',
        limit: 10,
        descending: true,
        skip: 2,
        includeDocs: true,
      });
      expect(result).toEqual({ total_rows: 0, offset: 2, rows: [] });

      const url = new URL(lastCall(fetchMock).url);
      expect(url.pathname).toBe('/app/_all_docs');
      expect(Object.fromEntries(url.searchParams)).toEqual({
        startkey: '"user/{}"',
        endkey: '"user"',
        limit: '10',
        descending: 'true',
        include_docs: 'true',
        skip: '2',
      });
    });
  });

  describe('remove', () => {
    it('deletes with the revision as a query parameter', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(200, { ok: true, id: 'user/a', rev: '3-c' }));
      expect(await makeStore(fetchMock).remove('user/a', '2-b')).toEqual({ id: 'user/a', rev: '3-c' });
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe('http://couch.test:5984/app/user%2Fa?rev=2-b');
      expect(init.method).toBe('DELETE');
    });
  });
});

describe('DocumentRepository over CouchDocumentStore', () => {
  it('asks for _id alongside the selected fields and projects the rows', async () => {
    const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(reply(200, { docs: [{ _id: 'user/u1', name: 'Ann' }] }));
    const repo = new DocumentRepository({ store: makeStore(fetchMock), logger });
    const q = query.from(User).where(eq('name', 'Ann')).select('name');

    expect(await repo.all(User, q)).toEqual({ count: 1, rows: [['Ann']] });
    expect(lastCall(fetchMock).init.body).toBe('{"selector":{"type":"user","name":"Ann"},"fields":["_id","name"]}');
  });
});
