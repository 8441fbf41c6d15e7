import type { Logger } from 'pino';
import { StoreError } from '../errors.js';
import { createLogger } from '../logger.js';
import { encodeDocumentId } from '../namespace.js';
import type {
  AllDocsResponse,
  AllDocsRow,
  BulkWriteResult,
  DocumentId,
  DocumentStore,
  FindRequest,
  FindResponse,
  RangeScanRequest,
  RawDocument,
  WriteResult,
} from '../types.js';

export interface CouchDocumentStoreConfig {
  /** Server base URL, e.g. `http://localhost:5984`. */
  url: string;
  database: string;
  username?: string;
  password?: string;
  /** Per-request timeout. Defaults to 5000 ms. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

type Method = 'GET' | 'PUT' | 'POST' | 'DELETE';

interface Reply {
  status: number;
  payload: unknown;
}

/**
 * DocumentStore over the CouchDB HTTP API. Ids are percent-encoded only
 * when placed in a URL path; bodies and responses carry them raw.
 */
export class CouchDocumentStore implements DocumentStore {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly log: Logger;

  constructor(config: CouchDocumentStoreConfig) {
    this.baseUrl = `${config.url.replace(/\/+$/, '')}/${encodeURIComponent(config.database)}`;
    this.headers = { 'Content-Type': 'application/json', Accept: 'application/json' };
    if (config.username !== undefined) {
      const credentials = Buffer.from(`${config.username}:${config.password ?? ''}`).toString('base64');
      this.headers['Authorization'] = `Basic ${credentials}`;
    }
    this.timeoutMs = config.timeoutMs ?? 5000;
    this.fetchFn = config.fetch ?? fetch;
    this.log = (config.logger ?? createLogger()).child({ component: 'couch-store' });
  }

  async get(id: DocumentId): Promise<RawDocument | null> {
    const reply = await this.request('GET', `/${encodeDocumentId(id)}`);
    if (reply.status === 404) return null;
    const doc = toDocument(this.expectOk(reply));
    if (doc === null) throw malformed(reply.payload);
    return doc;
  }

  async getMany(ids: readonly DocumentId[]): Promise<AllDocsResponse> {
    const reply = await this.request('POST', '/_all_docs?include_docs=true', { keys: ids });
    return toAllDocs(this.expectOk(reply));
  }

  async put(id: DocumentId, doc: RawDocument, rev?: string): Promise<WriteResult> {
    const body: RawDocument = { ...doc, _id: id };
    if (rev !== undefined) body._rev = rev;
    else delete body._rev;

    const reply = await this.request('PUT', `/${encodeDocumentId(id)}`, body);
    return toWriteResult(this.expectOk(reply));
  }

  async bulkPut(docs: readonly RawDocument[]): Promise<BulkWriteResult[]> {
    const reply = await this.request('POST', '/_bulk_docs', { docs });
    const payload = this.expectOk(reply);
    if (!Array.isArray(payload)) throw malformed(payload);
    return payload.map(toBulkResult);
  }

  async find(request: FindRequest): Promise<FindResponse> {
    const reply = await this.request('POST', '/_find', request);
    const payload = this.expectOk(reply);
    if (!isRecord(payload)) throw malformed(payload);
    const { docs: found, bookmark, warning } = payload;
    if (!Array.isArray(found)) throw malformed(payload);

    // Projected documents hold only the requested fields, possibly without _id.
    const docs = found.filter(isRecord);
    const response: FindResponse = { docs };
    if (typeof bookmark === 'string') response.bookmark = bookmark;
    if (typeof warning === 'string') response.warning = warning;
    return response;
  }

  async rangeScan(request: RangeScanRequest): Promise<AllDocsResponse> {
    const query = new URLSearchParams({
      startkey: JSON.stringify(request.startKey),
      endkey: JSON.stringify(request.endKey),
      limit: String(request.limit),
      descending: String(request.descending),
      include_docs: String(request.includeDocs),
    });
    if (request.skip !== undefined) query.set('skip', String(request.skip));

    const reply = await this.request('GET', `/_all_docs?${query.toString()}`);
    return toAllDocs(this.expectOk(reply));
  }

  async remove(id: DocumentId, rev: string): Promise<WriteResult> {
    const query = new URLSearchParams({ rev });
    const reply = await this.request('DELETE', `/${encodeDocumentId(id)}?${query.toString()}`);
    return toWriteResult(this.expectOk(reply));
  }

  private async request(method: Method, path: string, body?: unknown): Promise<Reply> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const init: RequestInit = { method, headers: this.headers, signal: controller.signal };
    if (body !== undefined) init.body = JSON.stringify(body);

    try {
      const response = await this.fetchFn(`${this.baseUrl}${path}`, init);
      const text = await response.text();
      this.log.debug({ method, path, status: response.status }, 'couch request');
      return { status: response.status, payload: text === '' ? null : parseJson(text) };
    } catch (err) {
      if (err instanceof StoreError) throw err;
      if (err instanceof Error && err.name === 'AbortError') {
        throw new StoreError(`Request timed out after ${this.timeoutMs}ms: ${method} ${path}`, err, 'timeout');
      }
      throw new StoreError(`Request failed: ${method} ${path}: ${String(err)}`, err);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /** Maps a non-2xx reply to a StoreError keyed by CouchDB's `error` field. */
  private expectOk(reply: Reply): unknown {
    if (reply.status >= 200 && reply.status < 300) return reply.payload;

    const { payload } = reply;
    const body: Record<string, unknown> = isRecord(payload) ? payload : {};
    const error = typeof body['error'] === 'string' ? body['error'] : `http_${reply.status}`;
    const reason = typeof body['reason'] === 'string' ? body['reason'] : 'unknown';
    this.log.warn({ status: reply.status, error, reason }, 'couch request rejected');
    throw new StoreError(`${error} :: ${reason}`, payload, error);
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StoreError(`Response is not JSON: ${text.slice(0, 200)}`, err, 'malformed_response');
  }
}

function toDocument(value: unknown): RawDocument | null {
  if (!isRecord(value)) return null;
  const id = value['_id'];
  if (typeof id !== 'string') return null;

  const doc: RawDocument = { _id: id };
  for (const [key, field] of Object.entries(value)) {
    if (key !== '_id' && key !== '_rev') doc[key] = field;
  }
  const rev = value['_rev'];
  if (typeof rev === 'string') doc._rev = rev;
  return doc;
}

function toAllDocs(payload: unknown): AllDocsResponse {
  if (!isRecord(payload)) throw malformed(payload);
  const { rows: entries, total_rows: totalRows, offset } = payload;
  if (!Array.isArray(entries)) throw malformed(payload);

  const rows = entries.map((raw: unknown): AllDocsRow => {
    if (!isRecord(raw)) throw malformed(payload);
    // Rows for missing keys carry only `key` and `error`.
    const { id, key, value, doc, error } = raw;
    const row: AllDocsRow = { id: typeof id === 'string' ? id : String(key), key, value };
    if ('doc' in raw) row.doc = toDocument(doc);
    if (typeof error === 'string') row.error = error;
    return row;
  });

  const response: AllDocsResponse = { rows };
  if (typeof totalRows === 'number') response.total_rows = totalRows;
  if (typeof offset === 'number') response.offset = offset;
  return response;
}

function toWriteResult(payload: unknown): WriteResult {
  if (!isRecord(payload)) throw malformed(payload);
  const { id, rev } = payload;
  if (typeof id !== 'string' || typeof rev !== 'string') throw malformed(payload);
  return { id, rev };
}

function toBulkResult(item: unknown): BulkWriteResult {
  if (!isRecord(item)) throw malformed(item);
  const { id, rev, error, reason } = item;
  if (typeof id !== 'string') throw malformed(item);
  if (typeof error === 'string') {
    return { id, error, reason: typeof reason === 'string' ? reason : 'unknown' };
  }
  if (typeof rev !== 'string') throw malformed(item);
  return { id, rev };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(payload: unknown): StoreError {
  return new StoreError(`Malformed store response: ${JSON.stringify(payload)}`, payload, 'malformed_response');
}
