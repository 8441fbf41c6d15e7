/** Namespace-qualified document id, e.g. `"user/42"`. Never percent-encoded. */
export type DocumentId = string;

/** Field values of one write, keyed by field name. */
export type Fields = Record<string, unknown>;

export interface RawDocument {
  _id: DocumentId;
  _rev?: string;
  type?: string;
  [key: string]: unknown;
}

export interface WriteResult {
  id: DocumentId;
  rev: string;
}

export type BulkWriteResult =
  | { id: DocumentId; rev: string }
  | { id: DocumentId; error: string; reason: string };

export interface AllDocsRow {
  id: DocumentId;
  key?: unknown;
  value?: unknown;
  doc?: RawDocument | null;
  error?: string;
}

export interface AllDocsResponse {
  total_rows?: number;
  offset?: number;
  rows: AllDocsRow[];
}

export interface FindResponse {
  /** With `fields` set, each document carries only the fields requested. */
  docs: Fields[];
  bookmark?: string;
  warning?: string;
}

/** Error body as returned by the backing store. */
export interface StoreErrorPayload {
  error: string;
  reason?: string;
}

export type SortDirection = 'asc' | 'desc';

/** One Mango sort entry, e.g. `{ name: 'desc' }`. */
export type SortEntry = Record<string, SortDirection>;

export type Selector = Record<string, unknown>;

export interface FindRequest {
  selector: Selector;
  fields?: string[];
  sort?: SortEntry[];
  limit?: number;
  skip?: number;
}

/**
 * Range scan over document ids. When `descending` is set the bounds are
 * already inverted: `startKey` is the upper bound and `endKey` the lower.
 */
export interface RangeScanRequest {
  startKey: string;
  endKey: string;
  limit: number;
  descending: boolean;
  skip?: number;
  includeDocs: boolean;
}

/**
 * Backing-store handle consumed by the engine. Implementations are
 * responsible for transport, authentication and timeouts; every failure
 * other than absence surfaces as a StoreError.
 */
export interface DocumentStore {
  /** Resolves to null when the document does not exist. */
  get(id: DocumentId): Promise<RawDocument | null>;
  getMany(ids: readonly DocumentId[]): Promise<AllDocsResponse>;
  /** Creates the document when `rev` is omitted; rejects with code `conflict` on a stale or missing revision. */
  put(id: DocumentId, body: RawDocument, rev?: string): Promise<WriteResult>;
  /** A document with `_deleted: true` and its current `_rev` is removed. */
  bulkPut(docs: readonly RawDocument[]): Promise<BulkWriteResult[]>;
  find(request: FindRequest): Promise<FindResponse>;
  rangeScan(request: RangeScanRequest): Promise<AllDocsResponse>;
  remove(id: DocumentId, rev: string): Promise<WriteResult>;
}

/** Raw shapes the ResultProjector accepts. */
export type StoreResponse =
  | RawDocument
  | readonly RawDocument[]
  | AllDocsResponse
  | FindResponse
  | StoreErrorPayload
  | null;

export interface ProjectionResult {
  count: number;
  rows: unknown[][];
}

/** Values of the fields a caller asked to have returned from a write. */
export type ReturnedValues = Record<string, unknown>;

export interface DeleteAllResult {
  deleted: number;
  /** Documents the store refused to delete, typically after a concurrent update. */
  failures: Array<{ id: DocumentId; error: string; reason: string }>;
}

export type BulkInsertOutcome =
  | { ok: true; id: DocumentId; rev: string; values: ReturnedValues }
  | { ok: false; id: DocumentId; error: string; reason: string };
