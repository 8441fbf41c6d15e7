import { StoreError } from '../../src/errors.js';
import type {
  AllDocsResponse,
  AllDocsRow,
  BulkWriteResult,
  DocumentId,
  DocumentStore,
  Fields,
  FindRequest,
  FindResponse,
  RangeScanRequest,
  RawDocument,
  WriteResult,
} from '../../src/types.js';

interface Entry {
  rev: string;
  body: Record<string, unknown>;
}

/**
 * In-process DocumentStore for unit tests. Ids sort by code unit, revisions
 * are `<n>-mem`, and stale writes fail with a `conflict` StoreError.
 */
export class MemoryDocumentStore implements DocumentStore {
  private readonly docs = new Map<DocumentId, Entry>();
  readonly calls: string[] = [];

  /** Seeds a document directly, bypassing revision checks. */
  seed(doc: RawDocument): void {
    const { _id, _rev, ...body } = doc;
    this.docs.set(_id, { rev: _rev ?? '1-mem', body });
  }

  has(id: DocumentId): boolean {
    return this.docs.has(id);
  }

  ids(): DocumentId[] {
    return [...this.docs.keys()].sort(compareIds);
  }

  async get(id: DocumentId): Promise<RawDocument | null> {
    this.calls.push(`get ${id}`);
    return this.read(id);
  }

  async getMany(ids: readonly DocumentId[]): Promise<AllDocsResponse> {
    this.calls.push(`getMany ${ids.join(',')}`);
    const rows = ids.map((id): AllDocsRow => {
      const doc = this.read(id);
      return doc === null ? { id, key: id, error: 'not_found' } : { id, key: id, value: { rev: doc._rev }, doc };
    });
    return { total_rows: this.docs.size, offset: 0, rows };
  }

  async put(id: DocumentId, doc: RawDocument, rev?: string): Promise<WriteResult> {
    this.calls.push(`put ${id}`);
    return this.write(id, doc, rev);
  }

  async bulkPut(docs: readonly RawDocument[]): Promise<BulkWriteResult[]> {
    this.calls.push(`bulkPut ${docs.map((d) => d._id).join(',')}`);
    return docs.map((doc) => {
      try {
        return doc['_deleted'] === true ? this.erase(doc._id, doc._rev) : this.write(doc._id, doc, doc._rev);
      } catch (err) {
        if (err instanceof StoreError) return { id: doc._id, error: err.code, reason: 'Document update conflict.' };
        throw err;
      }
    });
  }

  async find(request: FindRequest): Promise<FindResponse> {
    this.calls.push('find');
    let docs = this.ids()
      .map((id) => this.read(id))
      .filter((doc): doc is RawDocument => doc !== null && matches(doc, request.selector));

    for (const entry of [...(request.sort ?? [])].reverse()) {
      for (const [field, direction] of Object.entries(entry)) {
        docs = [...docs].sort((a, b) => compareValues(a[field], b[field]) * (direction === 'desc' ? -1 : 1));
      }
    }
    const skip = request.skip ?? 0;
    docs = docs.slice(skip, request.limit === undefined ? undefined : skip + request.limit);

    const fields = request.fields;
    if (fields === undefined) return { docs };
    return {
      docs: docs.map((doc) => {
        const picked: Fields = {};
        for (const f of fields) if (doc[f] !== undefined) picked[f] = doc[f];
        return picked;
      }),
    };
  }

  async rangeScan(request: RangeScanRequest): Promise<AllDocsResponse> {
    this.calls.push(`rangeScan ${request.startKey}..${request.endKey}`);
    const [low, high]: [string, string] = request.descending
      ? [request.endKey, request.startKey]
      : [request.startKey, request.endKey];
    const inRange = this.ids().filter((id) => compareIds(id, low) >= 0 && compareIds(id, high) <= 0);
    if (request.descending) inRange.reverse();

    const skip = request.skip ?? 0;
    const rows = inRange.slice(skip, skip + request.limit).map((id): AllDocsRow => {
      const doc = this.read(id);
      const row: AllDocsRow = { id, key: id, value: { rev: doc?._rev } };
      if (request.includeDocs) row.doc = doc;
      return row;
    });
    return { total_rows: this.docs.size, offset: skip, rows };
  }

  async remove(id: DocumentId, rev: string): Promise<WriteResult> {
    this.calls.push(`remove ${id}`);
    return this.erase(id, rev);
  }

  private read(id: DocumentId): RawDocument | null {
    const entry = this.docs.get(id);
    if (entry === undefined) return null;
    return { ...structuredClone(entry.body), _id: id, _rev: entry.rev };
  }

  private erase(id: DocumentId, rev: string | undefined): WriteResult {
    const entry = this.docs.get(id);
    if (entry === undefined || entry.rev !== rev) throw conflict(id);
    this.docs.delete(id);
    return { id, rev: bump(rev) };
  }

  private write(id: DocumentId, doc: RawDocument, rev: string | undefined): WriteResult {
    const { _id: _ignoredId, _rev: _ignoredRev, ...body } = doc;
    const entry = this.docs.get(id);
    if (entry === undefined ? rev !== undefined : entry.rev !== rev) throw conflict(id);

    const next = bump(entry?.rev);
    this.docs.set(id, { rev: next, body: structuredClone(body) });
    return { id, rev: next };
  }
}

function bump(rev: string | undefined): string {
  const n = rev === undefined ? 0 : Number.parseInt(rev, 10);
  return `${n + 1}-mem`;
}

function conflict(id: DocumentId): StoreError {
  return new StoreError(`Document update conflict: ${id}`, undefined, 'conflict');
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return compareIds(String(a), String(b));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function fieldValue(doc: RawDocument, path: string): unknown {
  let current: unknown = doc;
  for (const part of path.split('.')) {
    current = isRecord(current) ? current[part] : undefined;
  }
  return current;
}

function matches(doc: RawDocument, selector: Record<string, unknown>): boolean {
  return Object.entries(selector).every(([key, condition]) => {
    if (key === '$and' && Array.isArray(condition)) {
      return condition.every((c: unknown) => isRecord(c) && matches(doc, c));
    }
    if (key === '$or' && Array.isArray(condition)) {
      return condition.some((c: unknown) => isRecord(c) && matches(doc, c));
    }
    return meets(fieldValue(doc, key), condition);
  });
}

function meets(value: unknown, condition: unknown): boolean {
  if (!isRecord(condition) || !Object.keys(condition).every((k) => k.startsWith('$'))) {
    return JSON.stringify(value) === JSON.stringify(condition);
  }

  return Object.entries(condition).every(([op, operand]) => {
    switch (op) {
      case '$eq':
        return JSON.stringify(value) === JSON.stringify(operand);
      case '$ne':
        return JSON.stringify(value) !== JSON.stringify(operand);
      case '$gt':
        return value !== undefined && compareValues(value, operand) > 0;
      case '$lt':
        return value !== undefined && compareValues(value, operand) < 0;
      case '$gte':
        return value !== undefined && compareValues(value, operand) >= 0;
      case '$lte':
        return value !== undefined && compareValues(value, operand) <= 0;
      case '$in':
        return Array.isArray(operand) && operand.some((o: unknown) => JSON.stringify(o) === JSON.stringify(value));
      case '$exists':
        return (value !== undefined) === (operand !== false);
      default:
        throw new StoreError(`Unsupported selector: operator ${op}`, undefined, 'bad_request');
    }
  });
}
