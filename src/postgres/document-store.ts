import pg from 'pg';
import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import { StoreError } from '../errors.js';
import { createLogger } from '../logger.js';
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
} from '../types.js';
import { mapRow } from './row-mapper.js';
import type { DocumentRow } from './row-mapper.js';
import { applySchema, assertTableName } from './schema.js';
import { compileFindQuery } from './selector-sql.js';

export interface PostgresDocumentStoreConfig {
  /** Statement and query timeouts are taken from the pool's client settings. */
  pool: pg.Pool;
  table?: string;
  logger?: Logger;
}

/**
 * Revision-checked document store over one JSONB table. Every write names
 * the revision it replaces; a stale or missing revision is a `conflict`.
 */
export class PostgresDocumentStore implements DocumentStore {
  private readonly pool: pg.Pool;
  private readonly table: string;
  private readonly log: Logger;

  constructor(config: PostgresDocumentStoreConfig) {
    this.pool = config.pool;
    this.table = assertTableName(config.table ?? 'documents');
    this.log = (config.logger ?? createLogger()).child({ component: 'postgres-store' });
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client, this.table);
    } finally {
      client.release();
    }
  }

  async get(id: DocumentId): Promise<RawDocument | null> {
    const result = await this.run<DocumentRow>(
      `SELECT id, rev, body FROM ${this.table} WHERE id = $1`,
      [id],
      'get document',
    );
    const row = result.rows[0];
    return row === undefined ? null : mapRow(row);
  }

  async getMany(ids: readonly DocumentId[]): Promise<AllDocsResponse> {
    const result = await this.run<DocumentRow>(
      `SELECT id, rev, body FROM ${this.table} WHERE id = ANY($1::text[])`,
      [[...ids]],
      'get documents',
    );
    const found = new Map(result.rows.map((row) => [row.id, row]));
    const rows = ids.map((id): AllDocsRow => {
      const row = found.get(id);
      return row === undefined
        ? { id, key: id, error: 'not_found' }
        : { id, key: id, value: { rev: row.rev }, doc: mapRow(row) };
    });
    return { total_rows: rows.length, offset: 0, rows };
  }

  /** Creates the document when `rev` is omitted, otherwise replaces that revision. */
  async put(id: DocumentId, doc: RawDocument, rev?: string): Promise<WriteResult> {
    const { _id: _ignoredId, _rev: _ignoredRev, ...body } = doc;
    const next = nextRevision(rev);

    const result = rev === undefined
      ? await this.run<WriteResult>(
          `INSERT INTO ${this.table} (id, rev, body) VALUES ($1, $2, $3::jsonb)
          ON CONFLICT (id) DO NOTHING
          RETURNING id, rev`,
          [id, next, JSON.stringify(body)],
          'insert document',
        )
      : await this.run<WriteResult>(
          `UPDATE ${this.table} SET rev = $3, body = $4::jsonb, updated_at = NOW()
          WHERE id = $1 AND rev = $2
          RETURNING id, rev`,
          [id, rev, next, JSON.stringify(body)],
          'update document',
        );

    const row = result.rows[0];
    if (row === undefined) {
      throw new StoreError(`Document update conflict: ${id}`, undefined, 'conflict');
    }
    this.log.debug({ id, rev: row.rev }, 'wrote document');
    return { id: row.id, rev: row.rev };
  }

  /**
   * Items are written independently; a conflict fails only its own item.
   * An item marked `_deleted` removes the revision it names.
   */
  async bulkPut(docs: readonly RawDocument[]): Promise<BulkWriteResult[]> {
    const results: BulkWriteResult[] = [];
    for (const doc of docs) {
      try {
        if (doc['_deleted'] === true) {
          if (doc._rev === undefined) {
            throw new StoreError(`Delete of ${doc._id} needs a revision`, undefined, 'conflict');
          }
          results.push(await this.remove(doc._id, doc._rev));
        } else {
          results.push(await this.put(doc._id, doc, doc._rev));
        }
      } catch (err) {
        if (!(err instanceof StoreError) || err.code !== 'conflict') throw err;
        results.push({ id: doc._id, error: 'conflict', reason: 'Document update conflict.' });
      }
    }
    return results;
  }

  async find(request: FindRequest): Promise<FindResponse> {
    const { sql, params } = compileFindQuery(this.table, request);
    const result = await this.run<DocumentRow>(sql, params, 'find documents');
    const docs = result.rows.map(mapRow);
    return { docs: request.fields === undefined ? docs : docs.map((d) => pick(d, request.fields ?? [])) };
  }

  async rangeScan(request: RangeScanRequest): Promise<AllDocsResponse> {
    // With `descending` the caller has already inverted the bounds.
    const [lowerOp, upperOp, direction]: [string, string, string] = request.descending
      ? ['<=', '>=', 'DESC']
      : ['>=', '<=', 'ASC'];
    const sql = [
      `SELECT id, rev, body FROM ${this.table}`,
      `WHERE id ${lowerOp} $1 AND id ${upperOp} $2`,
      `ORDER BY id ${direction}`,
      'LIMIT $3 OFFSET $4',
    ].join('\n');
    const result = await this.run<DocumentRow>(
      sql,
      [request.startKey, request.endKey, request.limit, request.skip ?? 0],
      'scan documents',
    );
    const rows = result.rows.map((row): AllDocsRow => ({
      id: row.id,
      key: row.id,
      value: { rev: row.rev },
      ...(request.includeDocs ? { doc: mapRow(row) } : {}),
    }));
    return { offset: request.skip ?? 0, rows };
  }

  async remove(id: DocumentId, rev: string): Promise<WriteResult> {
    const result = await this.run<{ id: string }>(
      `DELETE FROM ${this.table} WHERE id = $1 AND rev = $2 RETURNING id`,
      [id, rev],
      'delete document',
    );
    if (result.rowCount === 0) {
      throw new StoreError(`Document update conflict: ${id}`, undefined, 'conflict');
    }
    return { id, rev: nextRevision(rev) };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<R extends pg.QueryResultRow>(
    sql: string,
    params: unknown[],
    what: string,
  ): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (err) {
      throw new StoreError(`Failed to ${what}: ${String(err)}`, err, isTimeout(err) ? 'timeout' : 'store_error');
    }
  }
}

/** Revisions read `<generation>-<token>`, as the document store writes them. */
export function nextRevision(rev: string | undefined): string {
  const generation = rev === undefined ? 0 : Number.parseInt(rev.split('-')[0] ?? '0', 10) || 0;
  return `${generation + 1}-${uuidv4().replace(/-/g, '')}`;
}

function pick(doc: RawDocument, fields: readonly string[]): Fields {
  const picked: Fields = {};
  for (const field of fields) {
    if (doc[field] !== undefined) picked[field] = doc[field];
  }
  return picked;
}

// 57014 is query_canceled, raised when statement_timeout fires.
function isTimeout(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return ('code' in err && err.code === '57014') || /timeout/i.test(err.message);
}
