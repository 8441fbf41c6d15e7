import type { Logger } from 'pino';
import { v4 as uuidv4 } from 'uuid';
import type { ConstraintEngine } from '../constraints/engine.js';
import { collectViolations } from '../constraints/engine.js';
import { ConstraintViolationError, NotFoundError, StoreError } from '../errors.js';
import { createLogger } from '../logger.js';
import { qualify, unqualify } from '../namespace.js';
import { DEFAULT_SCAN_LIMIT, RANGE_END_SENTINEL } from '../query/compiler.js';
import type { Schema } from '../schema.js';
import type {
  BulkInsertOutcome,
  BulkWriteResult,
  DeleteAllResult,
  DocumentId,
  DocumentStore,
  Fields,
  RawDocument,
  ReturnedValues,
  WriteResult,
} from '../types.js';

export interface DocumentWriterConfig {
  store: DocumentStore;
  constraints: ConstraintEngine;
  logger?: Logger;
}

type Admission = { ok: true; reserved: string[] } | { ok: false; reason: string };

interface Plan {
  doc: RawDocument;
  admission: Admission;
}

export const DEFAULT_RETURNING: readonly string[] = ['_id', '_rev'];

/**
 * Persists documents after the ConstraintEngine has accepted them. Every
 * write path maps the store's id and revision into exactly the fields the
 * caller asked to have returned; absent fields come back as null.
 */
export class DocumentWriter {
  private readonly store: DocumentStore;
  private readonly constraints: ConstraintEngine;
  private readonly log: Logger;

  constructor(config: DocumentWriterConfig) {
    this.store = config.store;
    this.constraints = config.constraints;
    this.log = (config.logger ?? createLogger()).child({ component: 'writer' });
  }

  async insert(
    schema: Schema,
    fields: Fields,
    returning: readonly string[] = DEFAULT_RETURNING,
  ): Promise<ReturnedValues> {
    const reserved = await this.constraints.enforce(schema, fields);

    const doc = buildDocument(schema, fields);
    const result = await this.write(reserved, () => this.store.put(doc._id, doc));
    this.log.debug({ id: result.id, rev: result.rev }, 'inserted document');

    return returnedValues(schema, { ...doc, _rev: result.rev }, result, returning);
  }

  /**
   * Merges `newFields` over the stored document and writes the full body
   * under the current revision. Keys the caller did not send are kept.
   */
  async update(
    schema: Schema,
    id: string,
    newFields: Fields,
    returning: readonly string[] = DEFAULT_RETURNING,
  ): Promise<ReturnedValues> {
    const docId = qualify(schema.namespace, id);
    const current = await this.fetch(docId);
    const changes = withoutKeys(newFields, schema);

    const reserved = await this.constraints.enforce(schema, changes, current);

    const { _rev: rev, ...stored } = current;
    const merged: RawDocument = { ...stored, ...changes, _id: docId, type: schema.namespace };
    const result = await this.write(reserved, () => this.store.put(docId, merged, rev));
    this.log.debug({ id: result.id, rev: result.rev }, 'updated document');

    await this.constraints.release(this.constraints.staleMarkerIds(schema, current, changes));

    return returnedValues(schema, { ...merged, _rev: result.rev }, result, returning);
  }

  /**
   * Validates each item on its own and submits the accepted ones in one
   * batch. A failing item never blocks its siblings; outcomes follow
   * input order.
   */
  async bulkInsert(
    schema: Schema,
    items: readonly Fields[],
    returning: readonly string[] = DEFAULT_RETURNING,
  ): Promise<BulkInsertOutcome[]> {
    const { plans, accepted, results } = await this.submit(schema, items);
    const orphaned: string[] = [];
    let cursor = 0;

    const outcomes = plans.map(({ doc, admission }): BulkInsertOutcome => {
      if (!admission.ok) {
        return { ok: false, id: doc._id, error: 'constraint_violation', reason: admission.reason };
      }
      const result = results[cursor++];
      if (result === undefined) {
        throw new StoreError(
          `Bulk write returned ${results.length} result(s) for ${accepted.length} document(s)`,
          results,
          'malformed_response',
        );
      }
      if ('error' in result) {
        this.log.warn({ id: result.id, error: result.error }, 'bulk item rejected by store');
        orphaned.push(...admission.reserved);
        return { ok: false, id: result.id, error: result.error, reason: result.reason };
      }
      return {
        ok: true,
        id: result.id,
        rev: result.rev,
        values: returnedValues(schema, { ...doc, _rev: result.rev }, result, returning),
      };
    });

    await this.constraints.release(orphaned);
    return outcomes;
  }

  /**
   * Admits every item, then writes the accepted ones in one batch. When an
   * admission or the batch itself throws, nothing has been written and
   * every marker reserved so far is released.
   */
  private async submit(
    schema: Schema,
    items: readonly Fields[],
  ): Promise<{ plans: Plan[]; accepted: RawDocument[]; results: BulkWriteResult[] }> {
    const plans: Plan[] = [];
    try {
      for (const fields of items) {
        plans.push({ doc: buildDocument(schema, fields), admission: await this.admit(schema, fields) });
      }
      const accepted = plans.filter((p) => p.admission.ok).map((p) => p.doc);
      const results = accepted.length > 0 ? await this.store.bulkPut(accepted) : [];
      return { plans, accepted, results };
    } catch (err) {
      await this.constraints.release(plans.flatMap(({ admission }) => (admission.ok ? admission.reserved : [])));
      throw err;
    }
  }

  async delete(schema: Schema, id: string): Promise<WriteResult> {
    const docId = qualify(schema.namespace, id);
    const current = await this.fetch(docId);
    const rev = current._rev;
    if (rev === undefined) {
      throw new StoreError(`Document ${docId} was returned without a revision`, current, 'malformed_response');
    }

    const result = await this.store.remove(docId, rev);
    this.log.debug({ id: docId }, 'deleted document');
    await this.constraints.release(this.constraints.markerIds(schema, current));
    return result;
  }

  /**
   * Deletes every document of the namespace in pages of `DEFAULT_SCAN_LIMIT`:
   * each page is scanned, then removed in one batch of `_deleted` stubs under
   * the scanned revisions. Markers of deleted documents are released.
   */
  async deleteAll(schema: Schema): Promise<DeleteAllResult> {
    const outcome: DeleteAllResult = { deleted: 0, failures: [] };
    const endKey = `${schema.namespace}${RANGE_END_SENTINEL}`;
    let startKey = schema.namespace;
    let skip = 0;

    for (;;) {
      const page = await this.store.rangeScan({
        startKey,
        endKey,
        limit: DEFAULT_SCAN_LIMIT,
        descending: false,
        includeDocs: true,
        ...(skip > 0 ? { skip } : {}),
      });
      const docs = page.rows.flatMap((row) => {
        const doc = row.doc;
        return doc !== undefined && doc !== null && doc.type === schema.namespace ? [doc] : [];
      });

      const removed = new Set<DocumentId>();
      if (docs.length > 0) {
        const results = await this.store.bulkPut(docs.map(tombstone));
        for (const result of results) {
          if ('error' in result) outcome.failures.push(result);
          else removed.add(result.id);
        }
        await this.constraints.release(
          docs.filter((doc) => removed.has(doc._id)).flatMap((doc) => this.constraints.markerIds(schema, doc)),
        );
        outcome.deleted += removed.size;
      }

      const last = page.rows[page.rows.length - 1];
      if (last === undefined || page.rows.length < DEFAULT_SCAN_LIMIT) break;
      // Resume at the last key; it is still in the store unless this page deleted it.
      startKey = last.id;
      skip = removed.has(last.id) ? 0 : 1;
    }

    this.log.debug({ namespace: schema.namespace, ...outcome }, 'deleted namespace');
    return outcome;
  }

  private async fetch(docId: DocumentId): Promise<RawDocument> {
    const current = await this.store.get(docId);
    if (current === null) throw new NotFoundError(docId);
    return current;
  }

  /** Releases this write's markers again when the document write fails. */
  private async write(reserved: readonly string[], put: () => Promise<WriteResult>): Promise<WriteResult> {
    try {
      return await put();
    } catch (err) {
      await this.constraints.release(reserved);
      throw err;
    }
  }

  /** Per-item constraint check for bulk inserts: a rejection stays local to the item. */
  private async admit(schema: Schema, fields: Fields): Promise<Admission> {
    const results = await this.constraints.validate(schema, fields);
    const violations = collectViolations(results);
    if (violations.length > 0) {
      return { ok: false, reason: violations.map((v) => `${v.kind} ${v.constraint.name}`).join(', ') };
    }
    for (const r of results) {
      if (r.status === 'error') return { ok: false, reason: `${r.constraint.name}: ${r.reason}` };
    }
    try {
      return { ok: true, reserved: await this.constraints.reserve(results) };
    } catch (err) {
      if (err instanceof ConstraintViolationError) return { ok: false, reason: err.message };
      throw err;
    }
  }
}

/** Qualifies the caller's local id (or a fresh UUID) and tags the namespace. */
function buildDocument(schema: Schema, fields: Fields): RawDocument {
  const localId = fields[schema.primaryKey] ?? fields['_id'] ?? uuidv4();
  const body = withoutKeys(fields, schema);
  return {
    ...body,
    _id: qualify(schema.namespace, String(localId)),
    type: schema.namespace,
  };
}

function withoutKeys(fields: Fields, schema: Schema): Fields {
  const { _id: _ignoredId, _rev: _ignoredRev, ...rest } = fields;
  if (schema.primaryKey !== '_id') delete rest[schema.primaryKey];
  return rest;
}

function tombstone(doc: RawDocument): RawDocument {
  return { _id: doc._id, ...(doc._rev !== undefined ? { _rev: doc._rev } : {}), _deleted: true };
}

function returnedValues(
  schema: Schema,
  doc: RawDocument,
  result: WriteResult,
  returning: readonly string[],
): ReturnedValues {
  const values: ReturnedValues = {};
  for (const field of returning) {
    if (field === '_id') values[field] = result.id;
    else if (field === '_rev') values[field] = result.rev;
    else if (field === schema.primaryKey) values[field] = unqualify(schema.namespace, result.id);
    else values[field] = doc[field] ?? null;
  }
  return values;
}
