import { StoreError } from '../errors.js';
import type { FieldMeta, FieldType } from '../schema.js';
import type { ProjectionResult, StoreResponse } from '../types.js';

type Doc = Record<string, unknown>;

/** Zero value per semantic type. Containers are built fresh for every row. */
export function zeroValue(type: FieldType): unknown {
  switch (type) {
    case 'string':
    case 'binary_id':
      return '';
    case 'integer':
    case 'float':
      return 0;
    case 'boolean':
      return false;
    case 'list':
      return [];
    case 'map':
      return {};
  }
}

/**
 * Shapes a raw store response into `(count, rows)`, one row of
 * `fields.length` values per document, in field order.
 *
 * With `fieldMeta`, absent fields take their type's zero value so every
 * row has the same arity whatever keys the document carries. Without it,
 * absent fields take `defaults[field]`, or null.
 *
 * Throws StoreError when the response is a backend error payload.
 */
export function project(
  raw: StoreResponse | undefined,
  fields: readonly string[],
  fieldMeta?: FieldMeta,
  defaults: Readonly<Record<string, unknown>> = {},
): ProjectionResult {
  const docs = extractDocuments(raw);
  const rows = docs.map((doc) =>
    fieldMeta === undefined ? plainRow(doc, fields, defaults) : typedRow(doc, fields, fieldMeta),
  );
  return { count: rows.length, rows };
}

function extractDocuments(raw: unknown): Doc[] {
  if (raw === null || raw === undefined) return [];

  if (Array.isArray(raw)) {
    return raw.filter(isDoc);
  }
  if (!isDoc(raw)) {
    throw new StoreError(`Malformed store response: ${JSON.stringify(raw)}`, undefined, 'malformed_response');
  }
  if (isErrorPayload(raw)) {
    const reason = typeof raw['reason'] === 'string' ? raw['reason'] : 'unknown';
    throw new StoreError(`${String(raw['error'])} :: ${reason}`, raw, String(raw['error']));
  }

  const rows = raw['rows'];
  if (Array.isArray(rows)) {
    return rows.flatMap((row: unknown) => rowDocument(row));
  }
  const docs = raw['docs'];
  if (Array.isArray(docs)) {
    return docs.filter(isDoc);
  }
  return [raw];
}

/** Rows without a document (missing or deleted keys) yield nothing. */
function rowDocument(row: unknown): Doc[] {
  if (!isDoc(row)) return [];
  if (!('doc' in row)) return 'error' in row ? [] : [row];
  const doc = row['doc'];
  return isDoc(doc) ? [doc] : [];
}

function plainRow(doc: Doc, fields: readonly string[], defaults: Readonly<Record<string, unknown>>): unknown[] {
  return fields.map((field) => {
    const value = doc[field];
    return value !== undefined ? value : (defaults[field] ?? null);
  });
}

function typedRow(doc: Doc, fields: readonly string[], fieldMeta: FieldMeta): unknown[] {
  return fields.map((field) => {
    const value = doc[field];
    if (value !== undefined) return value;
    const type = fieldMeta[field];
    return type === undefined ? null : zeroValue(type);
  });
}

function isDoc(value: unknown): value is Doc {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isErrorPayload(doc: Doc): boolean {
  return typeof doc['error'] === 'string' && !('_id' in doc);
}
