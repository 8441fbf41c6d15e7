import { ValidationError } from '../errors.js';
import { qualify } from '../namespace.js';
import type { DocumentId, Selector } from '../types.js';
import { isPlaceholder } from './predicate.js';
import type { CompiledQuery, Predicate, QueryDefinition, SelectorOptions } from './types.js';

export type CompileResult =
  | { readonly ok: true; readonly query: CompiledQuery }
  | { readonly ok: false; readonly error: ValidationError };

/** Limit applied to a collection scan when the query sets none. */
export const DEFAULT_SCAN_LIMIT = 100;

/**
 * Appended to the namespace to form the upper bound of a collection scan.
 * `{` sorts after every character commonly used in local ids and `/{}`
 * sorts before the next namespace sharing the prefix.
 */
export const RANGE_END_SENTINEL = '/{}';

const OPERATORS: Readonly<Record<string, string>> = {
  '==': '$eq',
  '>': '$gt',
  '<': '$lt',
  '>=': '$gte',
  '<=': '$lte',
  '!=': '$ne',
  in: '$in',
};

const COMPARISONS: ReadonlySet<string> = new Set(['>', '<', '>=', '<=', '!=']);

/**
 * Compiles a QueryDefinition and its positional parameters into a store
 * directive. Pure: identical inputs always yield an identical result.
 * Conditions a caller can trigger come back as `{ ok: false, error }`.
 */
export function compile(query: QueryDefinition, params: readonly unknown[] = []): CompileResult {
  try {
    return { ok: true, query: compileQuery(query, params) };
  } catch (err) {
    if (err instanceof ValidationError) return { ok: false, error: err };
    throw err;
  }
}

function compileQuery(query: QueryDefinition, params: readonly unknown[]): CompiledQuery {
  const where = query._where;

  if (where === null || isEmptyCombinator(where)) {
    return compileRangeScan(query);
  }

  if (where.kind === 'eq' && isPrimaryKey(query, where.field)) {
    const value = resolveValue(where.value, params);
    if (Array.isArray(value)) {
      return { kind: 'batch_get', ids: value.map((v: unknown) => toDocumentId(query, v)) };
    }
    return { kind: 'point_get', id: toDocumentId(query, value) };
  }

  if (where.kind === 'in' && isPrimaryKey(query, where.field)) {
    const values = resolveList(where.values, params);
    return { kind: 'batch_get', ids: values.map((v) => toDocumentId(query, v)) };
  }

  const filter = translate(where, query, params);
  return {
    kind: 'selector',
    selector: mergeSelectors({ type: query._namespace }, filter),
    options: compileOptions(query),
  };
}

function compileRangeScan(query: QueryDefinition): CompiledQuery {
  const lower = query._namespace;
  const upper = `${query._namespace}${RANGE_END_SENTINEL}`;
  // Scans are ordered by key, so a descending traversal walks from the upper bound down.
  const descending = query._orderBy[0]?.direction === 'desc';
  const skip = checkCount('skip', query._skip);

  return {
    kind: 'range_scan',
    startKey: descending ? upper : lower,
    endKey: descending ? lower : upper,
    limit: checkCount('limit', query._limit) ?? DEFAULT_SCAN_LIMIT,
    descending,
    ...(skip !== null ? { skip } : {}),
  };
}

function compileOptions(query: QueryDefinition): SelectorOptions {
  const limit = checkCount('limit', query._limit);
  const skip = checkCount('skip', query._skip);
  return {
    ...(query._fields !== null ? { fields: compileFields(query, query._fields) } : {}),
    ...(query._orderBy.length > 0
      ? { sort: query._orderBy.map((o) => ({ [storedField(query, o.field)]: o.direction })) }
      : {}),
    ...(limit !== null ? { limit } : {}),
    ...(skip !== null ? { skip } : {}),
  };
}

/**
 * Projected documents always carry `_id`, so rows can be matched back to
 * their document and a differently named primary key read from it.
 */
function compileFields(query: QueryDefinition, fields: readonly string[]): string[] {
  const stored = [...new Set(fields.map((f) => storedField(query, f)))];
  return stored.includes('_id') ? stored : ['_id', ...stored];
}

/** The primary key is stored as `_id`; every other field keeps its name. */
function storedField(query: QueryDefinition, field: string): string {
  return isPrimaryKey(query, field) ? '_id' : field;
}

/**
 * Recursively translates a predicate tree into a Mango selector fragment.
 * Conditions on the primary key are rewritten onto qualified `_id` values.
 */
function translate(node: Predicate, query: QueryDefinition, params: readonly unknown[]): Selector {
  switch (node.kind) {
    case 'eq': {
      const field = checkField(node.field);
      const value = resolveValue(node.value, params);
      if (isPrimaryKey(query, field)) {
        return Array.isArray(value)
          ? { _id: { $in: value.map((v: unknown) => toDocumentId(query, v)) } }
          : { _id: toDocumentId(query, value) };
      }
      // A bare object would read as an operator map.
      return { [field]: isPlainObject(value) ? { $eq: value } : value };
    }
    case 'cmp': {
      // Trees may be assembled from untyped input, so the operator is checked at runtime.
      const op: string = node.op;
      const operator = COMPARISONS.has(op) ? OPERATORS[op] : undefined;
      if (operator === undefined) {
        throw new ValidationError('unsupported_operator', `Unsupported operator: ${op}`);
      }
      const field = checkField(node.field);
      const value = resolveValue(node.value, params);
      return isPrimaryKey(query, field)
        ? { _id: { [operator]: toDocumentId(query, value) } }
        : { [field]: { [operator]: value } };
    }
    case 'in': {
      const field = checkField(node.field);
      const values = resolveList(node.values, params);
      return isPrimaryKey(query, field)
        ? { _id: { $in: values.map((v) => toDocumentId(query, v)) } }
        : { [field]: { $in: values } };
    }
    case 'and':
      return node.predicates.reduce<Selector>(
        (acc, child) => mergeSelectors(acc, translate(child, query, params)),
        {},
      );
    case 'or':
      if (node.predicates.length === 0) {
        throw new ValidationError('malformed_predicate', 'An or() needs at least one predicate');
      }
      // Kept as an explicit list: flattening would lose the grouping.
      return { $or: node.predicates.map((child) => translate(child, query, params)) };
    case 'placeholder':
      throw new ValidationError('malformed_predicate', 'A placeholder cannot stand in for a predicate');
    default: {
      const unknownNode: unknown = node;
      throw new ValidationError('malformed_predicate', `Unknown predicate node: ${JSON.stringify(unknownNode)}`);
    }
  }
}

/**
 * Merges two selector fragments at the same level. Operator maps on the
 * same field are combined; anything that would overwrite a condition is
 * moved into `$and` instead.
 */
function mergeSelectors(target: Selector, addition: Selector): Selector {
  const merged: Selector = { ...target };

  for (const [key, value] of Object.entries(addition)) {
    if (!(key in merged)) {
      merged[key] = value;
      continue;
    }
    const current = merged[key];
    if (key === '$and' && Array.isArray(current) && Array.isArray(value)) {
      merged[key] = [...current, ...value];
      continue;
    }
    const combined = combineConditions(current, value);
    if (combined !== undefined) {
      merged[key] = combined;
      continue;
    }
    const existing = merged['$and'];
    merged['$and'] = Array.isArray(existing) ? [...existing, { [key]: value }] : [{ [key]: value }];
  }

  return merged;
}

function combineConditions(a: unknown, b: unknown): unknown {
  if (JSON.stringify(a) === JSON.stringify(b)) return a;

  const aOps = isOperatorMap(a) ? a : null;
  const bOps = isOperatorMap(b) ? b : null;

  if (aOps !== null && bOps !== null) {
    const shared = Object.keys(bOps).some((op) => op in aOps);
    return shared ? undefined : { ...aOps, ...bOps };
  }
  if (aOps === null && bOps !== null && !('$eq' in bOps)) {
    return { $eq: a, ...bOps };
  }
  if (aOps !== null && bOps === null && !('$eq' in aOps)) {
    return { ...aOps, $eq: b };
  }
  return undefined;
}

function resolveValue(value: unknown, params: readonly unknown[]): unknown {
  if (isPlaceholder(value)) {
    const { index } = value;
    if (!Number.isInteger(index) || index < 0 || index >= params.length) {
      throw new ValidationError(
        'placeholder_out_of_range',
        `Placeholder $${index} is out of range for ${params.length} parameter(s)`,
      );
    }
    return params[index];
  }
  if (Array.isArray(value)) {
    return value.map((v: unknown) => resolveValue(v, params));
  }
  return value;
}

function resolveList(values: unknown, params: readonly unknown[]): unknown[] {
  const resolved = resolveValue(values, params);
  if (!Array.isArray(resolved)) {
    throw new ValidationError('malformed_predicate', 'in() expects a list of values');
  }
  return resolved;
}

function toDocumentId(query: QueryDefinition, value: unknown): DocumentId {
  if (typeof value === 'string' || typeof value === 'number') {
    return qualify(query._namespace, String(value));
  }
  throw new ValidationError(
    'malformed_predicate',
    `Primary key values must be strings or numbers, got ${JSON.stringify(value)}`,
  );
}

function isPrimaryKey(query: QueryDefinition, field: string): boolean {
  return field === query._primaryKey || field === '_id';
}

function isEmptyCombinator(node: Predicate): boolean {
  return (node.kind === 'and' || node.kind === 'or') && node.predicates.length === 0;
}

function checkField(field: unknown): string {
  if (typeof field !== 'string' || field === '') {
    throw new ValidationError('malformed_predicate', 'Predicate field must be a non-empty string');
  }
  return field;
}

function checkCount(option: 'limit' | 'skip', value: number | null): number | null {
  if (value !== null && (!Number.isInteger(value) || value < 0)) {
    throw new ValidationError('invalid_option', `${option} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperatorMap(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((k) => k.startsWith('$'));
}
