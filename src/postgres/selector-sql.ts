import { StoreError } from '../errors.js';
import type { FindRequest, Selector } from '../types.js';

export interface CompiledSql {
  sql: string;
  params: unknown[];
}

const COMPARISONS: Readonly<Record<string, string>> = {
  $eq: '=',
  $ne: '<>',
  $gt: '>',
  $lt: '<',
  $gte: '>=',
  $lte: '<=',
};

/**
 * Pushes a parameter and returns its placeholder. Uses a shared counter
 * object so recursive calls share the same sequence.
 */
function bind(value: unknown, params: unknown[], counter: { n: number }): string {
  params.push(value);
  counter.n += 1;
  return `$${counter.n}`;
}

function fieldRef(field: string, params: unknown[], counter: { n: number }): string {
  // Id and revision live in their own columns, not in the body.
  if (field === '_id') return 'to_jsonb(id)';
  if (field === '_rev') return 'to_jsonb(rev)';
  return `(body #> ${bind(field.split('.'), params, counter)}::text[])`;
}

function jsonParam(value: unknown, params: unknown[], counter: { n: number }): string {
  return `${bind(JSON.stringify(value), params, counter)}::jsonb`;
}

function compileCondition(
  field: string,
  condition: unknown,
  params: unknown[],
  counter: { n: number },
): string {
  if (!isOperatorMap(condition)) {
    return `${fieldRef(field, params, counter)} = ${jsonParam(condition, params, counter)}`;
  }

  const parts = Object.entries(condition).map(([op, value]) => {
    const comparison = COMPARISONS[op];
    if (comparison !== undefined) {
      return `${fieldRef(field, params, counter)} ${comparison} ${jsonParam(value, params, counter)}`;
    }
    if (op === '$in') {
      if (!Array.isArray(value)) throw unsupported(`$in on "${field}" expects a list`);
      return `${jsonParam(value, params, counter)} @> jsonb_build_array(${fieldRef(field, params, counter)})`;
    }
    if (op === '$exists') {
      return `${fieldRef(field, params, counter)} IS ${value === false ? '' : 'NOT '}NULL`;
    }
    throw unsupported(`operator ${op}`);
  });
  return parts.length > 1 ? `(${parts.join(' AND ')})` : parts.join('');
}

function compileList(
  op: '$and' | '$or',
  clauses: unknown,
  params: unknown[],
  counter: { n: number },
): string {
  if (!Array.isArray(clauses) || clauses.length === 0) {
    throw unsupported(`${op} expects a non-empty list`);
  }
  const parts = clauses.map((clause: unknown) => {
    if (!isObject(clause)) throw unsupported(`${op} entries must be selectors`);
    return compileSelector(clause, params, counter);
  });
  return `(${parts.join(op === '$and' ? ' AND ' : ' OR ')})`;
}

/** Translates a Mango selector into a SQL boolean expression over `body`. */
export function compileSelector(selector: Selector, params: unknown[], counter: { n: number }): string {
  const parts = Object.entries(selector).map(([key, value]) => {
    if (key === '$and' || key === '$or') return compileList(key, value, params, counter);
    if (key.startsWith('$')) throw unsupported(`operator ${key}`);
    return compileCondition(key, value, params, counter);
  });
  if (parts.length === 0) return 'TRUE';
  return parts.length > 1 ? `(${parts.join(' AND ')})` : parts.join('');
}

/** Compiles a find request into a full SELECT over the documents table. */
export function compileFindQuery(table: string, request: FindRequest): CompiledSql {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const where = compileSelector(request.selector, params, counter);

  const order = (request.sort ?? []).flatMap((entry) =>
    Object.entries(entry).map(
      ([field, direction]) => `${fieldRef(field, params, counter)} ${direction === 'desc' ? 'DESC' : 'ASC'}`,
    ),
  );

  const lines = ['SELECT id, rev, body', `FROM ${table}`, `WHERE ${where}`];
  if (order.length > 0) lines.push(`ORDER BY ${order.join(', ')}`);
  if (request.limit !== undefined) lines.push(`LIMIT ${bind(request.limit, params, counter)}`);
  if (request.skip !== undefined) lines.push(`OFFSET ${bind(request.skip, params, counter)}`);

  return { sql: lines.join('\n'), params };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOperatorMap(value: unknown): value is Record<string, unknown> {
  if (!isObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((k) => k.startsWith('$'));
}

function unsupported(what: string): StoreError {
  return new StoreError(`Unsupported selector: ${what}`, undefined, 'bad_request');
}
