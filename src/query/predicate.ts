import type { ComparisonOperator, Placeholder, Predicate } from './types.js';

export function param(index: number): Placeholder {
  return { kind: 'placeholder', index };
}

export function eq(field: string, value: unknown): Predicate {
  return { kind: 'eq', field, value };
}

export function cmp(op: ComparisonOperator, field: string, value: unknown): Predicate {
  return { kind: 'cmp', op, field, value };
}

export const gt = (field: string, value: unknown): Predicate => cmp('>', field, value);
export const lt = (field: string, value: unknown): Predicate => cmp('<', field, value);
export const gte = (field: string, value: unknown): Predicate => cmp('>=', field, value);
export const lte = (field: string, value: unknown): Predicate => cmp('<=', field, value);
export const ne = (field: string, value: unknown): Predicate => cmp('!=', field, value);

/** `values` is either a list (elements may be placeholders) or a placeholder bound to a list. */
export function isIn(field: string, values: readonly unknown[] | Placeholder): Predicate {
  return { kind: 'in', field, values };
}

export function and(...predicates: Predicate[]): Predicate {
  return { kind: 'and', predicates };
}

export function or(...predicates: Predicate[]): Predicate {
  return { kind: 'or', predicates };
}

export function isPlaceholder(value: unknown): value is Placeholder {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'placeholder' &&
    'index' in value &&
    typeof value.index === 'number'
  );
}
