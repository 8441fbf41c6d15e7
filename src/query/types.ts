import type { DocumentId, FindRequest, SortDirection } from '../types.js';

/** Positional reference into the parameter list supplied at compile time. */
export interface Placeholder {
  readonly kind: 'placeholder';
  readonly index: number;
}

export type ComparisonOperator = '>' | '<' | '>=' | '<=' | '!=';

export type Predicate =
  | { readonly kind: 'eq'; readonly field: string; readonly value: unknown }
  | { readonly kind: 'cmp'; readonly op: ComparisonOperator; readonly field: string; readonly value: unknown }
  | { readonly kind: 'and'; readonly predicates: readonly Predicate[] }
  | { readonly kind: 'or'; readonly predicates: readonly Predicate[] }
  | { readonly kind: 'in'; readonly field: string; readonly values: unknown }
  | Placeholder;

export interface OrderBy {
  readonly field: string;
  readonly direction: SortDirection;
}

/**
 * Opaque query value passed to compile() and DocumentRepository.all().
 * Built via the query DSL.
 */
export interface QueryDefinition {
  readonly _namespace: string;
  readonly _primaryKey: string;
  readonly _where: Predicate | null;
  readonly _fields: readonly string[] | null;
  readonly _orderBy: readonly OrderBy[];
  readonly _limit: number | null;
  readonly _skip: number | null;
}

export type SelectorOptions = Omit<FindRequest, 'selector'>;

export type CompiledQuery =
  | { readonly kind: 'point_get'; readonly id: DocumentId }
  | { readonly kind: 'batch_get'; readonly ids: readonly DocumentId[] }
  | { readonly kind: 'selector'; readonly selector: Record<string, unknown>; readonly options: SelectorOptions }
  | {
      readonly kind: 'range_scan';
      readonly startKey: string;
      readonly endKey: string;
      readonly limit: number;
      readonly descending: boolean;
      readonly skip?: number;
    };
