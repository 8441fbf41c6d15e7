import type { SortDirection } from '../types.js';
import type { OrderBy, Predicate, QueryDefinition } from './types.js';

interface BuilderState {
  namespace: string;
  primaryKey: string;
  where: Predicate | null;
  fields: readonly string[] | null;
  orderBy: readonly OrderBy[];
  limit: number | null;
  skip: number | null;
}

/**
 * Combines a new predicate with the existing one. Same-kind combinators
 * accumulate flatly; a different kind wraps both.
 */
function combine(existing: Predicate | null, kind: 'and' | 'or', next: Predicate): Predicate {
  if (existing === null) return next;
  if (existing.kind === kind) {
    return { kind, predicates: [...existing.predicates, next] };
  }
  return { kind, predicates: [existing, next] };
}

/**
 * Fluent immutable query builder. Implements QueryDefinition so it can be
 * passed directly to compile() and DocumentRepository.all(). Every
 * operation returns a new QueryBuilder.
 */
export class QueryBuilder implements QueryDefinition {
  constructor(private readonly state: BuilderState) {}

  get _namespace(): string {
    return this.state.namespace;
  }

  get _primaryKey(): string {
    return this.state.primaryKey;
  }

  get _where(): Predicate | null {
    return this.state.where;
  }

  get _fields(): readonly string[] | null {
    return this.state.fields;
  }

  get _orderBy(): readonly OrderBy[] {
    return this.state.orderBy;
  }

  get _limit(): number | null {
    return this.state.limit;
  }

  get _skip(): number | null {
    return this.state.skip;
  }

  /** Replace the filter. */
  where(predicate: Predicate): QueryBuilder {
    return this.with({ where: predicate });
  }

  /** Combine with the existing filter using AND. */
  and(predicate: Predicate): QueryBuilder {
    return this.with({ where: combine(this.state.where, 'and', predicate) });
  }

  /** Combine with the existing filter using OR. */
  or(predicate: Predicate): QueryBuilder {
    return this.with({ where: combine(this.state.where, 'or', predicate) });
  }

  select(...fields: string[]): QueryBuilder {
    return this.with({ fields });
  }

  orderBy(field: string, direction: SortDirection = 'asc'): QueryBuilder {
    return this.with({ orderBy: [...this.state.orderBy, { field, direction }] });
  }

  limit(n: number): QueryBuilder {
    return this.with({ limit: n });
  }

  skip(n: number): QueryBuilder {
    return this.with({ skip: n });
  }

  private with(patch: Partial<BuilderState>): QueryBuilder {
    return new QueryBuilder({ ...this.state, ...patch });
  }
}
