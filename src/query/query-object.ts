import type { Schema } from '../schema.js';
import { QueryBuilder } from './builder.js';

/**
 * Entry point for the query DSL.
 *
 * @example
 * query.from(User)
 *   .where(and(eq('email', param(0)), gte('age', 18)))
 *   .orderBy('name', 'desc')
 *   .limit(10)
 */
export const query = {
  from(schema: Pick<Schema, 'namespace' | 'primaryKey'>): QueryBuilder {
    return new QueryBuilder({
      namespace: schema.namespace,
      primaryKey: schema.primaryKey,
      where: null,
      fields: null,
      orderBy: [],
      limit: null,
      skip: null,
    });
  },
};
