import type { ModelSchema } from '../model/schema.js';
import { QueryBuilder } from './builder.js';

/**
 * Entry point for building queries without an engine. Use
 * `engine.from(model)` for a builder that can also execute.
 *
 * @example
 * query.from(employees)
 *   .filter([['age', '>=', 18], ['status', '=', 'active']])
 *   .orderBy('salary', 'desc')
 *   .limit(10)
 *   .compile()
 */
export const query = {
  from(model: ModelSchema): QueryBuilder {
    return new QueryBuilder(model);
  },
};
