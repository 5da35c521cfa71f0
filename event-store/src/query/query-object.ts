import { ClauseBuilder, startQuery } from './builder.js';
import type { QueryDefinition } from './types.js';

export interface QueryEntry<T extends string> {
  eventsOfType(...types: [T, ...T[]]): ClauseBuilder<T>;
  /** Union of several queries, e.g. two consistency boundaries loaded together. */
  union(first: QueryDefinition, ...rest: QueryDefinition[]): ClauseBuilder<T>;
}

/**
 * Entry point for the query DSL, typed on an application's event type names.
 *
 * @example
 * const q = queryFor<'OrderCreated' | 'OrderShipped'>();
 * q.eventsOfType('OrderCreated', 'OrderShipped').where({ orderId: 'o1' })
 *   .eventsOfType('OrderShipped').where({ region: 'EU' })
 */
export function queryFor<T extends string>(): QueryEntry<T> {
  return {
    eventsOfType(...types) {
      return startQuery(types);
    },
    union(first, ...rest) {
      return rest.reduce<ClauseBuilder<T>>(
        (acc, next) => acc.including(next),
        new ClauseBuilder<T>(first._clauses),
      );
    },
  };
}

/** Untyped entry point; accepts any event type name. */
export const query: QueryEntry<string> = queryFor<string>();
