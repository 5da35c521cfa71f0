import type { Clause, PayloadMatch, QueryDefinition } from './types.js';

function uniqueTypes(types: readonly string[]): string[] {
  if (types.length === 0) {
    throw new Error('eventsOfType requires at least one event type');
  }
  for (const type of types) {
    if (type.trim() === '') {
      throw new Error('eventsOfType: event type must be a non-empty string');
    }
  }
  return [...new Set(types)];
}

/**
 * Immutable query under construction. Implements QueryDefinition so it can
 * be passed directly to load(), append() and stream(). Every operation returns
 * a new ClauseBuilder — existing instances are never mutated.
 *
 * `T` narrows the accepted event type names to an application's union.
 */
export class ClauseBuilder<T extends string = string> implements QueryDefinition {
  constructor(readonly _clauses: readonly Clause[]) {}

  /**
   * Restrict the last clause to events whose payload contains every entry of
   * `match`. Calling where() again on the same clause merges the entries.
   */
  where(match: PayloadMatch): ClauseBuilder<T> {
    if (Object.keys(match).length === 0) {
      throw new Error('where() requires at least one payload entry');
    }
    const last = this._clauses[this._clauses.length - 1];
    if (last === undefined) {
      throw new Error('where() called on a query without clauses');
    }
    const merged: Clause = { types: last.types, match: { ...(last.match ?? {}), ...match } };
    return new ClauseBuilder<T>([...this._clauses.slice(0, -1), merged]);
  }

  /** Append a new clause matching any of the given event types. */
  eventsOfType(...types: [T, ...T[]]): ClauseBuilder<T> {
    return new ClauseBuilder<T>([...this._clauses, { types: uniqueTypes(types), match: null }]);
  }

  /** Append every clause of another query, widening this one to their union. */
  including(other: QueryDefinition): ClauseBuilder<T> {
    return new ClauseBuilder<T>([...this._clauses, ...other._clauses]);
  }
}

export function startQuery<T extends string>(types: readonly T[]): ClauseBuilder<T> {
  return new ClauseBuilder<T>([{ types: uniqueTypes(types), match: null }]);
}
