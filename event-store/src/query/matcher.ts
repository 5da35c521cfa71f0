import type { Clause, QueryDefinition } from './types.js';

interface MatchableEvent {
  type: string;
  payload: object;
}

function payloadContains(payload: object, match: Clause['match']): boolean {
  if (match === null) return true;
  for (const [key, expected] of Object.entries(match)) {
    const actual: unknown = Object.getOwnPropertyDescriptor(payload, key)?.value;
    if (actual !== expected) return false;
  }
  return true;
}

/**
 * In-memory evaluation of a query with the same semantics as the SQL compiler:
 * type membership per clause, JSONB containment for scalar match entries, and
 * OR across clauses.
 */
export function matchesQuery(query: QueryDefinition, event: MatchableEvent): boolean {
  return query._clauses.some(
    (clause) => clause.types.includes(event.type) && payloadContains(event.payload, clause.match),
  );
}
