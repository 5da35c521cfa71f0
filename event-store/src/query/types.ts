export type MatchValue = string | number | boolean;

/** Payload entries an event must contain (JSONB containment). */
export type PayloadMatch = Readonly<Record<string, MatchValue>>;

export interface Clause {
  readonly types: readonly string[];
  readonly match: PayloadMatch | null;
}

/**
 * Opaque query value passed to load(), append() and stream().
 * Built exclusively via the query DSL — do not construct directly.
 */
export interface QueryDefinition {
  readonly _clauses: readonly Clause[];
}
