import type { QueryDefinition, Clause } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

const SELECT_COLUMNS = 'SELECT global_position, event_id, type, payload, metadata, occurred_at';

/**
 * Compiles a single Clause into a SQL fragment and appends parameters.
 * Uses a shared counter object so all clauses share the same sequence.
 */
function compileClause(
  clause: Clause,
  params: unknown[],
  counter: { n: number },
): string {
  let typeSQL: string;
  if (clause.types.length === 1) {
    params.push(clause.types[0]);
    counter.n += 1;
    typeSQL = `type = $${counter.n}`;
  } else {
    params.push([...clause.types]);
    counter.n += 1;
    typeSQL = `type = ANY($${counter.n}::text[])`;
  }

  if (clause.match === null) {
    return typeSQL;
  }

  params.push(JSON.stringify(clause.match));
  counter.n += 1;
  return `(${typeSQL} AND payload @> $${counter.n}::jsonb)`;
}

/**
 * Compiles all clauses of a QueryDefinition into a WHERE clause SQL fragment.
 */
function compileWhereClause(
  query: QueryDefinition,
  params: unknown[],
  counter: { n: number },
): string {
  const clauses = query._clauses;
  if (clauses.length === 0) {
    throw new Error('Cannot compile a query without clauses');
  }

  const parts = clauses.map((clause) => compileClause(clause, params, counter));
  return parts.length === 1 ? `WHERE ${parts[0]}` : `WHERE (${parts.join(' OR ')})`;
}

/**
 * Compiles a QueryDefinition into a full SELECT query ordered by global_position ASC.
 */
export function compileLoadQuery(query: QueryDefinition): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const whereClause = compileWhereClause(query, params, counter);

  const sql = [
    SELECT_COLUMNS,
    'FROM events',
    whereClause,
    'ORDER BY global_position ASC',
  ].join('\n');

  return { sql, params };
}

/**
 * Compiles a QueryDefinition into a SELECT COALESCE(MAX(global_position), 0) query.
 * Used for version/concurrency checks. No ORDER BY.
 */
export function compileVersionCheckQuery(query: QueryDefinition): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const whereClause = compileWhereClause(query, params, counter);

  const sql = [
    'SELECT COALESCE(MAX(global_position), 0) AS max_pos',
    'FROM events',
    whereClause,
  ].join('\n');

  return { sql, params };
}

/**
 * Compiles a QueryDefinition into a keyset-paginated SELECT query.
 * Appends AND global_position > $N LIMIT $M to the WHERE clause.
 */
export function compileStreamQuery(
  query: QueryDefinition,
  afterPosition: bigint,
  batchSize: number,
): CompiledQuery {
  const params: unknown[] = [];
  const counter = { n: 0 };
  const whereClause = compileWhereClause(query, params, counter);

  params.push(afterPosition.toString());
  counter.n += 1;
  const positionRef = `$${counter.n}`;

  params.push(batchSize);
  counter.n += 1;
  const limitRef = `$${counter.n}`;

  const sql = [
    SELECT_COLUMNS,
    'FROM events',
    `${whereClause} AND global_position > ${positionRef}`,
    'ORDER BY global_position ASC',
    `LIMIT ${limitRef}`,
  ].join('\n');

  return { sql, params };
}

/**
 * Produces a stable canonical string representation of a QueryDefinition.
 * Independent of clause order, type order within a clause and key order within
 * a match. Used as the default advisory lock key.
 */
export function compileCanonicalKey(query: QueryDefinition): string {
  const canonical = query._clauses.map((clause) => {
    const types = [...clause.types].sort();
    const match = clause.match === null
      ? null
      : Object.entries(clause.match).sort(([a], [b]) => a.localeCompare(b));
    return JSON.stringify({ types, match });
  });

  return `[${canonical.sort().join(',')}]`;
}
