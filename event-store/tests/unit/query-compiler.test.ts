import { describe, it, expect } from 'vitest';
import { query } from '../../src/query/query-object.js';
import {
  compileLoadQuery,
  compileVersionCheckQuery,
  compileStreamQuery,
  compileCanonicalKey,
} from '../../src/query/compiler.js';

describe('compileLoadQuery', () => {
  it('single type without a match', () => {
    const { sql, params } = compileLoadQuery(query.eventsOfType('AccountOpened'));
    expect(params).toEqual(['AccountOpened']);
    expect(sql).toBe([
      'SELECT global_position, event_id, type, payload, metadata, occurred_at',
      'FROM events',
      'WHERE type = $1',
      'ORDER BY global_position ASC',
    ].join('\n'));
  });

  it('several types share one ANY() parameter', () => {
    const { sql, params } = compileLoadQuery(
      query.eventsOfType('AccountOpened', 'AccountClosed').where({ accountId: 'a1' }),
    );
    expect(params).toEqual([['AccountOpened', 'AccountClosed'], '{"accountId":"a1"}']);
    expect(sql).toContain('WHERE (type = ANY($1::text[]) AND payload @> $2::jsonb)');
  });

  it('match entries become one containment parameter', () => {
    const { params } = compileLoadQuery(query.eventsOfType('A').where({ studentId: 's1', courseId: 'c1' }));
    expect(params[1]).toBe('{"studentId":"s1","courseId":"c1"}');
  });

  it('ORs clauses together with sequential parameters', () => {
    const { sql, params } = compileLoadQuery(
      query.eventsOfType('A').where({ id: '1' }).eventsOfType('B'),
    );
    expect(params).toEqual(['A', '{"id":"1"}', 'B']);
    expect(sql).toContain('WHERE ((type = $1 AND payload @> $2::jsonb) OR type = $3)');
  });

  it('rejects a query without clauses', () => {
    expect(() => compileLoadQuery({ _clauses: [] })).toThrow('Cannot compile a query without clauses');
  });
});

describe('compileVersionCheckQuery', () => {
  it('selects the max position with the same WHERE clause', () => {
    const { sql, params } = compileVersionCheckQuery(query.eventsOfType('A').where({ id: '1' }));
    expect(params).toEqual(['A', '{"id":"1"}']);
    expect(sql).toBe([
      'SELECT COALESCE(MAX(global_position), 0) AS max_pos',
      'FROM events',
      'WHERE (type = $1 AND payload @> $2::jsonb)',
    ].join('\n'));
  });
});

describe('compileStreamQuery', () => {
  it('appends keyset position and limit parameters', () => {
    const { sql, params } = compileStreamQuery(query.eventsOfType('A'), 5n, 10);
    expect(params).toEqual(['A', '5', 10]);
    expect(sql).toContain('WHERE type = $1 AND global_position > $2');
    expect(sql).toContain('LIMIT $3');
  });

  it('keeps an OR of clauses parenthesised before the position filter', () => {
    const { sql } = compileStreamQuery(query.eventsOfType('A').eventsOfType('B'), 0n, 50);
    expect(sql).toContain('WHERE (type = $1 OR type = $2) AND global_position > $3');
  });
});

describe('compileCanonicalKey', () => {
  it('sorts types and match keys', () => {
    expect(compileCanonicalKey(query.eventsOfType('B', 'A').where({ y: 2, x: 1 })))
      .toBe('[{"types":["A","B"],"match":[["x",1],["y",2]]}]');
  });

  it('is independent of clause order', () => {
    const first = query.eventsOfType('A').where({ id: '1' }).eventsOfType('B');
    const second = query.eventsOfType('B').eventsOfType('A').where({ id: '1' });
    expect(compileCanonicalKey(first)).toBe(compileCanonicalKey(second));
  });

  it('differs when a match value differs', () => {
    expect(compileCanonicalKey(query.eventsOfType('A').where({ id: '1' })))
      .not.toBe(compileCanonicalKey(query.eventsOfType('A').where({ id: '2' })));
  });
});
