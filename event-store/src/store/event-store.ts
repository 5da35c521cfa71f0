import pg from 'pg';
import type { QueryDefinition } from '../query/types.js';
import type {
  DomainEvent,
  EventCodec,
  NewEvent,
  StoredEvent,
  LoadResult,
  AppendOptions,
  StreamOptions,
  EventStore,
} from '../types.js';
import { ConcurrencyError, EventDecodeError, EventStoreError } from '../errors.js';
import { compileLoadQuery, compileVersionCheckQuery, compileStreamQuery } from '../query/compiler.js';
import { applySchema } from './schema.js';
import { mapRow } from './row-mapper.js';
import type { EventRow } from './row-mapper.js';
import { APPEND_BARRIER, READ_BARRIER, lockStatement, resolveLocks } from './locks.js';

/** SQLSTATE raised when lock_timeout elapses. */
const LOCK_NOT_AVAILABLE = '55P03';

export interface EventStoreConfig<E extends DomainEvent> {
  pool: pg.Pool;
  codec: EventCodec<E>;
  lockTimeout?: string;
  statementTimeout?: string;
}

function isLockTimeout(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === LOCK_NOT_AVAILABLE;
}

export class PostgresEventStore<E extends DomainEvent> implements EventStore<E> {
  private readonly pool: pg.Pool;
  private readonly codec: EventCodec<E>;
  private readonly lockTimeout: string;
  private readonly statementTimeout: string;

  constructor(config: EventStoreConfig<E>) {
    this.pool = config.pool;
    this.codec = config.codec;
    this.lockTimeout = config.lockTimeout ?? '5s';
    this.statementTimeout = config.statementTimeout ?? '30s';
  }

  async initializeSchema(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await applySchema(client);
    } finally {
      client.release();
    }
  }

  async load(query: QueryDefinition): Promise<LoadResult<E>> {
    const { sql, params } = compileLoadQuery(query);
    let result: pg.QueryResult<EventRow>;
    try {
      result = await this.pool.query<EventRow>(sql, params);
    } catch (err) {
      throw new EventStoreError(`Failed to load events: ${String(err)}`, err);
    }
    const events = result.rows.map((row) => mapRow(this.codec, row));
    const last = events[events.length - 1];
    return { events, version: last !== undefined ? last.globalPosition : 0n };
  }

  async append(events: NewEvent<E> | NewEvent<E>[], options?: AppendOptions): Promise<StoredEvent<E>[]> {
    const eventList = Array.isArray(events) ? events : [events];
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      if (options !== undefined) {
        // Session-local timeouts, reset automatically on COMMIT/ROLLBACK
        await client.query(`SET LOCAL lock_timeout = '${this.lockTimeout}'`);
        await client.query(`SET LOCAL statement_timeout = '${this.statementTimeout}'`);

        // Blocks until every lock is held or lock_timeout elapses
        for (const lock of resolveLocks(options)) {
          try {
            await client.query(lockStatement(lock), [lock.key]);
          } catch (err) {
            if (!isLockTimeout(err)) throw err;
            await client.query('ROLLBACK');
            throw new ConcurrencyError(
              options.expectedVersion,
              options.expectedVersion,
              `Advisory lock '${lock.key}' could not be acquired within ${this.lockTimeout}`,
            );
          }
        }

        const { sql: versionSql, params: versionParams } = compileVersionCheckQuery(options.query);
        const versionResult = await client.query<{ max_pos: string }>(versionSql, versionParams);
        const row = versionResult.rows[0];
        const actualVersion = row !== undefined ? BigInt(row.max_pos) : 0n;
        if (actualVersion !== options.expectedVersion) {
          await client.query('ROLLBACK');
          throw new ConcurrencyError(options.expectedVersion, actualVersion);
        }
      }

      try {
        await client.query(lockStatement(APPEND_BARRIER), [APPEND_BARRIER.key]);
      } catch (err) {
        if (!isLockTimeout(err)) throw err;
        await client.query('ROLLBACK');
        throw new EventStoreError(`Append barrier could not be acquired within ${this.lockTimeout}`, err);
      }

      const stored: StoredEvent<E>[] = [];
      for (const event of eventList) {
        const sql = `INSERT INTO events (type, payload, metadata)
        VALUES ($1, $2::jsonb, $3::jsonb)
        RETURNING global_position, event_id, type, payload, metadata, occurred_at`;
        const params = [event.type, JSON.stringify(event.payload), event.metadata ?? null];
        let result: pg.QueryResult<EventRow>;
        try {
          result = await client.query<EventRow>(sql, params);
        } catch (err) {
          await client.query('ROLLBACK');
          throw new EventStoreError(`Failed to append event '${event.type}': ${String(err)}`, err);
        }
        const inserted = result.rows[0];
        if (inserted === undefined) {
          await client.query('ROLLBACK');
          throw new EventStoreError(`INSERT for event '${event.type}' returned no row`);
        }
        stored.push(mapRow(this.codec, inserted));
      }

      await client.query('COMMIT');
      return stored;
    } catch (err) {
      // Both are raised after an explicit ROLLBACK above
      if (err instanceof EventStoreError || err instanceof ConcurrencyError) throw err;
      await client.query('ROLLBACK').catch(() => undefined);
      if (err instanceof EventDecodeError) throw err;
      throw new EventStoreError(`Failed to append events: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async *stream(query: QueryDefinition, options: StreamOptions = {}): AsyncGenerator<StoredEvent<E>> {
    const batchSize = options.batchSize ?? 100;
    let lastPosition = options.afterPosition ?? 0n;

    while (true) {
      const rows = await this.readBatch(query, lastPosition, batchSize);
      for (const row of rows) {
        const event = mapRow(this.codec, row);
        yield event;
        lastPosition = event.globalPosition;
      }

      if (rows.length < batchSize) break;
    }
  }

  /**
   * One stream page, read behind the append barrier: waiting for the exclusive
   * hold lets every in-flight append commit or roll back first.
   */
  private async readBatch(query: QueryDefinition, afterPosition: bigint, batchSize: number): Promise<EventRow[]> {
    const { sql, params } = compileStreamQuery(query, afterPosition, batchSize);
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(lockStatement(READ_BARRIER), [READ_BARRIER.key]);
      const result = await client.query<EventRow>(sql, params);
      await client.query('COMMIT');
      return result.rows;
    } catch (err) {
      await client.query('ROLLBACK').catch(() => undefined);
      throw new EventStoreError(`Failed to stream events: ${String(err)}`, err);
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
