import type { QueryDefinition } from './query/types.js';

/**
 * Shape every application event satisfies. Applications define a discriminated
 * union of these keyed on `type`.
 */
export interface DomainEvent {
  type: string;
  payload: object;
}

export type NewEvent<E extends DomainEvent> = E & {
  metadata?: Record<string, unknown>;
};

export interface StoredEventInfo {
  globalPosition: bigint;
  eventId: string;
  metadata: Record<string, unknown> | null;
  occurredAt: Date;
}

export type StoredEvent<E extends DomainEvent> = E & StoredEventInfo;

/**
 * Decodes a `{ type, payload }` pair read from storage into the application's
 * event union. A zod schema satisfies this interface.
 */
export interface EventCodec<E extends DomainEvent> {
  parse(raw: unknown): E;
}

export interface LoadResult<E extends DomainEvent> {
  events: StoredEvent<E>[];
  version: bigint;
}

export type LockMode = 'exclusive' | 'shared';

export interface LockKey {
  key: string;
  mode: LockMode;
}

export interface AppendOptions {
  /** Consistency boundary: its version must still equal expectedVersion. */
  query: QueryDefinition;
  expectedVersion: bigint;
  /**
   * Advisory locks held for the duration of the append.
   * Defaults to one exclusive lock on the canonical key of `query`.
   */
  lockKeys?: readonly LockKey[];
}

export interface StreamOptions {
  batchSize?: number;
  afterPosition?: bigint;
}

export interface EventStore<E extends DomainEvent> {
  load(query: QueryDefinition): Promise<LoadResult<E>>;
  append(events: NewEvent<E> | NewEvent<E>[], options?: AppendOptions): Promise<StoredEvent<E>[]>;
  stream(query: QueryDefinition, options?: StreamOptions): AsyncIterable<StoredEvent<E>>;
  initializeSchema(): Promise<void>;
  close(): Promise<void>;
}
