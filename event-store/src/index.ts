export { query, queryFor } from './query/query-object.js';
export type { QueryEntry } from './query/query-object.js';
export type { ClauseBuilder } from './query/builder.js';
export type { QueryDefinition, PayloadMatch, MatchValue } from './query/types.js';
export type {
  DomainEvent,
  NewEvent,
  StoredEvent,
  StoredEventInfo,
  EventCodec,
  LoadResult,
  AppendOptions,
  LockKey,
  LockMode,
  StreamOptions,
  EventStore,
} from './types.js';
export { PostgresEventStore } from './store/event-store.js';
export type { EventStoreConfig } from './store/event-store.js';
export { ConcurrencyError, EventStoreError, EventDecodeError } from './errors.js';
export { withConcurrencyRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
