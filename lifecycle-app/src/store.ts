import pg from 'pg';
import { PostgresEventStore } from 'lifecycle-event-store';
import type { EventStore } from 'lifecycle-event-store';
import { LifecycleEventSchema } from './domain/events.js';
import type { LifecycleEvent } from './domain/events.js';

export type LifecycleStore = EventStore<LifecycleEvent>;

export function createStore(pool: pg.Pool): LifecycleStore {
  return new PostgresEventStore<LifecycleEvent>({ pool, codec: LifecycleEventSchema });
}

export function createPool(connectionString: string): pg.Pool {
  return new pg.Pool({ connectionString });
}
