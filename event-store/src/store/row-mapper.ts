import type { DomainEvent, EventCodec, StoredEvent } from '../types.js';
import { EventDecodeError } from '../errors.js';

export interface EventRow {
  global_position: string; // pg returns BIGSERIAL as string by default
  event_id: string;
  type: string;
  payload: unknown;                   // pg auto-parses JSONB
  metadata: Record<string, unknown> | null;
  occurred_at: Date;                  // pg auto-parses TIMESTAMPTZ
}

export function mapRow<E extends DomainEvent>(codec: EventCodec<E>, row: EventRow): StoredEvent<E> {
  const globalPosition = BigInt(row.global_position);
  let event: E;
  try {
    event = codec.parse({ type: row.type, payload: row.payload });
  } catch (err) {
    throw new EventDecodeError(row.type, globalPosition, err);
  }
  return {
    ...event,
    globalPosition,
    eventId: row.event_id,
    metadata: row.metadata,
    occurredAt: row.occurred_at,
  };
}
