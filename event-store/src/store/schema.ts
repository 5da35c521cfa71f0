import type pg from 'pg';

export const DDL_CREATE_TABLE = `
CREATE TABLE IF NOT EXISTS events (
  global_position  BIGSERIAL    PRIMARY KEY,
  event_id         UUID         NOT NULL DEFAULT gen_random_uuid() UNIQUE,
  type             VARCHAR(255) NOT NULL,
  payload          JSONB        NOT NULL,
  metadata         JSONB,
  occurred_at      TIMESTAMPTZ  NOT NULL DEFAULT NOW()
)
`.trim();

export const DDL_CREATE_GIN_INDEX = `
CREATE INDEX IF NOT EXISTS idx_events_payload_gin
  ON events USING GIN (payload jsonb_path_ops)
`.trim();

export const DDL_CREATE_TYPE_POSITION_INDEX = `
CREATE INDEX IF NOT EXISTS idx_events_type_position
  ON events (type, global_position)
`.trim();

export const DDL_CREATE_BRIN_INDEX = `
CREATE INDEX IF NOT EXISTS idx_events_occurred_at_brin
  ON events USING BRIN (occurred_at)
  WITH (pages_per_range = 128)
`.trim();

export const SCHEMA_STATEMENTS: readonly string[] = [
  DDL_CREATE_TABLE,
  DDL_CREATE_GIN_INDEX,
  DDL_CREATE_TYPE_POSITION_INDEX,
  DDL_CREATE_BRIN_INDEX,
];

export async function applySchema(client: pg.ClientBase): Promise<void> {
  for (const statement of SCHEMA_STATEMENTS) {
    await client.query(statement);
  }
}
