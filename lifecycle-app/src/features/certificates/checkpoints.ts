import type pg from 'pg';

export const DDL_CREATE_RELAY_CHECKPOINTS_TABLE = `
CREATE TABLE IF NOT EXISTS relay_checkpoints (
  name          TEXT        PRIMARY KEY,
  last_position BIGINT      NOT NULL,
  updated_at    TIMESTAMPTZ NOT NULL DEFAULT NOW()
)`.trim();

/** Last global position a relay has delivered, per relay name. */
export interface CheckpointStore {
  load(name: string): Promise<bigint>;
  save(name: string, position: bigint): Promise<void>;
}

export class PostgresCheckpointStore implements CheckpointStore {
  constructor(private readonly pool: pg.Pool) {}

  async initialize(): Promise<void> {
    await this.pool.query(DDL_CREATE_RELAY_CHECKPOINTS_TABLE);
  }

  async load(name: string): Promise<bigint> {
    const result = await this.pool.query<{ last_position: string }>(
      'SELECT last_position FROM relay_checkpoints WHERE name = $1',
      [name],
    );
    const row = result.rows[0];
    return row !== undefined ? BigInt(row.last_position) : 0n;
  }

  async save(name: string, position: bigint): Promise<void> {
    await this.pool.query(
      `INSERT INTO relay_checkpoints (name, last_position, updated_at)
       VALUES ($1, $2, NOW())
       ON CONFLICT (name) DO UPDATE SET last_position = EXCLUDED.last_position, updated_at = NOW()`,
      [name, position.toString()],
    );
  }
}

export class InMemoryCheckpointStore implements CheckpointStore {
  private readonly positions = new Map<string, bigint>();

  async load(name: string): Promise<bigint> {
    return this.positions.get(name) ?? 0n;
  }

  async save(name: string, position: bigint): Promise<void> {
    this.positions.set(name, position);
  }
}
