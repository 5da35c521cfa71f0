import { z } from 'zod';
import { vi } from 'vitest';
import type pg from 'pg';

export const AccountEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('AccountOpened'),
    payload: z.object({ accountId: z.string(), owner: z.string() }),
  }),
  z.object({
    type: z.literal('AccountClosed'),
    payload: z.object({ accountId: z.string(), reason: z.string() }),
  }),
]);

export type AccountEvent = z.infer<typeof AccountEventSchema>;

export function makeRow(overrides: Partial<Record<string, unknown>> = {}) {
  return {
    global_position: '1',
    event_id: '00000000-0000-0000-0000-000000000001',
    type: 'AccountOpened',
    payload: { accountId: 'a1', owner: 'Ada' },
    metadata: null,
    occurred_at: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

/** pg client whose query() answers with the given responses in order; Error entries reject. */
export function makeMockClient(responses: unknown[]) {
  let i = 0;
  const client = {
    query: vi.fn().mockImplementation(() => {
      const resp = responses[i++];
      if (resp instanceof Error) return Promise.reject(resp);
      return Promise.resolve(resp ?? {});
    }),
    release: vi.fn(),
  };
  return client;
}

export function poolFor(client: ReturnType<typeof makeMockClient>): pg.Pool {
  return { connect: vi.fn().mockResolvedValue(client) } as unknown as pg.Pool;
}

export function sqlCalls(client: ReturnType<typeof makeMockClient>): string[] {
  return client.query.mock.calls.map((call) => String(call[0]));
}
