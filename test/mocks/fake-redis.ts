import { vi } from 'vitest';

/**
 * The slice of the ioredis client CacheService uses, backed by a Map.
 * Set `failReads` or `failDeletes` to simulate an unreachable server.
 */
export class FakeRedisClient {
  readonly entries = new Map<string, string>();
  failReads = false;
  failDeletes = false;

  constructor(private readonly journal: string[] = []) {}

  get = vi.fn(async (key: string): Promise<string | null> => {
    if (this.failReads) throw new Error('ECONNREFUSED');
    return this.entries.get(key) ?? null;
  });

  set = vi.fn(
    async (key: string, value: string, ...expiry: unknown[]): Promise<'OK'> => {
      void expiry;
      this.entries.set(key, value);
      return 'OK';
    },
  );

  del = vi.fn(async (...keys: string[]): Promise<number> => {
    if (this.failDeletes) throw new Error('ECONNREFUSED');
    let removed = 0;
    for (const key of keys) {
      if (this.entries.delete(key)) removed++;
    }
    this.journal.push('evict');
    return removed;
  });
}

export function fakeRedisService(client: FakeRedisClient) {
  return { getClient: () => client };
}
