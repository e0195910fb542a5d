import type { CounterStore, IncrementOp } from '../types';

export type ExecReply = [Error | null, unknown][] | null;

// The slice of an ioredis client this store drives; `Redis` satisfies it
export interface CounterTransaction {
  get(key: string): unknown;
  incrby(key: string, increment: number): unknown;
  pexpire(key: string, milliseconds: number): unknown;
  exec(): Promise<ExecReply>;
}

export interface RedisCounterClient {
  multi(): CounterTransaction;
  del(...keys: string[]): Promise<number>;
}

export class RedisCounterStore implements CounterStore {
  constructor(private readonly client: RedisCounterClient) {}

  async batchGet(keys: readonly string[]): Promise<Map<string, string | undefined>> {
    const pipeline = this.client.multi();
    for (const key of keys) {
      pipeline.get(key);
    }
    const results = checkReplies(await pipeline.exec(), 'GET');

    const values = new Map<string, string | undefined>();
    keys.forEach((key, i) => {
      const value = results[i];
      values.set(key, typeof value === 'string' ? value : undefined);
    });
    return values;
  }

  async batchIncrementAndExpire(ops: readonly IncrementOp[]): Promise<void> {
    const pipeline = this.client.multi();
    for (const { key, delta, ttlMs } of ops) {
      pipeline.incrby(key, delta);
      pipeline.pexpire(key, ttlMs);
    }
    checkReplies(await pipeline.exec(), 'INCRBY/PEXPIRE');
  }

  async delete(keys: readonly string[]): Promise<void> {
    if (keys.length === 0) return;
    await this.client.del(...keys);
  }
}

function checkReplies(reply: ExecReply, label: string): unknown[] {
  if (reply === null) {
    throw new Error(`${label} transaction was aborted`);
  }
  return reply.map(([error, value]) => {
    if (error) throw error;
    return value;
  });
}
