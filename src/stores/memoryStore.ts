import type { CounterStore, IncrementOp } from '../types';

type Counter = {
  raw: string;
  expiresAt: number; // timestamp ms
};

export class MemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, Counter>();

  constructor(private readonly now: () => number = Date.now) {}

  get size(): number {
    this.sweep();
    return this.counters.size;
  }

  async batchGet(keys: readonly string[]): Promise<Map<string, string | undefined>> {
    const values = new Map<string, string | undefined>();
    for (const key of keys) {
      values.set(key, this.live(key)?.raw);
    }
    return values;
  }

  async batchIncrementAndExpire(ops: readonly IncrementOp[]): Promise<void> {
    const now = this.now();
    for (const { key, delta, ttlMs } of ops) {
      const record = this.live(key);
      if (record && !/^-?\d+$/.test(record.raw)) {
        // Mirrors INCRBY against a value that is not an integer
        throw new Error(`value at ${key} is not an integer`);
      }
      const base = record ? Number(record.raw) : 0;
      this.counters.set(key, { raw: String(base + delta), expiresAt: now + ttlMs });
    }
  }

  async delete(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      this.counters.delete(key);
    }
  }

  /** Writes a raw value as-is, e.g. to prime a window or simulate a foreign writer. */
  seed(key: string, raw: string, ttlMs: number): void {
    this.counters.set(key, { raw, expiresAt: this.now() + ttlMs });
  }

  private live(key: string): Counter | undefined {
    const record = this.counters.get(key);
    if (!record) return undefined;
    if (record.expiresAt <= this.now()) {
      this.counters.delete(key);
      return undefined;
    }
    return record;
  }

  private sweep(): void {
    const now = this.now();
    for (const [key, record] of this.counters) {
      if (record.expiresAt <= now) this.counters.delete(key);
    }
  }
}
