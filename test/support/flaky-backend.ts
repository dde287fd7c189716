import { MemoryBackend } from "@/services/cache/memory";
import type { RecencyIndex, StorageBackend } from "@/services/cache/types";

export type FlakyOperation = "get" | "put" | "delete" | "enumerate" | "count" | "ping" | "index";

/**
 * Memory backend whose operations can be switched to fail, and whose calls
 * are counted, for exercising the engine's failure handling.
 */
export class FlakyBackend implements StorageBackend {
  readonly kind = "flaky";
  readonly nativeRecency: boolean;
  readonly inner = new MemoryBackend();
  readonly failing = new Set<FlakyOperation>();
  readonly calls: Record<FlakyOperation, number> = {
    get: 0,
    put: 0,
    delete: 0,
    enumerate: 0,
    count: 0,
    ping: 0,
    index: 0,
  };
  /** One-shot hooks awaited before an operation takes effect. */
  readonly hooks: Partial<Record<FlakyOperation, () => Promise<void>>> = {};

  constructor(options: { nativeRecency?: boolean } = {}) {
    this.nativeRecency = options.nativeRecency ?? false;
  }

  private async step(operation: FlakyOperation): Promise<void> {
    this.calls[operation]++;
    if (this.failing.has(operation)) {
      throw new Error(`${operation} unavailable`);
    }
    const hook = this.hooks[operation];
    if (hook) {
      delete this.hooks[operation];
      await hook();
    }
  }

  async get(key: string): Promise<Uint8Array | null> {
    await this.step("get");
    return this.inner.get(key);
  }

  async put(key: string, value: Uint8Array, ttlSeconds?: number): Promise<void> {
    await this.step("put");
    await this.inner.put(key, value, ttlSeconds);
  }

  async delete(keys: readonly string[]): Promise<void> {
    await this.step("delete");
    await this.inner.delete(keys);
  }

  async enumerate(prefix: string): Promise<string[]> {
    await this.step("enumerate");
    return this.inner.enumerate(prefix);
  }

  async count(prefix: string): Promise<number> {
    await this.step("count");
    return this.inner.count(prefix);
  }

  async ping(): Promise<void> {
    await this.step("ping");
  }

  recencyIndex(name: string): RecencyIndex {
    const index = this.inner.recencyIndex(name);
    const step = (): Promise<void> => this.step("index");
    return {
      touch: async (key, score) => {
        await step();
        await index.touch(key, score);
      },
      lowestN: async (n) => {
        await step();
        return index.lowestN(n);
      },
      remove: async (keys) => {
        await step();
        await index.remove(keys);
      },
      cardinality: async () => {
        await step();
        return index.cardinality();
      },
      clear: async () => {
        await step();
        await index.clear();
      },
    };
  }
}
