import type { RecencyIndex, StorageBackend } from "./types";

interface MemoryEntry {
  value: Uint8Array;
  expiresAt: number | null;
}

class MemoryRecencyIndex implements RecencyIndex {
  private readonly scores = new Map<string, number>();

  async touch(key: string, score: number): Promise<void> {
    this.scores.set(key, score);
  }

  async lowestN(n: number): Promise<string[]> {
    if (n <= 0) return [];
    return Array.from(this.scores.entries())
      .sort(([keyA, a], [keyB, b]) => a - b || (keyA < keyB ? -1 : keyA > keyB ? 1 : 0))
      .slice(0, n)
      .map(([key]) => key);
  }

  async remove(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      this.scores.delete(key);
    }
  }

  async cardinality(): Promise<number> {
    return this.scores.size;
  }

  async clear(): Promise<void> {
    this.scores.clear();
  }
}

/**
 * In-process backend. Entries live as long as the instance does, so it is
 * shared only by callers holding the same object.
 */
export class MemoryBackend implements StorageBackend {
  readonly kind = "memory";
  readonly nativeRecency = false;

  private readonly cache = new Map<string, MemoryEntry>();
  private readonly indexes = new Map<string, MemoryRecencyIndex>();

  async get(key: string): Promise<Uint8Array | null> {
    const entry = this.cache.get(key);
    if (!entry) {
      return null;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      return null;
    }

    return entry.value.slice();
  }

  async put(key: string, value: Uint8Array, ttlSeconds?: number): Promise<void> {
    this.cache.set(key, {
      value: value.slice(),
      expiresAt: ttlSeconds === undefined ? null : Date.now() + ttlSeconds * 1000,
    });
  }

  async delete(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      this.cache.delete(key);
    }
  }

  async enumerate(prefix: string): Promise<string[]> {
    return Array.from(this.cache.keys()).filter((key) => key.startsWith(prefix));
  }

  recencyIndex(name: string): RecencyIndex {
    let index = this.indexes.get(name);
    if (!index) {
      index = new MemoryRecencyIndex();
      this.indexes.set(name, index);
    }
    return index;
  }

  async count(prefix: string): Promise<number> {
    let live = 0;
    for (const [key, entry] of this.cache.entries()) {
      if (key.startsWith(prefix) && !this.isExpired(entry)) {
        live++;
      }
    }
    return live;
  }

  async ping(): Promise<void> {}

  private isExpired(entry: MemoryEntry): boolean {
    return entry.expiresAt !== null && entry.expiresAt <= Date.now();
  }
}

export const createMemoryBackend = (): MemoryBackend => new MemoryBackend();
