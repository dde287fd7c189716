import type { RecencyIndex, StorageBackend } from "@/services/cache/types";

/**
 * Hybrid logical clock for recency scores: wall-clock microseconds, bumped by
 * one whenever the wall clock stalls or moves backwards, so scores issued by
 * one process strictly increase.
 */
export class RecencyClock {
  private last = 0;

  constructor(private readonly now: () => number = Date.now) {}

  next(): number {
    this.last = Math.max(this.now() * 1000, this.last + 1);
    return this.last;
  }
}

export class LruIndex {
  constructor(
    private readonly backend: StorageBackend,
    private readonly index: RecencyIndex,
    private readonly clock: RecencyClock = new RecencyClock()
  ) {}

  async touch(key: string): Promise<void> {
    await this.index.touch(key, this.clock.next());
  }

  /**
   * Drop the least recently touched entries beyond `maxsize`. Runs after
   * each store; concurrent stores may overshoot until the next pass.
   * @returns the evicted keys
   */
  async evictIfNeeded(maxsize: number | null | undefined): Promise<string[]> {
    if (!maxsize || maxsize <= 0) {
      return [];
    }

    const excess = (await this.index.cardinality()) - maxsize;
    if (excess <= 0) {
      return [];
    }

    const victims = await this.index.lowestN(excess);
    if (victims.length) {
      await this.backend.delete(victims);
      await this.index.remove(victims);
    }
    return victims;
  }

  async cardinality(): Promise<number> {
    return this.index.cardinality();
  }

  /**
   * Remove every entry under `prefix` and empty the index.
   * @returns the number of entries deleted
   */
  async clear(prefix: string): Promise<number> {
    const keys = await this.backend.enumerate(prefix);
    if (keys.length) {
      await this.backend.delete(keys);
    }
    await this.index.clear();
    return keys.length;
  }
}
