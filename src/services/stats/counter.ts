import type { CacheStatsSnapshot } from "@/services/cache/types";

/**
 * Process-local hit/miss counts. Updates are synchronous, so they never
 * interleave with backend I/O. Each call records against the epoch it
 * started in; counts from an epoch closed by `invalidate()` are dropped.
 */
export class StatsCounter {
  private hits = 0;
  private misses = 0;
  private generation = 0;

  get epoch(): number {
    return this.generation;
  }

  recordHit(epoch: number): boolean {
    if (epoch !== this.generation) return false;
    this.hits++;
    return true;
  }

  recordMiss(epoch: number): boolean {
    if (epoch !== this.generation) return false;
    this.misses++;
    return true;
  }

  /** Close the current epoch; in-flight calls stop counting. */
  invalidate(): void {
    this.generation++;
  }

  reset(): void {
    this.hits = 0;
    this.misses = 0;
  }

  snapshot(): CacheStatsSnapshot {
    return { hits: this.hits, misses: this.misses };
  }
}
