/**
 * Ordered recency index kept by a backend for one decorated function.
 * Scores only need to be comparable; `lowestN` returns ascending score with
 * ties broken by key.
 */
export interface RecencyIndex {
  touch(key: string, score: number): Promise<void>;
  lowestN(n: number): Promise<string[]>;
  remove(keys: readonly string[]): Promise<void>;
  cardinality(): Promise<number>;
  clear(): Promise<void>;
}

/**
 * The capability set the engine needs from a store. Each storage technology
 * implements it once; the engine never inspects which one it was given.
 */
export interface StorageBackend {
  readonly kind: string;
  /**
   * True when the store evicts by recency on its own. The engine then skips
   * its index bookkeeping and reports `count()` as currsize.
   */
  readonly nativeRecency: boolean;

  get(key: string): Promise<Uint8Array | null>;
  put(key: string, value: Uint8Array, ttlSeconds?: number): Promise<void>;
  delete(keys: readonly string[]): Promise<void>;
  enumerate(prefix: string): Promise<string[]>;
  recencyIndex(name: string): RecencyIndex;

  /** Live entries under `prefix`; omitted when the store cannot count cheaply. */
  count?(prefix: string): Promise<number>;
  ping?(): Promise<void>;
}

export interface CacheInfo {
  hits: number;
  misses: number;
  /** Live entries, or -1 when the backend cannot tell. */
  currsize: number;
  maxsize: number | null;
}

export interface CacheStatsSnapshot {
  hits: number;
  misses: number;
}
