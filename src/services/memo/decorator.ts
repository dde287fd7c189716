import type { ZodType } from "zod";
import type { FillErrorPolicy } from "@/config";
import { constants } from "@/config/constants";
import { BackendGuard } from "@/services/cache/outcome";
import type { CacheInfo, StorageBackend } from "@/services/cache/types";
import type { KeyCodec } from "@/services/codec/key";
import type { ValueCodec } from "@/services/codec/value";
import { SingleFlight, type FillOutcome, type LeaderSlot } from "@/services/flight/single-flight";
import { LruIndex, RecencyClock } from "@/services/lru";
import { StatsCounter } from "@/services/stats/counter";
import { DecodeError } from "@/utils/errors";
import { Helpers } from "@/utils/helpers";
import type { Logger } from "@/utils/logger";

export interface CallOptions {
  /** Bound on waiting for another caller's fill of the same key. */
  waitTimeoutMs?: number;
}

export interface CacheDecoratorConfig<A extends unknown[], T> {
  fn: (...args: A) => T | Promise<T>;
  identity: string;
  namespace: string;
  backend: StorageBackend;
  logger: Logger;
  keyCodec: KeyCodec;
  valueCodec: ValueCodec;
  maxsize: number | null;
  ttl?: number;
  waitTimeoutMs?: number;
  fillErrorPolicy: FillErrorPolicy;
  schema?: ZodType<T>;
}

type Lookup<T> = { found: true; value: T } | { found: false };

/** Reported as currsize when an unbounded cache's backend cannot count entries. */
export const UNKNOWN_SIZE = constants.cache.unknownSize;

const ignore = (): void => undefined;

/**
 * Per-function cache engine. Drives each key through
 * ABSENT -> FILLING -> PRESENT, with hits and misses counted once per call.
 */
export class CacheDecorator<A extends unknown[], T> {
  readonly identity: string;
  readonly maxsize: number | null;

  private readonly fn: (...args: A) => T | Promise<T>;
  private readonly backend: StorageBackend;
  private readonly logger: Logger;
  private readonly keyCodec: KeyCodec;
  private readonly valueCodec: ValueCodec;
  private readonly ttl?: number;
  private readonly waitTimeoutMs?: number;
  private readonly fillErrorPolicy: FillErrorPolicy;
  private readonly schema?: ZodType<T>;

  private readonly namespace: string;
  private readonly prefix: string;
  private readonly guard: BackendGuard;
  private readonly lru: LruIndex;
  private readonly stats = new StatsCounter();
  private readonly flights = new SingleFlight<T>();
  private clearing: Promise<void> | null = null;

  constructor(config: CacheDecoratorConfig<A, T>) {
    this.fn = config.fn;
    this.identity = config.identity;
    this.backend = config.backend;
    this.logger = config.logger;
    this.keyCodec = config.keyCodec;
    this.valueCodec = config.valueCodec;
    this.maxsize = config.maxsize;
    this.ttl = config.ttl;
    this.waitTimeoutMs = config.waitTimeoutMs;
    this.fillErrorPolicy = config.fillErrorPolicy;
    this.schema = config.schema;

    this.namespace = config.namespace;
    const indexName = `${config.namespace}:${config.identity}`;
    this.prefix = `${indexName}:`;
    this.guard = new BackendGuard(this.logger, { function: this.identity, backend: this.backend.kind });
    this.lru = new LruIndex(this.backend, this.backend.recencyIndex(indexName), new RecencyClock());
  }

  /** Index bookkeeping runs only for bounded caches on stores without native LRU. */
  private get bounded(): boolean {
    return this.maxsize !== null && !this.backend.nativeRecency;
  }

  /** Full store key for `args`; throws EncodingError for unhashable arguments. */
  storeKey(args: A): string {
    return `${this.namespace}:${this.keyCodec.encode(this.identity, args)}`;
  }

  async call(args: A, options: CallOptions = {}): Promise<T> {
    const key = this.storeKey(args);

    for (;;) {
      await this.waitForClear();
      const epoch = this.stats.epoch;

      const cached = await this.lookup(key);
      if (cached.found) {
        this.stats.recordHit(epoch);
        await this.touch(key);
        return cached.value;
      }

      const slot = this.flights.acquire(key);
      if (slot.role === "leader") {
        return this.fill(key, args, slot, epoch);
      }

      let outcome: FillOutcome<T>;
      try {
        outcome = await slot.wait(options.waitTimeoutMs ?? this.waitTimeoutMs);
      } catch (error) {
        this.stats.recordMiss(epoch);
        throw error;
      }

      if (outcome.ok) {
        this.stats.recordHit(epoch);
        return outcome.value;
      }
      if (this.fillErrorPolicy === "propagate") {
        this.stats.recordMiss(epoch);
        throw outcome.error;
      }
      this.logger.debug("Retrying after a failed fill", { function: this.identity, key });
    }
  }

  async cacheInfo(): Promise<CacheInfo> {
    await this.waitForClear();
    const { hits, misses } = this.stats.snapshot();
    const currsize = await this.guard.require("size", () => this.currentSize());
    return { hits, misses, currsize, maxsize: this.maxsize };
  }

  /**
   * Empty this function's entries and index, then zero its stats. Calls and
   * info requests arriving meanwhile wait for the clear to finish.
   */
  clear(): Promise<void> {
    if (!this.clearing) {
      this.clearing = this.performClear().finally(() => {
        this.clearing = null;
      });
    }
    return this.clearing;
  }

  private async performClear(): Promise<void> {
    this.stats.invalidate();
    this.flights.detachAll();
    try {
      const removed = await this.guard.require("clear", () => this.lru.clear(this.prefix));
      this.logger.info("Cache cleared", { function: this.identity, removed });
    } finally {
      // The epoch is already closed, so counts kept past here would miss in-flight calls.
      this.stats.reset();
    }
  }

  private async waitForClear(): Promise<void> {
    while (this.clearing) {
      // A failed clear rejects for its own caller; everyone else proceeds.
      await this.clearing.then(ignore, ignore);
    }
  }

  private async fill(key: string, args: A, slot: LeaderSlot<T>, epoch: number): Promise<T> {
    const fillId = Helpers.generateId();
    try {
      const recheck = await this.lookup(key);
      if (recheck.found) {
        this.stats.recordHit(epoch);
        await this.touch(key);
        slot.settle({ ok: true, value: recheck.value });
        return recheck.value;
      }

      this.logger.debug("Cache fill started", { function: this.identity, key, fillId });
      const value = await this.fn(...args);
      await this.store(key, value, epoch);
      this.stats.recordMiss(epoch);
      slot.settle({ ok: true, value });
      this.logger.debug("Cache fill completed", { function: this.identity, key, fillId });
      return value;
    } catch (error) {
      this.stats.recordMiss(epoch);
      slot.settle({ ok: false, error });
      this.logger.debug("Cache fill failed", { function: this.identity, key, fillId });
      throw error;
    }
  }

  private async lookup(key: string): Promise<Lookup<T>> {
    const read = await this.guard.attempt("lookup", () => this.backend.get(key));
    if (!read.ok || read.value === null) {
      return { found: false };
    }

    try {
      return { found: true, value: this.decode(read.value) };
    } catch (error) {
      if (!(error instanceof DecodeError)) throw error;
      this.logger.warn("Discarding undecodable cache entry", {
        function: this.identity,
        key,
        error: error.message,
      });
      return { found: false };
    }
  }

  private decode(bytes: Uint8Array): T {
    const decoded = this.valueCodec.decode(bytes);
    if (!this.schema) {
      // Entries under this prefix were written by this function's encoder.
      return decoded as T;
    }
    const parsed = this.schema.safeParse(decoded);
    if (!parsed.success) {
      throw new DecodeError(`Cached value failed validation: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async store(key: string, value: T, epoch: number): Promise<void> {
    const bytes = this.valueCodec.encode(value);
    if (epoch !== this.stats.epoch) {
      return;
    }

    const stored = await this.guard.attempt("store", () => this.backend.put(key, bytes, this.ttl));
    if (!stored.ok) {
      return;
    }

    if (epoch !== this.stats.epoch) {
      // A clear ran while the write was in flight; take the write back.
      await this.guard.attempt("store", () => this.backend.delete([key]));
      return;
    }

    if (this.bounded) {
      await this.guard.attempt("touch", () => this.lru.touch(key));
      const evicted = await this.guard.attempt("evict", () => this.lru.evictIfNeeded(this.maxsize));
      if (evicted.ok && evicted.value.length) {
        this.logger.debug("Evicted least recently used entries", {
          function: this.identity,
          count: evicted.value.length,
        });
      }
    }
  }

  private async touch(key: string): Promise<void> {
    if (this.bounded) {
      await this.guard.attempt("touch", () => this.lru.touch(key));
    }
  }

  private async currentSize(): Promise<number> {
    if (this.bounded) {
      return this.lru.cardinality();
    }
    if (this.backend.count) {
      return this.backend.count(this.prefix);
    }
    return UNKNOWN_SIZE;
  }
}
