import { Redis } from "@upstash/redis";
import { constants } from "@/config/constants";
import type { RedisConfig } from "@/config/redis.config";
import { Helpers } from "@/utils/helpers";
import { Logger } from "@/utils/logger";
import type { RecencyIndex, StorageBackend } from "./types";

const RECENCY_SUFFIX = "#recency";

class RedisRecencyIndex implements RecencyIndex {
  constructor(
    private readonly redis: Redis,
    private readonly indexKey: string
  ) {}

  async touch(key: string, score: number): Promise<void> {
    await this.redis.zadd(this.indexKey, { score, member: key });
  }

  async lowestN(n: number): Promise<string[]> {
    if (n <= 0) return [];
    const members = await this.redis.zrange<unknown[]>(this.indexKey, 0, n - 1);
    return members.map((member) => String(member));
  }

  async remove(keys: readonly string[]): Promise<void> {
    for (const batch of Helpers.chunk(keys, constants.redis.deleteBatchSize)) {
      if (batch.length) {
        await this.redis.zrem(this.indexKey, ...batch);
      }
    }
  }

  async cardinality(): Promise<number> {
    return this.redis.zcard(this.indexKey);
  }

  async clear(): Promise<void> {
    await this.redis.del(this.indexKey);
  }
}

/**
 * Upstash Redis backend. Values are stored as base64 strings so the REST
 * client's JSON handling never reinterprets them; recency lives in one
 * sorted set per decorated function.
 */
export class RedisBackend implements StorageBackend {
  readonly kind = "redis";
  readonly nativeRecency = false;

  constructor(private readonly redis: Redis) {}

  async get(key: string): Promise<Uint8Array | null> {
    const stored = await this.redis.get<unknown>(key);
    if (stored === null || stored === undefined) {
      return null;
    }
    if (typeof stored !== "string") {
      // Foreign data under our key; hand back bytes the codec will reject.
      return new TextEncoder().encode(JSON.stringify(stored));
    }
    return new Uint8Array(Buffer.from(stored, "base64"));
  }

  async put(key: string, value: Uint8Array, ttlSeconds?: number): Promise<void> {
    const encoded = Buffer.from(value).toString("base64");
    if (ttlSeconds === undefined) {
      await this.redis.set(key, encoded);
    } else {
      await this.redis.set(key, encoded, {
        px: Math.max(1, Math.round(ttlSeconds * 1000)),
      });
    }
  }

  async delete(keys: readonly string[]): Promise<void> {
    for (const batch of Helpers.chunk(keys, constants.redis.deleteBatchSize)) {
      if (batch.length) {
        await this.redis.del(...batch);
      }
    }
  }

  async enumerate(prefix: string): Promise<string[]> {
    const found = new Set<string>();
    let cursor = 0;
    do {
      const [nextCursor, keys] = await this.redis.scan(cursor, {
        match: `${Helpers.escapeGlob(prefix)}*`,
        count: constants.redis.scanCount,
      });

      cursor = Number(nextCursor);

      for (const key of keys) {
        if (!key.endsWith(RECENCY_SUFFIX)) {
          found.add(key);
        }
      }
    } while (cursor !== 0);

    return Array.from(found);
  }

  recencyIndex(name: string): RecencyIndex {
    return new RedisRecencyIndex(this.redis, `${name}${RECENCY_SUFFIX}`);
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}

export type RedisBackendOptions = RedisConfig | { client: Redis };

export function createRedisInstance(config: RedisConfig): Redis {
  const logger = Logger.getInstance("redis");
  try {
    return new Redis({
      url: config.url,
      token: config.token,
      retry: {
        retries: config.maxRetries,
        backoff: (retryCount: number) =>
          Math.min(
            config.retryBackoff * Math.pow(2, retryCount),
            config.retryBackoff * 10
          ),
      },
    });
  } catch (error) {
    logger.error("Failed to create Redis instance:", error);
    throw error;
  }
}

export const createRedisBackend = (options: RedisBackendOptions): RedisBackend =>
  new RedisBackend("client" in options ? options.client : createRedisInstance(options));
