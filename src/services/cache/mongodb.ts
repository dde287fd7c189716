import { Binary, type Collection, type MongoClient } from "mongodb";
import { constants } from "@/config/constants";
import { Helpers } from "@/utils/helpers";
import { Logger } from "@/utils/logger";
import type { RecencyIndex, StorageBackend } from "./types";

export interface CacheDocument {
  _id: string;
  value: Binary;
  expiresAt: Date | null;
  storedAt: Date;
}

export interface RecencyDocument {
  _id: string;
  index: string;
  score: number;
}

class MongoRecencyIndex implements RecencyIndex {
  constructor(
    private readonly collection: Collection<RecencyDocument>,
    private readonly name: string
  ) {}

  async touch(key: string, score: number): Promise<void> {
    await this.collection.updateOne(
      { _id: key },
      { $set: { index: this.name, score } },
      { upsert: true }
    );
  }

  async lowestN(n: number): Promise<string[]> {
    if (n <= 0) return [];
    const docs = await this.collection
      .find({ index: this.name })
      .sort({ score: 1, _id: 1 })
      .limit(n)
      .toArray();
    return docs.map((doc) => doc._id);
  }

  async remove(keys: readonly string[]): Promise<void> {
    for (const batch of Helpers.chunk(keys, constants.mongodb.deleteBatchSize)) {
      await this.collection.deleteMany({ _id: { $in: batch }, index: this.name });
    }
  }

  async cardinality(): Promise<number> {
    return this.collection.countDocuments({ index: this.name });
  }

  async clear(): Promise<void> {
    await this.collection.deleteMany({ index: this.name });
  }
}

export interface MongoBackendOptions {
  client: MongoClient;
  database?: string;
  collectionPrefix?: string;
}

/**
 * MongoDB backend: one collection of entries keyed by store key, one
 * collection of recency scores tagged with the owning index. Expired
 * documents are filtered on read; the TTL index only reclaims space.
 */
export class MongoBackend implements StorageBackend {
  readonly kind = "mongodb";
  readonly nativeRecency = false;

  private readonly logger: Logger;
  private readonly entries: Collection<CacheDocument>;
  private readonly recency: Collection<RecencyDocument>;
  private readonly client: MongoClient;
  private readonly database: string;

  constructor(options: MongoBackendOptions) {
    this.logger = Logger.getInstance("mongodb");
    this.client = options.client;
    this.database = options.database ?? constants.mongodb.database;
    const prefix = options.collectionPrefix ?? constants.mongodb.collectionPrefix;
    const db = this.client.db(this.database);
    this.entries = db.collection<CacheDocument>(`${prefix}_entries`);
    this.recency = db.collection<RecencyDocument>(`${prefix}_recency`);
  }

  async ensureIndexes(): Promise<void> {
    try {
      await this.entries.createIndex({ expiresAt: 1 }, { expireAfterSeconds: 0 });
      await this.recency.createIndex({ index: 1, score: 1 });
    } catch (error) {
      this.logger.error("Error creating cache indexes:", error);
      throw error;
    }
  }

  async get(key: string): Promise<Uint8Array | null> {
    const doc = await this.entries.findOne({ _id: key });
    if (!doc || this.isExpired(doc)) {
      return null;
    }
    return new Uint8Array(doc.value.buffer.subarray(0, doc.value.length()));
  }

  async put(key: string, value: Uint8Array, ttlSeconds?: number): Promise<void> {
    const now = Date.now();
    await this.entries.updateOne(
      { _id: key },
      {
        $set: {
          value: new Binary(value),
          expiresAt: ttlSeconds === undefined ? null : new Date(now + ttlSeconds * 1000),
          storedAt: new Date(now),
        },
      },
      { upsert: true }
    );
  }

  async delete(keys: readonly string[]): Promise<void> {
    for (const batch of Helpers.chunk(keys, constants.mongodb.deleteBatchSize)) {
      await this.entries.deleteMany({ _id: { $in: batch } });
    }
  }

  async enumerate(prefix: string): Promise<string[]> {
    const docs = await this.entries
      .find({ _id: { $regex: this.prefixPattern(prefix) } })
      .toArray();
    return docs.map((doc) => doc._id);
  }

  recencyIndex(name: string): RecencyIndex {
    return new MongoRecencyIndex(this.recency, name);
  }

  async count(prefix: string): Promise<number> {
    return this.entries.countDocuments({
      _id: { $regex: this.prefixPattern(prefix) },
      $or: [{ expiresAt: null }, { expiresAt: { $gt: new Date() } }],
    });
  }

  async ping(): Promise<void> {
    await this.client.db(this.database).command({ ping: 1 });
  }

  private prefixPattern(prefix: string): RegExp {
    return new RegExp(`^${Helpers.escapeRegExp(prefix)}`);
  }

  private isExpired(doc: CacheDocument): boolean {
    return doc.expiresAt !== null && doc.expiresAt.getTime() <= Date.now();
  }
}

export const createMongoBackend = (options: MongoBackendOptions): MongoBackend =>
  new MongoBackend(options);
