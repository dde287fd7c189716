export { MemoStore } from "@/services/memo/store";
export type { CachedFunction, MemoizeOptions, MemoStoreOptions } from "@/services/memo/store";
export { UNKNOWN_SIZE } from "@/services/memo/decorator";
export type { CallOptions } from "@/services/memo/decorator";

export { createMemoryBackend, MemoryBackend } from "@/services/cache/memory";
export { createRedisBackend, createRedisInstance, RedisBackend } from "@/services/cache/redis";
export type { RedisBackendOptions } from "@/services/cache/redis";
export { createMongoBackend, MongoBackend } from "@/services/cache/mongodb";
export type { MongoBackendOptions } from "@/services/cache/mongodb";
export { FAILURE_POLICY } from "@/services/cache/outcome";
export type { FailurePolicy } from "@/services/cache/outcome";
export type { CacheInfo, RecencyIndex, StorageBackend } from "@/services/cache/types";

export { KeyCodec } from "@/services/codec/key";
export type { CacheKey } from "@/services/codec/key";
export { ValueCodec } from "@/services/codec/value";

export { loadConfigFromEnv } from "@/config";
export type { FillErrorPolicy, MemoizeSettingsInput, StoreSettings, StoreSettingsInput } from "@/config";
export { getRedisConfig } from "@/config/redis.config";
export { connectMongo, getMongoConfig } from "@/config/mongodb";
export type { HealthCheck } from "@/monitoring/health";

export {
  BackendUnavailableError,
  ConfigurationError,
  DecodeError,
  EncodingError,
  FillTimeoutError,
  MemoStoreError,
  SerializationError,
  isMemoStoreError,
} from "@/utils/errors";
export { Logger } from "@/utils/logger";
export type { LogLevel, LogSink } from "@/utils/logger";
