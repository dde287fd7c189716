import type { ZodType } from "zod";
import {
  memoizeSettingsSchema,
  parseSettings,
  storeSettingsSchema,
  type MemoizeSettingsInput,
  type StoreSettings,
  type StoreSettingsInput,
} from "@/config";
import { constants } from "@/config/constants";
import { checkBackendHealth, type HealthCheck } from "@/monitoring/health";
import type { CacheInfo, StorageBackend } from "@/services/cache/types";
import { KeyCodec } from "@/services/codec/key";
import { ValueCodec } from "@/services/codec/value";
import { ConfigurationError } from "@/utils/errors";
import { Logger } from "@/utils/logger";
import { CacheDecorator, type CallOptions } from "./decorator";

export type MemoStoreOptions = StoreSettingsInput & {
  backend: StorageBackend;
  logger?: Logger;
  keyCodec?: KeyCodec;
  valueCodec?: ValueCodec;
};

export type MemoizeOptions<T> = MemoizeSettingsInput & {
  /** Validates values read back from the store; a mismatch is treated as a miss. */
  schema?: ZodType<T>;
};

export type CachedFunction<A extends unknown[], T> = ((...args: A) => Promise<T>) & {
  readonly identity: string;
  cacheInfo(): Promise<CacheInfo>;
  cacheClear(): Promise<void>;
  clear(): Promise<void>;
  invoke(args: A, options?: CallOptions): Promise<T>;
  /** The store key a call with these arguments reads and writes. */
  cacheKey(...args: A): string;
};

/**
 * Binds a backend and store-wide defaults. Every function memoized through
 * one store shares its backend and namespace but keeps its own keys, stats
 * and recency index.
 */
export class MemoStore {
  readonly backend: StorageBackend;
  readonly settings: StoreSettings;
  private readonly logger: Logger;
  private readonly keyCodec: KeyCodec;
  private readonly valueCodec: ValueCodec;
  private readonly identities = new Set<string>();

  constructor(options: MemoStoreOptions) {
    const { backend, logger, keyCodec, valueCodec, ...settings } = options;
    this.backend = backend;
    this.settings = parseSettings(storeSettingsSchema, settings, "store options");
    this.logger = logger ?? Logger.getInstance(constants.app.name);
    this.keyCodec = keyCodec ?? new KeyCodec();
    this.valueCodec = valueCodec ?? new ValueCodec();
  }

  get namespace(): string {
    return this.settings.namespace;
  }

  memoize<A extends unknown[], T>(
    fn: (...args: A) => T | Promise<T>,
    options: MemoizeOptions<T> = {}
  ): CachedFunction<A, T> {
    const { schema, ...rest } = options;
    const settings = parseSettings(memoizeSettingsSchema, rest, "memoize options");
    const identity = settings.name ?? fn.name;
    if (!identity) {
      throw new ConfigurationError("Cannot memoize an anonymous function without a name option");
    }
    // ':' separates identity from digest; one function's prefix must not cover another's keys.
    if (identity.includes(":")) {
      throw new ConfigurationError(`Function identity "${identity}" must not contain ':'`);
    }
    if (this.identities.has(identity)) {
      this.logger.warn("Function identity already memoized on this store; entries will be shared", {
        function: identity,
      });
    }
    this.identities.add(identity);

    const maxsize = settings.maxsize ?? this.settings.maxsize;
    const decorator = new CacheDecorator<A, T>({
      fn,
      identity,
      namespace: this.namespace,
      backend: this.backend,
      logger: this.logger,
      keyCodec: this.keyCodec,
      valueCodec: this.valueCodec,
      maxsize: maxsize ? maxsize : null,
      ttl: settings.ttl ?? this.settings.ttl,
      waitTimeoutMs: settings.waitTimeoutMs ?? this.settings.waitTimeoutMs,
      fillErrorPolicy: settings.fillErrorPolicy ?? this.settings.fillErrorPolicy ?? "retry",
      schema,
    });

    this.logger.debug("Memoized function", {
      function: identity,
      backend: this.backend.kind,
      maxsize: decorator.maxsize,
    });

    const cached = (...args: A): Promise<T> => decorator.call(args);
    return Object.assign(cached, {
      identity,
      cacheInfo: () => decorator.cacheInfo(),
      cacheClear: () => decorator.clear(),
      clear: () => decorator.clear(),
      invoke: (args: A, callOptions?: CallOptions) => decorator.call(args, callOptions),
      cacheKey: (...args: A) => decorator.storeKey(args),
    });
  }

  async healthCheck(): Promise<HealthCheck> {
    return checkBackendHealth(this.backend, `${this.namespace}:__health__`, this.logger);
  }
}
