import { z } from "zod";
import { ConfigurationError } from "@/utils/errors";
import { constants } from "./constants";
import type { EnvSource } from "./redis.config";

export const fillErrorPolicySchema = z.enum(["retry", "propagate"]);

export type FillErrorPolicy = z.infer<typeof fillErrorPolicySchema>;

const cachingOptionsSchema = z.object({
  /** Seconds an entry stays live; absent means no expiry. */
  ttl: z.number().finite().positive().optional(),
  /** Positive bound enabling LRU bookkeeping; 0 or absent means unbounded. */
  maxsize: z.number().int().nonnegative().optional(),
  waitTimeoutMs: z.number().int().positive().optional(),
  fillErrorPolicy: fillErrorPolicySchema.optional(),
});

export const storeSettingsSchema = cachingOptionsSchema.extend({
  namespace: z
    .string()
    .min(1)
    .refine((value) => !/[*?[\]\\]/.test(value), {
      message: "namespace must not contain glob characters",
    })
    .default(constants.cache.namespace),
});

export const memoizeSettingsSchema = cachingOptionsSchema.extend({
  name: z
    .string()
    .min(1)
    .refine((value) => !value.includes(":"), {
      message: "name must not contain ':'",
    })
    .optional(),
});

export type StoreSettings = z.output<typeof storeSettingsSchema>;
export type StoreSettingsInput = z.input<typeof storeSettingsSchema>;
export type MemoizeSettingsInput = z.input<typeof memoizeSettingsSchema>;

export function parseSettings<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  label: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid ${label}: ${details}`);
  }
  return result.data;
}

const optionalNumber = z.preprocess(
  (value) => (value === undefined || value === "" ? undefined : Number(value)),
  z.number().optional()
);

const envSchema = z.object({
  MEMOSTORE_NAMESPACE: z.string().optional(),
  MEMOSTORE_TTL: optionalNumber,
  MEMOSTORE_MAXSIZE: optionalNumber,
  MEMOSTORE_WAIT_TIMEOUT_MS: optionalNumber,
  MEMOSTORE_FILL_ERROR_POLICY: z.string().optional(),
});

/**
 * Read store settings from `MEMOSTORE_*` variables and validate them with the
 * same rules as programmatic options.
 */
export function loadConfigFromEnv(env: EnvSource = process.env): StoreSettings {
  const raw = parseSettings(envSchema, env, "environment");
  return parseSettings(
    storeSettingsSchema,
    {
      namespace: raw.MEMOSTORE_NAMESPACE?.trim() || undefined,
      ttl: raw.MEMOSTORE_TTL,
      maxsize: raw.MEMOSTORE_MAXSIZE,
      waitTimeoutMs: raw.MEMOSTORE_WAIT_TIMEOUT_MS,
      fillErrorPolicy: raw.MEMOSTORE_FILL_ERROR_POLICY?.trim() || undefined,
    },
    "environment"
  );
}
