import { ConfigurationError } from "@/utils/errors";
import { constants } from "./constants";

export interface RedisConfig {
  url: string;
  token: string;
  maxRetries: number;
  retryBackoff: number;
}

export type EnvSource = Record<string, string | undefined>;

export const getRedisConfig = (env: EnvSource = process.env): RedisConfig => {
  const url = env.UPSTASH_REDIS_REST_URL?.trim();
  const token = env.UPSTASH_REDIS_REST_TOKEN?.trim();

  if (!url || !token) {
    throw new ConfigurationError(
      "Redis configuration missing. Please set UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN environment variables."
    );
  }

  return {
    url,
    token,
    maxRetries: constants.redis.maxRetries,
    retryBackoff: constants.redis.retryBackoff,
  };
};
