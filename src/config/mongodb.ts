import { MongoClient, ServerApiVersion } from "mongodb";
import { ConfigurationError } from "@/utils/errors";
import { Logger } from "@/utils/logger";
import { constants } from "./constants";
import type { EnvSource } from "./redis.config";

export interface MongoConfig {
  uri: string;
  database: string;
  maxPoolSize: number;
}

export const getMongoConfig = (env: EnvSource = process.env): MongoConfig => {
  const uri = env.MONGODB_URI?.trim();
  if (!uri) {
    throw new ConfigurationError(
      "MongoDB configuration missing. Please set the MONGODB_URI environment variable."
    );
  }

  return {
    uri,
    database: env.MONGODB_DATABASE?.trim() || constants.mongodb.database,
    maxPoolSize: constants.mongodb.maxPoolSize,
  };
};

/**
 * Open a dedicated client. Callers own the returned handle and close it; no
 * connection is shared behind their back.
 */
export async function connectMongo(config: MongoConfig): Promise<MongoClient> {
  const logger = Logger.getInstance("mongodb");
  const client = new MongoClient(config.uri, {
    maxPoolSize: config.maxPoolSize,
    serverApi: {
      version: ServerApiVersion.v1,
      strict: true,
      deprecationErrors: true,
    },
  });

  try {
    await client.connect();
    logger.info("MongoDB connection established", { database: config.database });
    return client;
  } catch (error) {
    logger.error("MongoDB connection error:", error);
    throw error;
  }
}
