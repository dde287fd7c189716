export const constants = {
  app: {
    name: "memostore",
  },
  cache: {
    namespace: "memostore",
    unknownSize: -1,
  },
  codec: {
    valueFormatVersion: 0x01,
    keyDigest: "sha256",
  },
  redis: {
    scanCount: 100,
    deleteBatchSize: 500,
    maxRetries: 3,
    retryBackoff: 100,
  },
  mongodb: {
    database: "memostore",
    collectionPrefix: "memostore",
    deleteBatchSize: 1000,
    maxPoolSize: 10,
  },
} as const;
