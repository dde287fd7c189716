export abstract class MemoStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** An argument could not be turned into a canonical key. */
export class EncodingError extends MemoStoreError {
  readonly name = "EncodingError";

  constructor(
    message: string,
    readonly path: string
  ) {
    super(`${message} at ${path}`);
  }
}

/** A computed value could not be encoded for storage. */
export class SerializationError extends MemoStoreError {
  readonly name = "SerializationError";

  constructor(
    message: string,
    readonly path: string
  ) {
    super(`${message} at ${path}`);
  }
}

export class DecodeError extends MemoStoreError {
  readonly name = "DecodeError";
}

/** Engine steps that talk to a backend; each has one failure policy. */
export type CacheStep = "lookup" | "store" | "touch" | "evict" | "clear" | "size" | "health";

export class BackendUnavailableError extends MemoStoreError {
  readonly name = "BackendUnavailableError";

  constructor(
    readonly step: CacheStep,
    cause: unknown
  ) {
    super(
      `Backend ${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class FillTimeoutError extends MemoStoreError {
  readonly name = "FillTimeoutError";

  constructor(
    readonly key: string,
    readonly timeoutMs: number
  ) {
    super(`Timed out after ${timeoutMs}ms waiting for the in-flight fill of ${key}`);
  }
}

export class ConfigurationError extends MemoStoreError {
  readonly name = "ConfigurationError";
}

export function isMemoStoreError(error: unknown): error is MemoStoreError {
  return error instanceof MemoStoreError;
}
