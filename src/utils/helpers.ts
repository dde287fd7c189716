import { customAlphabet } from "nanoid";

const ID_ALPHABET =
  "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";

export class Helpers {
  /** Random id over `alphabet`; used to correlate the log lines of one fill. */
  static generateId(length: number = 12, alphabet: string = ID_ALPHABET): string {
    const nanoid = customAlphabet(alphabet, length);
    return nanoid();
  }

  /** Split `array` into batches of at most `size` items. */
  static chunk<T>(array: readonly T[], size: number): T[][] {
    const chunks: T[][] = [];
    for (let i = 0; i < array.length; i += size) {
      chunks.push(array.slice(i, i + size));
    }
    return chunks;
  }

  /** Escape a literal for use inside a RegExp source. */
  static escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  }

  /** Escape a literal for a Redis SCAN MATCH glob. */
  static escapeGlob(value: string): string {
    return value.replace(/[*?[\]\\]/g, "\\$&");
  }

  /**
   * Settle a promise within `ms`, rejecting with the error from `onTimeout`
   * otherwise. The timer never outlives the race.
   */
  static async withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    onTimeout: () => Error
  ): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(onTimeout()), ms);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
