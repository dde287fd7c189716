import { BackendUnavailableError, type CacheStep } from "@/utils/errors";
import type { Logger } from "@/utils/logger";

export type BackendOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: BackendUnavailableError };

/**
 * - miss: the read is treated as absent and the value recomputed
 * - skip: caching degrades silently; the caller's result is unaffected
 * - raise: the failure reaches the caller
 */
export type FailurePolicy = "miss" | "skip" | "raise";

export const FAILURE_POLICY: Readonly<Record<CacheStep, FailurePolicy>> = {
  lookup: "miss",
  store: "skip",
  touch: "skip",
  evict: "skip",
  clear: "raise",
  size: "raise",
  health: "skip",
};

/**
 * Single boundary for backend calls: every call yields a typed outcome and is
 * logged according to the step's policy.
 */
export class BackendGuard {
  constructor(
    private readonly logger: Logger,
    private readonly context: Record<string, unknown> = {}
  ) {}

  async attempt<T>(step: CacheStep, run: () => Promise<T>): Promise<BackendOutcome<T>> {
    try {
      return { ok: true, value: await run() };
    } catch (error) {
      const failure = new BackendUnavailableError(step, error);
      const policy = FAILURE_POLICY[step];
      if (policy === "raise") {
        this.logger.error(`Cache ${step} failed`, failure);
      } else {
        this.logger.warn(`Cache ${step} failed, ${policy === "miss" ? "treating as a miss" : "continuing without cache"}`, {
          ...this.context,
          step,
          error: failure.message,
        });
      }
      return { ok: false, error: failure };
    }
  }

  /** Run a step whose policy is `raise`, returning its value or throwing. */
  async require<T>(step: CacheStep, run: () => Promise<T>): Promise<T> {
    const outcome = await this.attempt(step, run);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return outcome.value;
  }
}
