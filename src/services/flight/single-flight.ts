import { FillTimeoutError } from "@/utils/errors";
import { Helpers } from "@/utils/helpers";

export type FillOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

interface Flight<T> {
  readonly promise: Promise<FillOutcome<T>>;
  resolve(outcome: FillOutcome<T>): void;
}

export interface LeaderSlot<T> {
  readonly role: "leader";
  /** Publish the fill's outcome to every joined caller and free the key. */
  settle(outcome: FillOutcome<T>): void;
}

export interface FollowerSlot<T> {
  readonly role: "follower";
  wait(timeoutMs?: number): Promise<FillOutcome<T>>;
}

export type Slot<T> = LeaderSlot<T> | FollowerSlot<T>;

/**
 * At most one fill per key: the first caller becomes the leader, later
 * callers follow until the leader settles. Outcomes resolve rather than
 * reject, so a failure nobody waits for is never unhandled.
 */
export class SingleFlight<T> {
  private flights = new Map<string, Flight<T>>();

  acquire(key: string): Slot<T> {
    const existing = this.flights.get(key);
    if (existing) {
      return {
        role: "follower",
        wait: (timeoutMs) => {
          if (timeoutMs === undefined) {
            return existing.promise;
          }
          const limit: number = timeoutMs;
          return Helpers.withTimeout(existing.promise, limit, () => new FillTimeoutError(key, limit));
        },
      };
    }

    let resolve: (outcome: FillOutcome<T>) => void = () => undefined;
    const promise = new Promise<FillOutcome<T>>((done) => {
      resolve = done;
    });
    const flight: Flight<T> = { promise, resolve };
    const registry = this.flights;
    registry.set(key, flight);

    let settled = false;
    return {
      role: "leader",
      settle: (outcome) => {
        if (settled) return;
        settled = true;
        if (registry.get(key) === flight) {
          registry.delete(key);
        }
        flight.resolve(outcome);
      },
    };
  }

  /**
   * Forget every in-flight key. Running leaders still settle their own
   * followers, but new callers start fresh flights.
   */
  detachAll(): void {
    this.flights = new Map();
  }

  get inFlight(): number {
    return this.flights.size;
  }
}
