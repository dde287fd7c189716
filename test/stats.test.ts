import { describe, expect, it } from "vitest";
import { StatsCounter } from "@/services/stats/counter";

describe("StatsCounter", () => {
  it("counts hits and misses in the current epoch", () => {
    const stats = new StatsCounter();
    const epoch = stats.epoch;
    stats.recordHit(epoch);
    stats.recordHit(epoch);
    stats.recordMiss(epoch);

    expect(stats.snapshot()).toEqual({ hits: 2, misses: 1 });
  });

  it("drops counts from a closed epoch", () => {
    const stats = new StatsCounter();
    const stale = stats.epoch;
    stats.invalidate();
    stats.reset();

    expect(stats.recordHit(stale)).toBe(false);
    expect(stats.recordMiss(stale)).toBe(false);
    expect(stats.recordMiss(stats.epoch)).toBe(true);
    expect(stats.snapshot()).toEqual({ hits: 0, misses: 1 });
  });

  it("returns a copy", () => {
    const stats = new StatsCounter();
    const snapshot = stats.snapshot();
    stats.recordHit(stats.epoch);
    expect(snapshot).toEqual({ hits: 0, misses: 0 });
  });
});
