import { describe, expect, it } from "vitest";
import { Helpers } from "@/utils/helpers";

describe("Helpers", () => {
  it("generates ids from the given alphabet", () => {
    expect(Helpers.generateId()).toMatch(/^[0-9a-zA-Z]{12}$/);
    expect(Helpers.generateId(6, "ab")).toMatch(/^[ab]{6}$/);
  });

  it("chunks arrays", () => {
    expect(Helpers.chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
    expect(Helpers.chunk([], 3)).toEqual([]);
  });

  it("escapes regular expression and glob syntax", () => {
    expect(Helpers.escapeRegExp("a.b*(c)")).toBe("a\\.b\\*\\(c\\)");
    expect(Helpers.escapeGlob("ns:f*[x]?")).toBe("ns:f\\*\\[x\\]\\?");
  });

  it("races a promise against a timeout", async () => {
    await expect(Helpers.withTimeout(Promise.resolve("done"), 50, () => new Error("late"))).resolves.toBe("done");
    await expect(
      Helpers.withTimeout(new Promise<never>(() => undefined), 5, () => new Error("late"))
    ).rejects.toThrow("late");
  });
});
