import { describe, expect, it } from "vitest";
import { KeyCodec } from "@/services/codec/key";
import { EncodingError } from "@/utils/errors";

describe("KeyCodec", () => {
  const codec = new KeyCodec();

  it("prefixes a sha256 digest with the function identity", () => {
    expect(codec.encode("lookupUser", [42])).toMatch(/^lookupUser:[0-9a-f]{64}$/);
  });

  it("is deterministic for equal arguments", () => {
    const first = codec.encode("fn", [{ id: 1, tags: ["a", "b"] }, new Date(0)]);
    const second = codec.encode("fn", [{ id: 1, tags: ["a", "b"] }, new Date(0)]);
    expect(first).toBe(second);
  });

  it("ignores object key order", () => {
    expect(codec.encode("fn", [{ a: 1, b: 2 }])).toBe(codec.encode("fn", [{ b: 2, a: 1 }]));
    expect(codec.encode("fn", [], { limit: 5, offset: 10 })).toBe(
      codec.encode("fn", [], { offset: 10, limit: 5 })
    );
  });

  it("keeps values of different types apart", () => {
    const keys = new Set([
      codec.encode("fn", [1]),
      codec.encode("fn", ["1"]),
      codec.encode("fn", [1n]),
      codec.encode("fn", [true]),
      codec.encode("fn", [null]),
      codec.encode("fn", [undefined]),
      codec.encode("fn", [[1]]),
    ]);
    expect(keys.size).toBe(7);
  });

  it("separates positional and keyword arguments", () => {
    expect(codec.encode("fn", [{ x: 1 }])).not.toBe(codec.encode("fn", [], { x: 1 }));
  });

  it("scopes keys by function identity", () => {
    expect(codec.encode("a", [1]).split(":")[1]).toBe(codec.encode("b", [1]).split(":")[1]);
    expect(codec.encode("a", [1])).not.toBe(codec.encode("b", [1]));
  });

  describe("canonical form", () => {
    it("tags scalars", () => {
      expect(codec.canonical([1, "a", null, undefined, true, -0, 2n])).toBe(
        'a[d:1,s:"a",n,u,b:1,d:-0,i:2]|o{}'
      );
    });

    it("sorts object keys, map entries and set members", () => {
      expect(codec.canonical([{ b: 2, a: 1 }])).toBe('a[o{"a":d:1,"b":d:2}]|o{}');
      expect(
        codec.canonical([
          new Map<string, number>([
            ["b", 1],
            ["a", 2],
          ]),
        ])
      ).toBe('a[m{s:"a"=>d:2,s:"b"=>d:1}]|o{}');
      expect(codec.canonical([new Set(["z", "y"])])).toBe('a[e{s:"y",s:"z"}]|o{}');
    });

    it("orders map entries with equal keys by their values", () => {
      const forward = new Map<object, number>([
        [{ a: 1 }, 1],
        [{ a: 1 }, 2],
      ]);
      const reverse = new Map<object, number>([
        [{ a: 1 }, 2],
        [{ a: 1 }, 1],
      ]);

      expect(codec.canonical([forward])).toBe(codec.canonical([reverse]));
      expect(codec.encode("fn", [forward])).toBe(codec.encode("fn", [reverse]));
    });

    it("encodes dates and byte arrays by content", () => {
      expect(codec.canonical([new Date(0), new Uint8Array([1, 255])])).toBe(
        "a[t:1970-01-01T00:00:00.000Z,x:01ff]|o{}"
      );
    });

    it("allows the same object twice when it is not an ancestor of itself", () => {
      const shared = { v: 1 };
      expect(codec.canonical([shared, shared])).toBe('a[o{"v":d:1},o{"v":d:1}]|o{}');
    });
  });

  describe("unencodable arguments", () => {
    it("rejects functions with the argument path", () => {
      const error = captureError(() => codec.encode("fn", [() => 1]));
      expect(error).toBeInstanceOf(EncodingError);
      expect(error).toMatchObject({ path: "args[0]" });
      expect(error?.message).toBe("functions have no stable representation at args[0]");
    });

    it("rejects circular structures", () => {
      const node: Record<string, unknown> = { name: "root" };
      node.self = node;
      const error = captureError(() => codec.encode("fn", [node]));
      expect(error).toBeInstanceOf(EncodingError);
      expect(error).toMatchObject({ path: "args[0].self" });
    });

    it("rejects class instances", () => {
      class Point {
        constructor(readonly x: number) {}
      }
      const error = captureError(() => codec.encode("fn", [], { at: new Point(1) }));
      expect(error?.message).toBe("instances of Point have no stable representation at kwargs.at");
    });

    it("rejects symbols, invalid dates and symbol keys", () => {
      expect(() => codec.encode("fn", [Symbol("s")])).toThrow(EncodingError);
      expect(() => codec.encode("fn", [new Date(NaN)])).toThrow(EncodingError);
      expect(() => codec.encode("fn", [{ [Symbol("k")]: 1 }])).toThrow(EncodingError);
    });

    it("rejects an empty identity", () => {
      const error = captureError(() => codec.encode("", [1]));
      expect(error).toMatchObject({ path: "identity" });
    });
  });
});

function captureError(run: () => unknown): Error | undefined {
  try {
    run();
  } catch (error) {
    if (error instanceof Error) return error;
  }
  return undefined;
}
