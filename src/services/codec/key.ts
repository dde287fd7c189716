import { createHash } from "crypto";
import { constants } from "@/config/constants";
import { EncodingError } from "@/utils/errors";

export type CacheKey = string;

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Produces a tagged, order-normalized text form of an argument tree. Every
 * value carries its type so `1`, `"1"` and `1n` stay distinct; object keys,
 * map entries and set members are sorted so insertion order never matters.
 */
function canonicalize(value: unknown, path: string, ancestors: Set<object>): string {
  switch (typeof value) {
    case "undefined":
      return "u";
    case "boolean":
      return value ? "b:1" : "b:0";
    case "number":
      if (Object.is(value, -0)) return "d:-0";
      return `d:${String(value)}`;
    case "bigint":
      return `i:${value.toString()}`;
    case "string":
      return `s:${JSON.stringify(value)}`;
    case "symbol":
      throw new EncodingError("symbols have no stable representation", path);
    case "function":
      throw new EncodingError("functions have no stable representation", path);
  }

  if (value === null) {
    return "n";
  }
  if (typeof value !== "object") {
    throw new EncodingError(`unsupported argument type ${typeof value}`, path);
  }
  if (ancestors.has(value)) {
    throw new EncodingError("circular reference", path);
  }

  ancestors.add(value);
  try {
    return canonicalizeObject(value, path, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function canonicalizeObject(value: object, path: string, ancestors: Set<object>): string {
  if (Array.isArray(value)) {
    const items = Array.from(value, (item, index) =>
      canonicalize(item, `${path}[${index}]`, ancestors)
    );
    return `a[${items.join(",")}]`;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new EncodingError("invalid Date", path);
    }
    return `t:${value.toISOString()}`;
  }

  if (value instanceof Uint8Array) {
    return `x:${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")}`;
  }

  if (value instanceof Map) {
    const entries = Array.from(value.entries(), ([k, v]: [unknown, unknown]) => {
      const keyForm = canonicalize(k, `${path}<key>`, ancestors);
      return [keyForm, canonicalize(v, `${path}.get(${keyForm})`, ancestors)] as const;
    }).sort(([a, va], [b, vb]) => compare(a, b) || compare(va, vb));
    return `m{${entries.map(([k, v]) => `${k}=>${v}`).join(",")}}`;
  }

  if (value instanceof Set) {
    const members = Array.from(value.values(), (member: unknown) =>
      canonicalize(member, `${path}<member>`, ancestors)
    ).sort(compare);
    return `e{${members.join(",")}}`;
  }

  if (!isPlainObject(value)) {
    const name = value.constructor?.name ?? "unknown";
    throw new EncodingError(`instances of ${name} have no stable representation`, path);
  }

  if (Object.getOwnPropertySymbols(value).length > 0) {
    throw new EncodingError("symbol-keyed properties have no stable representation", path);
  }

  const fields = Object.keys(value)
    .sort(compare)
    .map((key) => `${JSON.stringify(key)}:${canonicalize(value[key], `${path}.${key}`, ancestors)}`);
  return `o{${fields.join(",")}}`;
}

/**
 * Derives store-independent cache keys of the form `<identity>:<digest>`.
 */
export class KeyCodec {
  constructor(private readonly digest: string = constants.codec.keyDigest) {}

  encode(
    functionIdentity: string,
    positionalArgs: readonly unknown[],
    keywordArgs: Readonly<Record<string, unknown>> = {}
  ): CacheKey {
    if (!functionIdentity) {
      throw new EncodingError("function identity must be a non-empty string", "identity");
    }

    const positional = canonicalize(positionalArgs, "args", new Set());
    const keyword = canonicalize(keywordArgs, "kwargs", new Set());
    const hash = createHash(this.digest).update(`${positional}|${keyword}`).digest("hex");
    return `${functionIdentity}:${hash}`;
  }

  /** The canonical text a digest is computed from; exposed for diagnostics. */
  canonical(positionalArgs: readonly unknown[], keywordArgs: Readonly<Record<string, unknown>> = {}): string {
    return `${canonicalize(positionalArgs, "args", new Set())}|${canonicalize(keywordArgs, "kwargs", new Set())}`;
  }
}
