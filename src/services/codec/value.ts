import { constants } from "@/config/constants";
import { DecodeError, SerializationError } from "@/utils/errors";

type Wire = null | boolean | number | string | Wire[] | { [key: string]: Wire };

const TAG = "$memo";

type Tag = "undefined" | "number" | "bigint" | "date" | "bytes" | "buffer" | "map" | "set" | "object";

function tagged(tag: Tag, value?: Wire): Wire {
  return value === undefined ? { [TAG]: tag } : { [TAG]: tag, v: value };
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function toWire(value: unknown, path: string, ancestors: Set<object>): Wire {
  switch (typeof value) {
    case "undefined":
      return tagged("undefined");
    case "boolean":
    case "string":
      return value;
    case "number":
      if (Number.isFinite(value) && !Object.is(value, -0)) return value;
      return tagged("number", Object.is(value, -0) ? "-0" : String(value));
    case "bigint":
      return tagged("bigint", value.toString());
    case "symbol":
    case "function":
      throw new SerializationError(`cannot store a ${typeof value}`, path);
  }

  if (value === null) {
    return null;
  }
  if (typeof value !== "object") {
    throw new SerializationError(`cannot store a ${typeof value}`, path);
  }
  if (ancestors.has(value)) {
    throw new SerializationError("circular reference", path);
  }

  ancestors.add(value);
  try {
    return objectToWire(value, path, ancestors);
  } finally {
    ancestors.delete(value);
  }
}

function objectToWire(value: object, path: string, ancestors: Set<object>): Wire {
  if (Array.isArray(value)) {
    return Array.from(value, (item, index) => toWire(item, `${path}[${index}]`, ancestors));
  }
  if (value instanceof Date) {
    const time = value.getTime();
    return tagged("date", Number.isNaN(time) ? null : time);
  }
  if (Buffer.isBuffer(value)) {
    return tagged("buffer", value.toString("base64"));
  }
  if (value instanceof Uint8Array) {
    return tagged("bytes", Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("base64"));
  }
  if (value instanceof Map) {
    return tagged(
      "map",
      Array.from(value.entries(), ([k, v]: [unknown, unknown], index): Wire => [
        toWire(k, `${path}<key ${index}>`, ancestors),
        toWire(v, `${path}<value ${index}>`, ancestors),
      ])
    );
  }
  if (value instanceof Set) {
    return tagged(
      "set",
      Array.from(value.values(), (member: unknown, index) =>
        toWire(member, `${path}<member ${index}>`, ancestors)
      )
    );
  }
  if (!isPlainObject(value)) {
    const name = value.constructor?.name ?? "unknown";
    throw new SerializationError(`cannot store an instance of ${name}`, path);
  }

  const fields: Record<string, Wire> = Object.fromEntries(
    Object.keys(value).map((key) => [key, toWire(value[key], `${path}.${key}`, ancestors)])
  );
  // Plain objects that already use the tag key are wrapped so decode never
  // mistakes them for a tagged value.
  return Object.prototype.hasOwnProperty.call(fields, TAG) ? tagged("object", fields) : fields;
}

function fail(message: string, path: string): never {
  throw new DecodeError(`Malformed cached value: ${message} at ${path}`);
}

function isRecord(value: Wire): value is { [key: string]: Wire } {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectString(value: Wire | undefined, path: string): string {
  if (typeof value !== "string") fail("expected a string payload", path);
  return value;
}

function expectArray(value: Wire | undefined, path: string): Wire[] {
  if (!Array.isArray(value)) fail("expected an array payload", path);
  return value;
}

function fromWire(value: Wire, path: string): unknown {
  if (Array.isArray(value)) {
    return value.map((item, index) => fromWire(item, `${path}[${index}]`));
  }
  if (!isRecord(value)) {
    return value;
  }

  const tag = value[TAG];
  if (tag === undefined) {
    return Object.fromEntries(
      Object.entries(value).map(([key, field]) => [key, fromWire(field, `${path}.${key}`)])
    );
  }

  const payload = value.v;
  switch (tag) {
    case "undefined":
      return undefined;
    case "number": {
      const text = expectString(payload, path);
      if (text === "-0") return -0;
      if (text === "NaN" || text === "Infinity" || text === "-Infinity") return Number(text);
      return fail(`unknown number form ${text}`, path);
    }
    case "bigint": {
      const text = expectString(payload, path);
      if (!/^-?\d+$/.test(text)) fail("invalid bigint", path);
      return BigInt(text);
    }
    case "date":
      if (payload === null) return new Date(NaN);
      if (typeof payload !== "number") fail("invalid date", path);
      return new Date(payload);
    case "buffer":
      return Buffer.from(expectString(payload, path), "base64");
    case "bytes":
      return new Uint8Array(Buffer.from(expectString(payload, path), "base64"));
    case "map":
      return new Map(
        expectArray(payload, path).map((pair, index): [unknown, unknown] => {
          const entry = expectArray(pair, `${path}<entry ${index}>`);
          if (entry.length !== 2) fail("map entries are pairs", path);
          return [fromWire(entry[0], `${path}<key ${index}>`), fromWire(entry[1], `${path}<value ${index}>`)];
        })
      );
    case "set":
      return new Set(
        expectArray(payload, path).map((member, index) => fromWire(member, `${path}<member ${index}>`))
      );
    case "object": {
      if (payload === undefined || !isRecord(payload)) fail("expected an object payload", path);
      return Object.fromEntries(
        Object.entries(payload).map(([key, field]) => [key, fromWire(field, `${path}.${key}`)])
      );
    }
    default:
      return fail(`unknown tag ${JSON.stringify(tag)}`, path);
  }
}

/**
 * Versioned value encoding: one format byte, then UTF-8 JSON in which values
 * JSON cannot carry (undefined, bigint, non-finite numbers, -0, Date, Map,
 * Set, byte arrays) are tagged records.
 */
export class ValueCodec {
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });
  private readonly encoder = new TextEncoder();

  constructor(readonly version: number = constants.codec.valueFormatVersion) {}

  encode(value: unknown): Uint8Array {
    const json = JSON.stringify(toWire(value, "value", new Set()));
    const body = this.encoder.encode(json);
    const bytes = new Uint8Array(body.length + 1);
    bytes[0] = this.version;
    bytes.set(body, 1);
    return bytes;
  }

  decode(bytes: Uint8Array): unknown {
    if (bytes.length < 2 || bytes[0] !== this.version) {
      throw new DecodeError(
        `Unsupported cached value format ${bytes.length ? bytes[0] : "(empty)"}`
      );
    }

    let parsed: Wire;
    try {
      parsed = JSON.parse(this.decoder.decode(bytes.subarray(1)));
    } catch (error) {
      throw new DecodeError("Cached value is not valid JSON", { cause: error });
    }
    return fromWire(parsed, "value");
  }
}
