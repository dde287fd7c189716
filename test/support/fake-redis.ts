interface StoredString {
  value: unknown;
  expiresAt: number | null;
}

function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === "\\" && i + 1 < pattern.length) {
      source += pattern[++i].replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    } else if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    }
  }
  return new RegExp(`^${source}$`);
}

/**
 * In-process stand-in for the Upstash REST client, covering the commands the
 * backend issues. Constructed clients are collected in `instances`.
 */
export class FakeRedis {
  static instances: FakeRedis[] = [];

  readonly strings = new Map<string, StoredString>();
  readonly zsets = new Map<string, Map<string, number>>();
  readonly calls: string[] = [];
  failing = false;

  constructor(readonly options?: unknown) {
    FakeRedis.instances.push(this);
  }

  private record(command: string): void {
    this.calls.push(command);
    if (this.failing) {
      throw new Error(`connection refused (${command})`);
    }
  }

  private live(key: string): StoredString | undefined {
    const entry = this.strings.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.strings.delete(key);
      return undefined;
    }
    return entry;
  }

  async get(key: string): Promise<unknown> {
    this.record("get");
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: unknown, opts?: { px?: number }): Promise<"OK"> {
    this.record("set");
    this.strings.set(key, {
      value,
      expiresAt: opts?.px === undefined ? null : Date.now() + opts.px,
    });
    return "OK";
  }

  async del(...keys: string[]): Promise<number> {
    this.record("del");
    let removed = 0;
    for (const key of keys) {
      if (this.strings.delete(key) || this.zsets.delete(key)) removed++;
    }
    return removed;
  }

  async scan(cursor: string | number, opts: { match: string; count: number }): Promise<[string, string[]]> {
    this.record("scan");
    const pattern = globToRegExp(opts.match);
    const all = [...this.strings.keys(), ...this.zsets.keys()].sort();
    const start = Number(cursor);
    const page = all.slice(start, start + opts.count).filter((key) => pattern.test(key));
    const next = start + opts.count >= all.length ? 0 : start + opts.count;
    return [String(next), page];
  }

  async zadd(key: string, entry: { score: number; member: string }): Promise<number> {
    this.record("zadd");
    let zset = this.zsets.get(key);
    if (!zset) {
      zset = new Map();
      this.zsets.set(key, zset);
    }
    const added = zset.has(entry.member) ? 0 : 1;
    zset.set(entry.member, entry.score);
    return added;
  }

  async zrange(key: string, start: number, stop: number): Promise<string[]> {
    this.record("zrange");
    const zset = this.zsets.get(key);
    if (!zset) return [];
    return [...zset.entries()]
      .sort(([a, sa], [b, sb]) => sa - sb || (a < b ? -1 : a > b ? 1 : 0))
      .slice(start, stop + 1)
      .map(([member]) => member);
  }

  async zrem(key: string, ...members: string[]): Promise<number> {
    this.record("zrem");
    const zset = this.zsets.get(key);
    if (!zset) return 0;
    let removed = 0;
    for (const member of members) {
      if (zset.delete(member)) removed++;
    }
    return removed;
  }

  async zcard(key: string): Promise<number> {
    this.record("zcard");
    return this.zsets.get(key)?.size ?? 0;
  }

  async ping(): Promise<string> {
    this.record("ping");
    return "PONG";
  }
}
