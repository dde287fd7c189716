export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  data?: unknown;
}

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

export class Logger {
  private static readonly instances = new Map<string, Logger>();
  private readonly scope: string;
  private level: LogLevel;
  private sink: LogSink;

  constructor(scope: string, level: LogLevel = "info", sink?: LogSink) {
    this.scope = scope;
    this.level = level;
    this.sink = sink ?? ((line) => console.log(line));
  }

  /** One shared logger per scope, levelled from `LOG_LEVEL`. */
  public static getInstance(scope: string): Logger {
    let instance = Logger.instances.get(scope);
    if (!instance) {
      instance = new Logger(scope, parseLogLevel(process.env.LOG_LEVEL));
      Logger.instances.set(scope, instance);
    }
    return instance;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public setSink(sink: LogSink): void {
    this.sink = sink;
  }

  public isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      data,
    };
  }

  private log(entry: LogEntry): void {
    if (!this.isEnabled(entry.level)) return;
    this.sink(JSON.stringify(entry));
  }

  public debug(message: string, data?: unknown): void {
    this.log(this.formatLog("debug", message, data));
  }

  public info(message: string, data?: unknown): void {
    this.log(this.formatLog("info", message, data));
  }

  public warn(message: string, data?: unknown): void {
    this.log(this.formatLog("warn", message, data));
  }

  public error(message: string, error?: unknown): void {
    this.log(
      this.formatLog("error", message, {
        error: error instanceof Error ? error.message : error,
        stack: error instanceof Error ? error.stack : undefined,
      })
    );
  }
}
