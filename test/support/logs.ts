import { Logger, type LogLevel } from "@/utils/logger";

export interface LogLine {
  level: LogLevel;
  scope: string;
  message: string;
  data?: Record<string, unknown>;
}

/** A logger that keeps its output for assertions. */
export function captureLogger(level: LogLevel = "debug") {
  const lines: LogLine[] = [];
  const logger = new Logger("test", level, (line) => {
    const parsed: LogLine = JSON.parse(line);
    lines.push(parsed);
  });
  return {
    logger,
    lines,
    messages: (wanted: LogLevel) => lines.filter((line) => line.level === wanted).map((line) => line.message),
  };
}
