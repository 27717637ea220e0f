export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

import {
  initTracing as initTracingInternal,
  shutdownTracing as shutdownTracingInternal,
} from "./tracing.js";

// stdout carries graph text and MCP traffic, so logs go to stderr
let writeLine = (msg: string): void => {
  process.stderr.write(msg + "\n");
};

function safeStringify(obj: Record<string, unknown>): string {
  try {
    return JSON.stringify(obj);
  } catch {
    return "[circular or unstringifiable]";
  }
}

function extractErrorMeta(
  meta?: Record<string, unknown>,
): Record<string, unknown> | undefined {
  if (!meta) return undefined;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (value instanceof Error) {
      result[key] = value.message;
      if (value.stack) {
        result[`${key}Stack`] = value.stack;
      }
    } else {
      result[key] = value;
    }
  }
  return result;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  private level: LogLevel;
  private format: LogFormat;

  constructor(level: LogLevel = "info", format: LogFormat = "pretty") {
    this.level = level;
    this.format = format;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  private log(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const processed = extractErrorMeta(meta);

    if (this.format === "json") {
      writeLine(
        safeStringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...processed,
        }),
      );
      return;
    }

    const metaStr = processed ? " " + safeStringify(processed) : "";
    writeLine(`[${level.toUpperCase()}] ${message}${metaStr}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }
}

export const logger = new Logger();

/** Redirects log output; returns a function restoring the previous sink. */
export function setLogSink(sink: (line: string) => void): () => void {
  const previous = writeLine;
  writeLine = sink;
  return () => {
    writeLine = previous;
  };
}

export {
  initTracingInternal as initTracing,
  shutdownTracingInternal as shutdownTracing,
};
