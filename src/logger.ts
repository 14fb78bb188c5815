import { createWriteStream } from "node:fs";
import type { LogLevel } from "./types.js";

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LogSink {
  write(chunk: string): unknown;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Levelled logger writing one line per entry to a sink. The terminal is owned
 * by blessed while the app runs, so the sink is a file rather than stdout.
 */
export class StreamLogger implements Logger {
  constructor(
    private readonly sink: LogSink,
    private level: LogLevel = "info",
    private readonly clock: () => Date = () => new Date()
  ) {}

  setLevel(level: LogLevel): void {
    this.level = level;
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

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
      return;
    }

    this.sink.write(`${formatLine(this.clock(), level, message, meta)}\n`);
  }
}

export function formatLine(
  timestamp: Date,
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
): string {
  const prefix = `${timestamp.toISOString()} [${level.toUpperCase()}]`;
  if (!meta || Object.keys(meta).length === 0) {
    return `${prefix} ${message}`;
  }

  return `${prefix} ${message} ${safeJson(meta)}`;
}

function safeJson(value: Record<string, unknown>): string {
  try {
    return JSON.stringify(value, (_key, entry: unknown) =>
      entry instanceof Error ? { name: entry.name, message: entry.message } : entry
    );
  } catch {
    return "[unserializable]";
  }
}

export function createFileLogger(path: string, level: LogLevel): StreamLogger {
  const stream = createWriteStream(path, { flags: "a" });
  stream.on("error", () => {
    // write errors end file logging for the session
    stream.destroy();
  });
  return new StreamLogger(stream, level);
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
