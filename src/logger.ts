/**
 * Application logging: structured JSONL file logger and a stderr logger.
 *
 * 1. createAppLogger writes one JSON object per line (timestamp, level,
 *    message, optional args) to data/logs/YYYY-MM-DD.jsonl. A new file
 *    starts each calendar day; old files are left alone.
 *
 * 2. createStreamLogger writes timestamped, level-prefixed lines to a
 *    stream, coloured only when the stream is a TTY.
 *
 * Library code never writes to the console directly; it takes an AppLogger.
 */

import fs from "node:fs";
import path from "node:path";
import util from "node:util";
import { stderr } from "node:process";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  args?: unknown[];
}

export interface AppLogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Logger that drops everything. */
export const nullLogger: AppLogger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};

function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function toSerializable(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack,
    };
  }
  return value;
}

export function createAppLogger(dataDir: string): AppLogger {
  const logsDir = path.join(dataDir, "logs");
  fs.mkdirSync(logsDir, { recursive: true });

  function append(level: LogLevel, message: string, args: unknown[]): void {
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(args.length > 0 ? { args: args.map(toSerializable) } : {}),
    } satisfies LogEntry);

    const filePath = path.join(logsDir, `${toDateString(new Date())}.jsonl`);
    fs.appendFileSync(filePath, `${line}\n`, "utf-8");
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      append("debug", message, args);
    },
    info(message: string, ...args: unknown[]): void {
      append("info", message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      append("warn", message, args);
    },
    error(message: string, ...args: unknown[]): void {
      append("error", message, args);
    },
  };
}

// ---------------------------------------------------------------------------
// Stdio formatting
// ---------------------------------------------------------------------------

/** ANSI color codes, used only when the stream is a TTY. */
const ANSI = {
  reset:  "\x1b[0m",
  dim:    "\x1b[2m",
  yellow: "\x1b[33m",
  red:    "\x1b[31m",
  cyan:   "\x1b[36m",
} as const;

const LEVEL_PREFIX: Record<LogLevel, string> = {
  debug: "DBG",
  info:  "INF",
  warn:  "WRN",
  error: "ERR",
};

const LEVEL_COLOR: Record<LogLevel, string> = {
  debug: ANSI.dim,
  info:  ANSI.cyan,
  warn:  ANSI.yellow,
  error: ANSI.red,
};

export function formatLine(level: LogLevel, message: string, isTty: boolean, now = new Date()): string {
  const ts = now.toISOString().slice(0, 19).replace("T", " ");
  const prefix = LEVEL_PREFIX[level];

  if (!isTty) {
    return `${ts} [${prefix}] ${message}`;
  }

  return `${ANSI.dim}${ts}${ANSI.reset} ${LEVEL_COLOR[level]}[${prefix}]${ANSI.reset} ${message}`;
}

// ---------------------------------------------------------------------------
// Stderr logger
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Logger that writes formatted lines to a stream (stderr by default), so
 * log output never mixes with a command's own stdout. Used by the CLI when
 * file logging is turned off in config.
 */
export function createStreamLogger(
  stream: NodeJS.WritableStream & { isTTY?: boolean } = stderr,
  minLevel: LogLevel = "info",
): AppLogger {
  const isTty = stream.isTTY ?? false;

  function write(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const text = args.length > 0 ? util.format(message, ...args) : message;
    stream.write(formatLine(level, text, isTty) + "\n");
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      write("debug", message, args);
    },
    info(message: string, ...args: unknown[]): void {
      write("info", message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      write("warn", message, args);
    },
    error(message: string, ...args: unknown[]): void {
      write("error", message, args);
    },
  };
}
