import {createWriteStream, mkdirSync, type WriteStream} from "node:fs";
import {join} from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogPayload {
  message: string;
  context?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let fileSink: WriteStream | null = null;

function normalizeLogLevel(value: string | undefined): LogLevel {
  if (!value) {
    return "info";
  }

  const normalized = value.toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }

  return "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      name: value.name,
      message: value.message,
      stack: value.stack
    };
  }

  if (typeof value === "bigint") {
    return value.toString();
  }

  return value;
}

function serializeContext(context: Record<string, unknown> | undefined): Record<string, unknown> | undefined {
  if (!context) {
    return undefined;
  }

  const serialized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(context)) {
    serialized[key] = serializeValue(value);
  }

  return serialized;
}

function writeLog(level: LogLevel, scope: string, payload: LogPayload): void {
  const threshold = normalizeLogLevel(process.env.LOG_LEVEL);
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[threshold]) {
    return;
  }

  const line = JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    scope,
    message: payload.message,
    ...(payload.context ? {context: serializeContext(payload.context)} : {})
  });

  fileSink?.write(`${line}\n`);

  if (level === "error") {
    process.stderr.write(`${line}\n`);
    return;
  }

  process.stdout.write(`${line}\n`);
}

export function createLogger(scope: string): Logger {
  return {
    debug(message, context) {
      writeLog("debug", scope, {message, context});
    },
    info(message, context) {
      writeLog("info", scope, {message, context});
    },
    warn(message, context) {
      writeLog("warn", scope, {message, context});
    },
    error(message, context) {
      writeLog("error", scope, {message, context});
    }
  };
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatLogFileName(prefix: string, at: Date): string {
  const date = `${at.getFullYear()}${pad(at.getMonth() + 1)}${pad(at.getDate())}`;
  const time = `${pad(at.getHours())}${pad(at.getMinutes())}${pad(at.getSeconds())}`;
  return `${prefix}_${date}_${time}.log`;
}

/**
 * Mirrors every log line into a per-run file under `dir`.
 * Returns the path of the opened file.
 */
export function openLogFile(dir: string, prefix: string, at: Date = new Date()): string {
  mkdirSync(dir, {recursive: true});
  const path = join(dir, formatLogFileName(prefix, at));
  fileSink?.end();
  fileSink = createWriteStream(path, {flags: "a", encoding: "utf8"});
  return path;
}

export function closeLogFile(): Promise<void> {
  const sink = fileSink;
  fileSink = null;
  if (!sink) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    sink.end(() => resolve());
  });
}
