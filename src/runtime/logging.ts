import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  /** Restores the console and resolves once the log file is flushed. */
  shutdown(): Promise<void>;
}

type ConsoleLevel = "log" | "debug" | "info" | "warn" | "error";

/** Mirrors console output into `logFile` (append mode) until `shutdown` is called. */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: async () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  stream.write(`[${new Date().toISOString()}] --- timer service started ---\n`);

  const original: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    debug: console.debug.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  const mirror = (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      stream.write(`[${new Date().toISOString()}] ${level.toUpperCase()} ${args.map(stringify).join(" ")}\n`);
    };

  console.log = mirror("log");
  console.debug = mirror("debug");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closed: Promise<void> | null = null;
  const shutdown = () => {
    if (closed) return closed;
    console.log = original.log;
    console.debug = original.debug;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    stream.write(`[${new Date().toISOString()}] --- timer service stopped ---\n`);
    closed = new Promise<void>((resolve, reject) => {
      stream.once("error", reject);
      stream.end(() => resolve());
    });
    return closed;
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}

export function stringify(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}
