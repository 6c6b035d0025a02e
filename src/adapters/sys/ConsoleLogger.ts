import type { LoggerPort } from "../../ports/sys/LoggerPort";

type Level = "debug" | "info" | "warn" | "error";

export interface ConsoleLoggerOptions {
  debug?: boolean;
  /** Prepended to every line, e.g. `[timers]`. */
  prefix?: string;
}

function format(message: string, meta?: Record<string, unknown>, prefix?: string): string {
  const line = prefix ? `${prefix} ${message}` : message;
  return meta && Object.keys(meta).length ? `${line} ${JSON.stringify(meta)}` : line;
}

export class ConsoleLogger implements LoggerPort {
  constructor(private readonly options: ConsoleLoggerOptions = {}) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    if (!this.options.debug) return;
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

  private log(level: Level, message: string, meta?: Record<string, unknown>) {
    const payload = format(message, meta, this.options.prefix);
    switch (level) {
      case "debug":
        return console.debug(payload);
      case "info":
        return console.info(payload);
      case "warn":
        return console.warn(payload);
      case "error":
        return console.error(payload);
    }
  }
}
