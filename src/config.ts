import fs from "fs";
import path from "path";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
import { parseDuration } from "./domain/timers/duration";
import type { TimerConfig } from "./domain/timers/TimerEntity";
import { InvalidConfigurationError } from "./domain/timers/TimerErrors";
import type { LoggerPort } from "./ports/sys/LoggerPort";

export const DEFAULT_DURATION = 0;
export const DEFAULT_RESTORE = true;
export const DEFAULT_RESTORE_GRACE_PERIOD = 0;

export interface LoadedConfig {
  timers: TimerConfig[];
  path?: string;
}

const DEFAULT_CONFIG_FILENAMES = ["timers.json", "timers.config.json"];
const TIMER_ID_PATTERN = /^[a-z0-9_]+$/;

export function loadConfig(configPath?: string, logger: LoggerPort = new ConsoleLogger()): LoadedConfig {
  const searchPaths = configPath
    ? [configPath]
    : DEFAULT_CONFIG_FILENAMES.map((name) => path.resolve(process.cwd(), name));

  for (const candidate of searchPaths) {
    try {
      const resolved = path.resolve(candidate);
      if (!fs.existsSync(resolved)) continue;
      const raw = fs.readFileSync(resolved, "utf8");
      const parsed: unknown = JSON.parse(raw);
      return { timers: normalizeTimers(parsed, logger), path: resolved };
    } catch (err) {
      logger.warn(`Failed to load config from ${candidate}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  return { timers: [] };
}

/**
 * Validates the `timers` section. Invalid entries are logged and skipped so a
 * single bad timer never prevents the others from loading.
 */
export function normalizeTimers(input: unknown, logger: LoggerPort = new ConsoleLogger()): TimerConfig[] {
  if (!isRecord(input) || input.timers === undefined) return [];
  if (!isRecord(input.timers)) {
    logger.warn('Invalid "timers" section; expected an object keyed by timer id.');
    return [];
  }

  const out: TimerConfig[] = [];
  for (const [id, value] of Object.entries(input.timers)) {
    try {
      out.push(parseTimerEntry(id, value ?? {}));
    } catch (err) {
      logger.warn(`Skipping timer "${id}"`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
  return out;
}

export function parseTimerEntry(id: string, value: unknown): TimerConfig {
  if (!TIMER_ID_PATTERN.test(id)) {
    throw new InvalidConfigurationError(id, "ids may only contain lowercase letters, digits and underscores.");
  }
  if (!isRecord(value)) {
    throw new InvalidConfigurationError(id, "expected an object.");
  }
  const entry = value;

  const config: TimerConfig = {
    id,
    duration: field(id, "duration", () =>
      entry.duration === undefined ? DEFAULT_DURATION : parseDuration(entry.duration)
    ),
    restore: field(id, "restore", () => parseBoolean(entry.restore, DEFAULT_RESTORE)),
    restoreGracePeriod: field(id, "restore_grace_period", () =>
      entry.restore_grace_period === undefined
        ? DEFAULT_RESTORE_GRACE_PERIOD
        : parseDuration(entry.restore_grace_period)
    ),
  };

  if (typeof entry.name === "string" && entry.name.trim()) config.name = entry.name.trim();
  if (typeof entry.icon === "string" && entry.icon.trim()) config.icon = entry.icon.trim();
  return config;
}

function field<T>(id: string, name: string, read: () => T): T {
  try {
    return read();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidConfigurationError(id, `${name}: ${reason}`);
  }
}

function parseBoolean(value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  if (value === "true") return true;
  if (value === "false") return false;
  throw new Error(`expected a boolean, got ${JSON.stringify(value)}.`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
