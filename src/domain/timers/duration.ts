import { InvalidDurationError } from "./TimerErrors";

export const SECOND_MS = 1_000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

export interface DurationParts {
  days?: number;
  hours?: number;
  minutes?: number;
  seconds?: number;
  milliseconds?: number;
}

const PART_UNITS: Record<keyof DurationParts, number> = {
  days: DAY_MS,
  hours: HOUR_MS,
  minutes: MINUTE_MS,
  seconds: SECOND_MS,
  milliseconds: 1,
};

const CLOCK_PATTERN = /^(\d+):(\d{1,2})(?::(\d{1,2})(?:\.(\d{1,6}))?)?$/;
const SECONDS_PATTERN = /^\d+(?:\.\d+)?$/;

/**
 * Parses a configured duration into milliseconds.
 *
 * Accepts `"HH:MM"`, `"HH:MM:SS"`, `"HH:MM:SS.fff"`, a plain number of
 * seconds (as a number or numeric string), or an object of parts such as
 * `{ hours: 1, minutes: 30 }`. Hours are unbounded. Negative values are
 * rejected.
 */
export function parseDuration(input: unknown): number {
  if (typeof input === "number") {
    return fromSeconds(input, input);
  }

  if (typeof input === "string") {
    const text = input.trim();
    if (SECONDS_PATTERN.test(text)) {
      return fromSeconds(Number(text), input);
    }
    const match = CLOCK_PATTERN.exec(text);
    if (!match) throw new InvalidDurationError(input);
    const [, hours, minutes, seconds, fraction] = match;
    const millis = fraction ? Number(fraction.padEnd(3, "0").slice(0, 3)) : 0;
    return (
      Number(hours) * HOUR_MS +
      Number(minutes) * MINUTE_MS +
      Number(seconds ?? 0) * SECOND_MS +
      millis
    );
  }

  if (input && typeof input === "object" && !Array.isArray(input)) {
    return fromParts(input, input);
  }

  throw new InvalidDurationError(input);
}

/** Formats milliseconds as `H:MM:SS`, dropping sub-second precision. */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(Math.max(0, ms) / SECOND_MS);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${hours}:${String(minutes).padStart(2, "0")}:${String(seconds).padStart(2, "0")}`;
}

export function assertDuration(ms: number): number {
  if (!Number.isFinite(ms) || ms < 0) {
    throw new InvalidDurationError(ms);
  }
  return ms;
}

function fromSeconds(seconds: number, original: unknown): number {
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidDurationError(original);
  }
  return Math.round(seconds * SECOND_MS);
}

function fromParts(parts: object, original: unknown): number {
  const entries = Object.entries(parts);
  if (entries.length === 0) throw new InvalidDurationError(original);

  let total = 0;
  for (const [key, value] of entries) {
    if (!isPartName(key) || typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      throw new InvalidDurationError(original);
    }
    total += value * PART_UNITS[key];
  }
  return Math.round(total);
}

function isPartName(key: string): key is keyof DurationParts {
  return Object.prototype.hasOwnProperty.call(PART_UNITS, key);
}
