import { isTimerState, TimerStates, type TimerState } from "./TimerState";

export const SNAPSHOT_VERSION = 1;

/** Minimal record needed to rebuild a timer after a restart. Times are epoch ms. */
export interface TimerSnapshot {
  state: TimerState;
  endAt?: number;
  remaining?: number;
  duration: number;
}

/** Persisted JSON shape. */
export interface StoredTimerSnapshot {
  version: typeof SNAPSHOT_VERSION;
  state: TimerState;
  end_at?: string;
  remaining?: number;
  duration: number;
}

export function encodeSnapshot(snapshot: TimerSnapshot): StoredTimerSnapshot {
  const stored: StoredTimerSnapshot = {
    version: SNAPSHOT_VERSION,
    state: snapshot.state,
    duration: snapshot.duration,
  };
  if (snapshot.endAt !== undefined) stored.end_at = new Date(snapshot.endAt).toISOString();
  if (snapshot.remaining !== undefined) stored.remaining = snapshot.remaining;
  return stored;
}

/**
 * Decodes a stored snapshot. Returns `null` when the value cannot describe a
 * timer at all; an unknown state decodes as idle, and unparseable timing
 * fields are dropped so the restore path can fall back.
 */
export function decodeSnapshot(raw: unknown): TimerSnapshot | null {
  if (!isRecord(raw)) return null;
  if (raw.version !== SNAPSHOT_VERSION) return null;
  if (!isNonNegative(raw.duration)) return null;

  const snapshot: TimerSnapshot = {
    state: isTimerState(raw.state) ? raw.state : TimerStates.Idle,
    duration: raw.duration,
  };

  if (typeof raw.end_at === "string") {
    const endAt = Date.parse(raw.end_at);
    if (Number.isFinite(endAt)) snapshot.endAt = endAt;
  }
  if (isNonNegative(raw.remaining)) {
    snapshot.remaining = raw.remaining;
  }

  return snapshot;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonNegative(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0;
}
