import type { TimerState } from "./TimerState";

export type TimerErrorCode =
  | "invalid_transition"
  | "invalid_duration"
  | "invalid_configuration"
  | "scheduling_error"
  | "unknown_timer";

export class TimerError extends Error {
  constructor(
    readonly code: TimerErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidTransitionError extends TimerError {
  constructor(
    readonly timerId: string,
    readonly operation: string,
    readonly state: TimerState
  ) {
    super("invalid_transition", `Timer ${timerId} cannot ${operation} while ${state}.`);
  }
}

export class InvalidDurationError extends TimerError {
  constructor(readonly value: unknown) {
    super("invalid_duration", `Invalid duration: ${describe(value)}.`);
  }
}

export class InvalidConfigurationError extends TimerError {
  constructor(
    readonly timerId: string,
    reason: string
  ) {
    super("invalid_configuration", `Timer ${timerId} is misconfigured: ${reason}`);
  }
}

export class SchedulingError extends TimerError {
  constructor(readonly delayMs: number) {
    super("scheduling_error", `Cannot arm an alarm with delay ${delayMs}ms.`);
  }
}

export class UnknownTimerError extends TimerError {
  constructor(readonly timerId: string) {
    super("unknown_timer", `No timer configured with id ${timerId}.`);
  }
}

function describe(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "number") return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
