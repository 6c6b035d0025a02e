export const TimerStates = {
  Idle: "idle",
  Active: "active",
  Paused: "paused",
} as const;

export type TimerState = (typeof TimerStates)[keyof typeof TimerStates];

const VIABLE_STATES: ReadonlySet<string> = new Set(Object.values(TimerStates));

export function isTimerState(value: unknown): value is TimerState {
  return typeof value === "string" && VIABLE_STATES.has(value);
}
