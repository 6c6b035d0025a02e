/** Opaque registration returned by {@link TimerClockPort.arm}. */
export interface AlarmHandle {
  readonly id: number;
}

export interface TimerClockPort {
  /** Runs `callback` once after `delayMs`. Throws on a negative delay. */
  arm(delayMs: number, callback: () => void): AlarmHandle;
  /** Idempotent. After it returns the callback will not run. */
  disarm(handle: AlarmHandle): void;
  pending(): number;
}
