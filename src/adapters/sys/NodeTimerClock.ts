import { SchedulingError } from "../../domain/timers/TimerErrors";
import type { AlarmHandle, TimerClockPort } from "../../ports/sys/TimerClockPort";

const MAX_TIMEOUT_MS = 2_147_483_647; // ~24.8 days

type AlarmRecord = {
  handle: AlarmHandle;
  firesAt: number;
  callback: () => void;
  timeout?: NodeJS.Timeout;
};

export class NodeTimerClock implements TimerClockPort {
  private readonly alarms = new Map<number, AlarmRecord>();
  private nextId = 1;

  arm(delayMs: number, callback: () => void): AlarmHandle {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new SchedulingError(delayMs);
    }

    const handle: AlarmHandle = { id: this.nextId++ };
    const record: AlarmRecord = {
      handle,
      firesAt: Date.now() + delayMs,
      callback,
    };

    const scheduleNext = (delay: number) => {
      record.timeout = setTimeout(() => {
        const remaining = record.firesAt - Date.now();
        if (remaining > 0) {
          scheduleNext(Math.min(remaining, MAX_TIMEOUT_MS));
          return;
        }
        this.alarms.delete(handle.id);
        record.callback();
      }, delay);
    };

    this.alarms.set(handle.id, record);
    scheduleNext(Math.min(delayMs, MAX_TIMEOUT_MS));
    return handle;
  }

  disarm(handle: AlarmHandle): void {
    const record = this.alarms.get(handle.id);
    if (!record) return;
    clearTimeout(record.timeout);
    this.alarms.delete(handle.id);
  }

  pending(): number {
    return this.alarms.size;
  }

  /** Disarms every outstanding alarm. */
  clear(): void {
    for (const record of this.alarms.values()) {
      clearTimeout(record.timeout);
    }
    this.alarms.clear();
  }
}
