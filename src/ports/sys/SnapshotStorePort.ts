import type { TimerSnapshot } from "../../domain/timers/TimerSnapshot";

export interface SnapshotStorePort {
  get(id: string): Promise<TimerSnapshot | null>;
  put(id: string, snapshot: TimerSnapshot): Promise<void>;
  /** Forgets the snapshot of a timer that is no longer configured. Missing ids are ignored. */
  remove(id: string): Promise<void>;
}
