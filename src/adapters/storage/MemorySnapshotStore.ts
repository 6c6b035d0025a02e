import type { TimerSnapshot } from "../../domain/timers/TimerSnapshot";
import type { SnapshotStorePort } from "../../ports/sys/SnapshotStorePort";

export class MemorySnapshotStore implements SnapshotStorePort {
  private readonly snapshots = new Map<string, TimerSnapshot>();

  constructor(initial: Record<string, TimerSnapshot> = {}) {
    for (const [id, snapshot] of Object.entries(initial)) {
      this.snapshots.set(id, { ...snapshot });
    }
  }

  async get(id: string): Promise<TimerSnapshot | null> {
    const snapshot = this.snapshots.get(id);
    return snapshot ? { ...snapshot } : null;
  }

  async put(id: string, snapshot: TimerSnapshot): Promise<void> {
    this.snapshots.set(id, { ...snapshot });
  }

  async remove(id: string): Promise<void> {
    this.snapshots.delete(id);
  }
}
