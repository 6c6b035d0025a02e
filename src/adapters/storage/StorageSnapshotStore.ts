import { decodeSnapshot, encodeSnapshot, type TimerSnapshot } from "../../domain/timers/TimerSnapshot";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { SnapshotStorePort } from "../../ports/sys/SnapshotStorePort";
import type { StoragePort } from "../../ports/sys/StoragePort";

const KEY_PREFIX = "timer.";

/** JSON snapshots on top of a byte-oriented {@link StoragePort}. */
export class StorageSnapshotStore implements SnapshotStorePort {
  constructor(
    private readonly storage: StoragePort,
    private readonly logger?: LoggerPort
  ) {}

  async get(id: string): Promise<TimerSnapshot | null> {
    const raw = await this.storage.read(this.keyFor(id));
    if (!raw) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw.toString("utf8"));
    } catch (err) {
      this.logger?.warn("Discarding unreadable timer snapshot", {
        id,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    const snapshot = decodeSnapshot(parsed);
    if (!snapshot) {
      this.logger?.warn("Discarding invalid timer snapshot", { id });
    }
    return snapshot;
  }

  async put(id: string, snapshot: TimerSnapshot): Promise<void> {
    await this.storage.write(this.keyFor(id), JSON.stringify(encodeSnapshot(snapshot)));
  }

  async remove(id: string): Promise<void> {
    await this.storage.remove(this.keyFor(id));
  }

  private keyFor(id: string): string {
    return `${KEY_PREFIX}${id}.json`;
  }
}
