import type { EventBus } from "../domain/events/EventBus";
import {
  TimerEntity,
  type RestoreOutcome,
  type TimerConfig,
  type TimerEntityOptions,
} from "../domain/timers/TimerEntity";
import { UnknownTimerError } from "../domain/timers/TimerErrors";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { SnapshotStorePort } from "../ports/sys/SnapshotStorePort";
import type { TimePort } from "../ports/sys/TimePort";
import type { TimerClockPort } from "../ports/sys/TimerClockPort";

export const DEFAULT_AUTOSAVE_INTERVAL_MS = 15 * 60 * 1000;

export type TimerCommand =
  | { type: "start"; id: string; duration?: number }
  | { type: "pause"; id: string }
  | { type: "cancel"; id: string }
  | { type: "finish"; id: string }
  | { type: "change_duration"; id: string; duration: number };

export interface TimerRegistryDeps {
  bus: EventBus;
  clock: TimerClockPort;
  time: TimePort;
  store: SnapshotStorePort;
  logger: LoggerPort;
}

export interface LoadReport {
  loaded: string[];
  failed: string[];
  restored: Record<string, RestoreOutcome>;
}

/**
 * Owns every configured timer for the lifetime of the process. Built once at
 * startup, restores each timer from its last snapshot and persists snapshots
 * again on shutdown.
 */
export class TimerRegistry {
  private readonly timers = new Map<string, TimerEntity>();
  private autosave: NodeJS.Timeout | null = null;
  private saving: Promise<void> = Promise.resolve();

  constructor(
    private readonly deps: TimerRegistryDeps,
    private readonly options: TimerEntityOptions = {}
  ) {}

  async load(configs: TimerConfig[]): Promise<LoadReport> {
    const report: LoadReport = { loaded: [], failed: [], restored: {} };

    for (const config of configs) {
      if (this.timers.has(config.id)) {
        this.deps.logger.warn("Duplicate timer id; keeping the first definition", { id: config.id });
        report.failed.push(config.id);
        continue;
      }
      try {
        const { entity, outcome } = await this.create(config);
        this.timers.set(config.id, entity);
        report.loaded.push(config.id);
        if (outcome) report.restored[config.id] = outcome;
      } catch (err) {
        this.deps.logger.error("Failed to set up timer", {
          id: config.id,
          error: err instanceof Error ? err.message : String(err),
        });
        report.failed.push(config.id);
      }
    }

    return report;
  }

  /**
   * Applies a new set of configurations: unknown ids are created (and
   * restored), existing ones pick up name, icon and duration, and ids no
   * longer configured are disposed along with their snapshots.
   */
  async reload(configs: TimerConfig[]): Promise<LoadReport> {
    const wanted = new Set(configs.map((config) => config.id));
    const removed: string[] = [];
    for (const [id, entity] of Array.from(this.timers)) {
      if (wanted.has(id)) continue;
      entity.dispose();
      this.timers.delete(id);
      removed.push(id);
      this.deps.logger.info("Removed timer", { id });
    }
    if (removed.length > 0) {
      await this.serialize(() => this.forgetSnapshots(removed));
    }

    const fresh: TimerConfig[] = [];
    for (const config of configs) {
      const existing = this.timers.get(config.id);
      if (!existing) {
        fresh.push(config);
        continue;
      }
      if (existing.restoreEnabled !== config.restore || existing.gracePeriod !== config.restoreGracePeriod) {
        this.deps.logger.warn("Restore settings only apply at creation; keeping the current ones", {
          id: config.id,
        });
      }
      existing.reconfigure({ name: config.name ?? config.id, icon: config.icon, duration: config.duration });
    }

    return this.load(fresh);
  }

  has(id: string): boolean {
    return this.timers.has(id);
  }

  get(id: string): TimerEntity {
    const entity = this.timers.get(id);
    if (!entity) throw new UnknownTimerError(id);
    return entity;
  }

  list(): TimerEntity[] {
    return Array.from(this.timers.values());
  }

  execute(command: TimerCommand): TimerEntity {
    const entity = this.get(command.id);
    switch (command.type) {
      case "start":
        entity.start(command.duration);
        break;
      case "pause":
        entity.pause();
        break;
      case "cancel":
        entity.cancel();
        break;
      case "finish":
        entity.finish();
        break;
      case "change_duration":
        entity.changeDuration(command.duration);
        break;
    }
    return entity;
  }

  /** Writes snapshots of restore-enabled timers. Overlapping calls run one after another. */
  persist(): Promise<void> {
    return this.serialize(() => this.writeSnapshots());
  }

  private serialize(task: () => Promise<void>): Promise<void> {
    const run = this.saving.then(task);
    this.saving = run;
    return run;
  }

  private async forgetSnapshots(ids: string[]): Promise<void> {
    for (const id of ids) {
      try {
        await this.deps.store.remove(id);
      } catch (err) {
        this.deps.logger.error("Failed to remove timer snapshot", {
          id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  private async writeSnapshots(): Promise<void> {
    for (const entity of this.timers.values()) {
      if (!entity.restoreEnabled) continue;
      try {
        await this.deps.store.put(entity.id, entity.toSnapshot());
      } catch (err) {
        this.deps.logger.error("Failed to persist timer snapshot", {
          id: entity.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  startAutosave(intervalMs: number = DEFAULT_AUTOSAVE_INTERVAL_MS): void {
    this.stopAutosave();
    this.autosave = setInterval(() => {
      this.persist().catch((err) => {
        this.deps.logger.error("Autosave failed", {
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }, intervalMs);
  }

  stopAutosave(): void {
    if (!this.autosave) return;
    clearInterval(this.autosave);
    this.autosave = null;
  }

  async shutdown(): Promise<void> {
    this.stopAutosave();
    await this.persist();
    for (const entity of this.timers.values()) {
      entity.dispose();
    }
    this.timers.clear();
  }

  private async create(config: TimerConfig): Promise<{ entity: TimerEntity; outcome?: RestoreOutcome }> {
    const { bus, clock, time, logger, store } = this.deps;
    const entity = new TimerEntity(config, { bus, clock, time, logger }, this.options);
    if (!config.restore) return { entity };

    const snapshot = await store.get(config.id);
    if (!snapshot) return { entity };

    const outcome = entity.restore(snapshot);
    logger.info("Restored timer", { id: config.id, outcome, state: entity.state });
    return { entity, outcome };
  }
}
