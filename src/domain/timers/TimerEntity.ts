import type { EventBus } from "../events/EventBus";
import type { AlarmHandle, TimerClockPort } from "../../ports/sys/TimerClockPort";
import type { LoggerPort } from "../../ports/sys/LoggerPort";
import type { TimePort } from "../../ports/sys/TimePort";
import { assertDuration, formatDuration } from "./duration";
import { InvalidConfigurationError, InvalidTransitionError } from "./TimerErrors";
import { TimerTopics, type TimerEventPayloads, type TimerStateChanged, type TimerTopic } from "./TimerEvents";
import type { TimerSnapshot } from "./TimerSnapshot";
import { TimerStates, type TimerState } from "./TimerState";

export interface TimerConfig {
  id: string;
  name?: string;
  icon?: string;
  /** Default duration in milliseconds. */
  duration: number;
  restore: boolean;
  /** Milliseconds a missed expiration may be late and still fire on restore. */
  restoreGracePeriod: number;
}

export interface TimerEntityDeps {
  clock: TimerClockPort;
  time: TimePort;
  bus: EventBus;
  logger?: LoggerPort;
}

export interface TimerEntityOptions {
  /**
   * Publish an active -> idle state change when a restore finds the
   * expiration too far in the past. Off by default so observers never see a
   * timer "just stop" that nobody was watching.
   */
  announceMissedRestore?: boolean;
}

export type RestoreOutcome = "idle" | "paused" | "resumed" | "finished" | "missed";

export type TimerAttributes = {
  name: string;
  icon?: string;
  duration: string;
  remaining: string;
  restore: boolean;
  finishes_at?: string;
  restore_grace_period?: string;
};

export type TimerReconfiguration = Partial<Pick<TimerConfig, "name" | "icon" | "duration">>;

/**
 * A single named countdown timer.
 *
 * Every operation runs synchronously to completion, so the event loop is the
 * serialization domain for an entity. The expiration callback re-enters
 * through {@link TimerEntity.handleExpiration} and is ignored unless it
 * belongs to the alarm currently armed.
 */
export class TimerEntity {
  readonly id: string;
  readonly restoreEnabled: boolean;
  readonly gracePeriod: number;

  private name: string;
  private icon?: string;
  private defaultDuration: number;
  private current: TimerState = TimerStates.Idle;
  private remainingMs?: number;
  private endAtMs?: number;
  private alarm: AlarmHandle | null = null;

  private readonly clock: TimerClockPort;
  private readonly time: TimePort;
  private readonly bus: EventBus;
  private readonly logger?: LoggerPort;
  private readonly announceMissedRestore: boolean;

  constructor(config: TimerConfig, deps: TimerEntityDeps, options: TimerEntityOptions = {}) {
    if (!Number.isFinite(config.duration) || config.duration < 0) {
      throw new InvalidConfigurationError(config.id, "duration must be a non-negative number of milliseconds.");
    }
    if (!Number.isFinite(config.restoreGracePeriod) || config.restoreGracePeriod < 0) {
      throw new InvalidConfigurationError(config.id, "restore grace period must not be negative.");
    }

    this.id = config.id;
    this.name = config.name?.trim() || config.id;
    this.icon = config.icon;
    this.defaultDuration = config.duration;
    this.restoreEnabled = config.restore;
    this.gracePeriod = config.restoreGracePeriod;

    this.clock = deps.clock;
    this.time = deps.time;
    this.bus = deps.bus;
    this.logger = deps.logger;
    this.announceMissedRestore = options.announceMissedRestore ?? false;
  }

  get state(): TimerState {
    return this.current;
  }

  get duration(): number {
    return this.defaultDuration;
  }

  get remaining(): number | undefined {
    return this.remainingMs;
  }

  get endAt(): number | undefined {
    return this.endAtMs;
  }

  get displayName(): string {
    return this.name;
  }

  get alarmArmed(): boolean {
    return this.alarm !== null;
  }

  /**
   * Starts or restarts the countdown. Without an explicit duration a paused
   * timer resumes from its remaining time and any other timer uses its
   * configured duration. A zero duration finishes immediately.
   */
  start(durationMs?: number): void {
    if (durationMs !== undefined) assertDuration(durationMs);

    const prior = this.current;
    const effective =
      durationMs ??
      (prior === TimerStates.Paused && this.remainingMs !== undefined ? this.remainingMs : this.defaultDuration);

    this.disarm();
    const now = this.time.now();
    this.current = TimerStates.Active;
    this.remainingMs = undefined;
    this.endAtMs = now + effective;

    if (effective > 0) {
      this.arm(effective);
    }
    this.publishStateChanged(prior);
    this.publish(prior === TimerStates.Idle ? TimerTopics.Started : TimerTopics.Restarted);

    if (effective === 0) {
      this.complete();
    }
  }

  pause(): void {
    this.assertState("pause", TimerStates.Active);

    this.disarm();
    const now = this.time.now();
    this.remainingMs = Math.max(0, (this.endAtMs ?? now) - now);
    this.endAtMs = undefined;
    this.current = TimerStates.Paused;

    this.publishStateChanged(TimerStates.Active);
    this.publish(TimerTopics.Paused);
  }

  cancel(): void {
    this.assertState("cancel", TimerStates.Active, TimerStates.Paused);

    const prior = this.current;
    this.disarm();
    this.clearTiming();
    this.current = TimerStates.Idle;

    this.publishStateChanged(prior);
    this.publish(TimerTopics.Cancelled);
  }

  finish(): void {
    this.assertState("finish", TimerStates.Active, TimerStates.Paused);
    this.complete();
  }

  changeDuration(durationMs: number): void {
    this.assertState("change duration", TimerStates.Active);
    assertDuration(durationMs);

    this.defaultDuration = durationMs;
    this.endAtMs = this.time.now() + durationMs;
    this.arm(durationMs);

    this.publishStateChanged(TimerStates.Active);
  }

  /** Entry point for the clock. Stale or superseded alarms are ignored. */
  handleExpiration(handle: AlarmHandle): void {
    if (handle !== this.alarm || this.current !== TimerStates.Active) {
      this.logger?.debug("Ignoring stale timer alarm", { id: this.id, alarm: handle.id });
      return;
    }
    this.alarm = null;
    this.complete();
  }

  /**
   * Rebuilds state from a snapshot taken before a restart. An active timer
   * whose end passed while the process was down finishes now if it is at
   * most `gracePeriod` late, and is dropped to idle silently otherwise.
   */
  restore(snapshot: TimerSnapshot): RestoreOutcome {
    this.disarm();
    this.clearTiming();

    if (this.defaultDuration === 0 && snapshot.duration > 0) {
      this.defaultDuration = snapshot.duration;
    }

    switch (snapshot.state) {
      case TimerStates.Idle:
        this.current = TimerStates.Idle;
        return "idle";

      case TimerStates.Paused:
        this.current = TimerStates.Paused;
        this.remainingMs = snapshot.remaining ?? this.defaultDuration;
        return "paused";

      case TimerStates.Active:
        return this.restoreActive(snapshot.endAt);
    }
  }

  toSnapshot(): TimerSnapshot {
    const snapshot: TimerSnapshot = { state: this.current, duration: this.defaultDuration };
    if (this.endAtMs !== undefined) snapshot.endAt = this.endAtMs;
    if (this.remainingMs !== undefined) snapshot.remaining = this.remainingMs;
    return snapshot;
  }

  attributes(): TimerAttributes {
    const remaining =
      this.current === TimerStates.Active && this.endAtMs !== undefined
        ? Math.max(0, this.endAtMs - this.time.now())
        : this.remainingMs ?? 0;

    const attrs: TimerAttributes = {
      name: this.name,
      duration: formatDuration(this.defaultDuration),
      remaining: formatDuration(remaining),
      restore: this.restoreEnabled,
    };
    if (this.icon) attrs.icon = this.icon;
    if (this.endAtMs !== undefined) attrs.finishes_at = new Date(this.endAtMs).toISOString();
    if (this.restoreEnabled) attrs.restore_grace_period = formatDuration(this.gracePeriod);
    return attrs;
  }

  /** Applies reloaded configuration without disturbing a running countdown. */
  reconfigure(update: TimerReconfiguration): void {
    if (update.duration !== undefined) {
      this.defaultDuration = assertDuration(update.duration);
    }
    if (update.name !== undefined) this.name = update.name.trim() || this.id;
    if ("icon" in update) this.icon = update.icon;
  }

  dispose(): void {
    this.disarm();
  }

  private restoreActive(endAt: number | undefined): RestoreOutcome {
    if (endAt === undefined) {
      this.logger?.warn("Active timer snapshot has no end time; restoring idle", { id: this.id });
      this.current = TimerStates.Idle;
      return "idle";
    }

    const now = this.time.now();
    if (now < endAt) {
      this.current = TimerStates.Active;
      this.endAtMs = endAt;
      this.arm(endAt - now);
      this.logger?.debug("Restored active timer", { id: this.id, remaining: formatDuration(endAt - now) });
      return "resumed";
    }

    const overdue = now - endAt;
    if (overdue <= this.gracePeriod) {
      this.current = TimerStates.Active;
      this.endAtMs = endAt;
      this.complete();
      return "finished";
    }

    this.current = TimerStates.Idle;
    this.logger?.info("Timer expired too long ago to finish on restore", {
      id: this.id,
      overdueMs: overdue,
      gracePeriodMs: this.gracePeriod,
    });
    if (this.announceMissedRestore) {
      this.publishStateChanged(TimerStates.Active);
    }
    return "missed";
  }

  private complete(): void {
    const prior = this.current;
    this.disarm();
    this.clearTiming();
    this.current = TimerStates.Idle;

    this.publishStateChanged(prior);
    this.publish(TimerTopics.Finished);
  }

  private arm(delayMs: number): void {
    this.disarm();
    const handle = this.clock.arm(delayMs, () => this.handleExpiration(handle));
    this.alarm = handle;
  }

  private disarm(): void {
    if (!this.alarm) return;
    this.clock.disarm(this.alarm);
    this.alarm = null;
  }

  private clearTiming(): void {
    this.endAtMs = undefined;
    this.remainingMs = undefined;
  }

  private assertState(operation: string, ...allowed: TimerState[]): void {
    if (!allowed.includes(this.current)) {
      throw new InvalidTransitionError(this.id, operation, this.current);
    }
  }

  private publishStateChanged(prior: TimerState): void {
    const payload: TimerStateChanged = { id: this.id, priorState: prior, newState: this.current };
    if (this.endAtMs !== undefined) payload.endAt = new Date(this.endAtMs).toISOString();
    if (this.remainingMs !== undefined) payload.remaining = this.remainingMs;
    this.bus.publish<TimerEventPayloads[typeof TimerTopics.StateChanged]>(TimerTopics.StateChanged, payload);
  }

  private publish(topic: Exclude<TimerTopic, typeof TimerTopics.StateChanged>): void {
    this.bus.publish<TimerEventPayloads[typeof topic]>(topic, { id: this.id });
  }
}
