import type { EventBus, Subscription } from "../domain/events/EventBus";
import { formatDuration } from "../domain/timers/duration";
import { TimerTopics, type TimerEventPayloads, type TimerStateChanged } from "../domain/timers/TimerEvents";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";

export class TimerEventLogger {
  private subscriptions: Subscription[] = [];

  constructor(
    private readonly bus: EventBus,
    private readonly logger: LoggerPort,
    private readonly time: TimePort
  ) {}

  wire() {
    this.unwire();

    this.subscriptions.push(
      this.bus.subscribe<TimerEventPayloads[typeof TimerTopics.StateChanged]>(TimerTopics.StateChanged, (event) => {
        this.logger.debug(`Timer ${event.id}: ${event.priorState} -> ${event.newState}`, this.describe(event));
      }),
      this.bus.subscribe<TimerEventPayloads[typeof TimerTopics.Finished]>(TimerTopics.Finished, (event) => {
        this.logger.info(`🔔 Timer finished (${event.id}) at ${this.time.toLocaleTimeString(this.time.now())}`);
      })
    );

    const lifecycle = [TimerTopics.Started, TimerTopics.Restarted, TimerTopics.Paused, TimerTopics.Cancelled];
    for (const topic of lifecycle) {
      this.subscriptions.push(
        this.bus.subscribe<TimerEventPayloads[typeof topic]>(topic, (event) => {
          this.logger.info(`Timer ${event.id} ${topic.slice("timer.".length)}`);
        })
      );
    }
  }

  unwire() {
    for (const subscription of this.subscriptions) {
      subscription.unsubscribe();
    }
    this.subscriptions = [];
  }

  private describe(event: TimerStateChanged): Record<string, unknown> {
    const meta: Record<string, unknown> = {};
    if (event.endAt) meta.finishesAt = event.endAt;
    if (event.remaining !== undefined) meta.remaining = formatDuration(event.remaining);
    return meta;
  }
}
