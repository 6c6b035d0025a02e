import type { TimerState } from "./TimerState";

export const TimerTopics = {
  StateChanged: "timer.state_changed",
  Finished: "timer.finished",
  Started: "timer.started",
  Restarted: "timer.restarted",
  Paused: "timer.paused",
  Cancelled: "timer.cancelled",
} as const;

export type TimerTopic = (typeof TimerTopics)[keyof typeof TimerTopics];

export interface TimerStateChanged {
  id: string;
  priorState: TimerState;
  newState: TimerState;
  /** ISO-8601 timestamp; present while active. */
  endAt?: string;
  /** Milliseconds left; present while paused. */
  remaining?: number;
}

export interface TimerLifecycleEvent {
  id: string;
}

export type TimerEventPayloads = {
  [TimerTopics.StateChanged]: TimerStateChanged;
  [TimerTopics.Finished]: TimerLifecycleEvent;
  [TimerTopics.Started]: TimerLifecycleEvent;
  [TimerTopics.Restarted]: TimerLifecycleEvent;
  [TimerTopics.Paused]: TimerLifecycleEvent;
  [TimerTopics.Cancelled]: TimerLifecycleEvent;
};
