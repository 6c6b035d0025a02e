import { loadConfig } from '../config';
import {
  CONFIG_PATH,
  STATE_DIR,
  DEBUG_MODE,
  SNAPSHOT_INTERVAL_MS,
  ANNOUNCE_MISSED_RESTORE,
} from '../env';
import { SimpleEventBus } from '../adapters/sys/SimpleEventBus';
import { NodeTime } from '../adapters/sys/NodeTime';
import { NodeTimerClock } from '../adapters/sys/NodeTimerClock';
import { ConsoleLogger } from '../adapters/sys/ConsoleLogger';
import { FileStorage } from '../adapters/sys/FileStorage';
import { StorageSnapshotStore } from '../adapters/storage/StorageSnapshotStore';
import { TimerRegistry } from '../app/TimerRegistry';
import { TimerEventLogger } from '../app/TimerEventLogger';
import type { EventBus } from '../domain/events/EventBus';
import type { LoggerPort } from '../ports/sys/LoggerPort';
import type { SnapshotStorePort } from '../ports/sys/SnapshotStorePort';
import type { TimePort } from '../ports/sys/TimePort';
import type { TimerClockPort } from '../ports/sys/TimerClockPort';

export interface ApplicationOverrides {
  configPath?: string;
  stateDir?: string;
  autosaveIntervalMs?: number;
  announceMissedRestore?: boolean;
  logger?: LoggerPort;
  bus?: EventBus;
  clock?: TimerClockPort;
  time?: TimePort;
  store?: SnapshotStorePort;
}

export interface ApplicationInstance {
  readonly registry: TimerRegistry;
  readonly bus: EventBus;
  start(): Promise<void>;
  reload(): Promise<void>;
  shutdown(): Promise<void>;
}

export async function buildApplication(overrides: ApplicationOverrides = {}): Promise<ApplicationInstance> {
  const logger = overrides.logger ?? new ConsoleLogger({ debug: DEBUG_MODE, prefix: '[timers]' });
  const configPath = overrides.configPath ?? CONFIG_PATH;

  const bus = overrides.bus ?? new SimpleEventBus(logger);
  const time = overrides.time ?? new NodeTime();
  const clock = overrides.clock ?? new NodeTimerClock();
  const store =
    overrides.store ??
    new StorageSnapshotStore(new FileStorage(overrides.stateDir ?? STATE_DIR), logger);

  const registry = new TimerRegistry(
    { bus, clock, time, store, logger },
    { announceMissedRestore: overrides.announceMissedRestore ?? ANNOUNCE_MISSED_RESTORE },
  );

  const eventLogger = new TimerEventLogger(bus, logger, time);
  eventLogger.wire();

  const readTimers = () => {
    const { timers, path } = loadConfig(configPath, logger);
    if (path) {
      logger.info(`Loaded config from ${path}`);
    } else if (configPath) {
      logger.warn(`Config file ${configPath} not found; no timers configured.`);
    }
    return timers;
  };

  return {
    registry,
    bus,
    start: async () => {
      const report = await registry.load(readTimers());
      registry.startAutosave(overrides.autosaveIntervalMs ?? SNAPSHOT_INTERVAL_MS);
      logger.info('Timers ready.', { loaded: report.loaded.length, failed: report.failed.length });
    },
    reload: async () => {
      const report = await registry.reload(readTimers());
      logger.info('Timers reloaded.', { added: report.loaded.length, failed: report.failed.length });
    },
    shutdown: async () => {
      await registry.shutdown();
      eventLogger.unwire();
    },
  };
}
