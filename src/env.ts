import { config } from 'dotenv';

config();

// setInterval treats anything longer as 1 ms
const MAX_INTERVAL_MS = 2_147_483_647;

export let DEBUG_MODE = process.env.DEBUG_MODE === 'true';
export const ANNOUNCE_MISSED_RESTORE = process.env.ANNOUNCE_MISSED_RESTORE === 'true';
export const SNAPSHOT_INTERVAL_MS = parseInterval(process.env.SNAPSHOT_INTERVAL_MS, 15 * 60 * 1000);

const cliArgs = process.argv.slice(2);
let configPathArg: string | undefined;
let stateDirArg: string | undefined;
let logFileArg: string | undefined;

for (let i = 0; i < cliArgs.length; i++) {
  const arg = cliArgs[i];
  switch (arg) {
    case '--config':
      if (cliArgs[i + 1]) {
        configPathArg = cliArgs[++i];
      }
      break;
    case '--state-dir':
      if (cliArgs[i + 1]) {
        stateDirArg = cliArgs[++i];
      }
      break;
    case '--log-file':
      if (cliArgs[i + 1]) {
        logFileArg = cliArgs[++i];
      }
      break;
    case '--debug':
      DEBUG_MODE = true;
      break;
    case '--no-debug':
      DEBUG_MODE = false;
      break;
    default:
      break;
  }
}

export const CONFIG_PATH = configPathArg;
export const STATE_DIR = stateDirArg ?? (process.env.TIMER_STATE_DIR || '.timer-state');
export const LOG_FILE = logFileArg;

function parseInterval(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 && value <= MAX_INTERVAL_MS ? value : fallback;
}
