/**
 * Scheduled (repeating) runs
 */
import { ConfigurationError } from '../errors';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/**
 * Parse an interval such as "1h", "12h", "1d" or "7d" into milliseconds
 */
export function parseScheduleInterval(value: string): number {
  const match = value.trim().toLowerCase().match(/^(\d+)([hd])$/);
  if (!match) {
    throw new ConfigurationError(
      `Invalid schedule format: ${value}. Use a number followed by h or d, e.g. 24h or 1d`
    );
  }

  const amount = Number(match[1]);
  if (amount === 0) {
    throw new ConfigurationError('Schedule interval must be greater than zero');
  }

  return match[2] === 'h' ? amount * HOUR_MS : amount * DAY_MS;
}

/**
 * Human-readable remaining time, e.g. "5h 12m" or "40m"
 */
export function formatRemaining(ms: number): string {
  const totalMinutes = Math.floor(ms / 60000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

export interface ScheduleOptions {
  intervalMs: number;
  shouldStop: () => boolean;
  /** Poll granularity while waiting for the next run */
  tickMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onWaiting?: (remainingMs: number) => void;
  /** Called with a failed run's error; without it the error ends the schedule */
  onError?: (error: unknown, runNumber: number) => void;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `task` repeatedly, waiting `intervalMs` between runs, until `shouldStop`
 * returns true.
 * Resolves with the number of runs started.
 */
export async function runOnSchedule(
  task: (runNumber: number) => Promise<void>,
  options: ScheduleOptions
): Promise<number> {
  const { intervalMs, shouldStop, tickMs = 10000, sleep = defaultSleep, onWaiting, onError } = options;
  let runs = 0;

  while (!shouldStop()) {
    runs++;
    try {
      await task(runs);
    } catch (error) {
      if (!onError) {
        throw error;
      }
      onError(error, runs);
    }

    let elapsed = 0;
    while (elapsed < intervalMs && !shouldStop()) {
      const step = Math.min(tickMs, intervalMs - elapsed);
      await sleep(step);
      elapsed += step;
      if (onWaiting && elapsed < intervalMs) {
        onWaiting(intervalMs - elapsed);
      }
    }
  }

  return runs;
}
