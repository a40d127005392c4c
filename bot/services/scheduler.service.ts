import { setTimeout as sleep } from "node:timers/promises";
import { addDays, format, isAfter, set } from "date-fns";
import { config } from "../config";
import { logger } from "../utils/logger";
import { runDailyProcess } from "./daily.service";

// Scheduler state
let isRunning = false;
let runsCompleted = 0;
let nextRun: Date | null = null;
let abortController: AbortController | null = null;

/**
 * Next trigger at hour:minute local time: today if still ahead, otherwise tomorrow.
 */
export function nextRunAt(now: Date, hour: number, minute: number): Date {
  const today = set(now, { hours: hour, minutes: minute, seconds: 0, milliseconds: 0 });
  return isAfter(today, now) ? today : addDays(today, 1);
}

// Resolves false when the wait was cut short by stopScheduler()
async function waitUntil(target: Date, signal: AbortSignal): Promise<boolean> {
  const delay = Math.max(0, target.getTime() - Date.now());
  try {
    await sleep(delay, undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}

export async function startScheduler(): Promise<void> {
  if (isRunning) {
    logger.warn("Scheduler already running");
    return;
  }

  isRunning = true;
  abortController = new AbortController();
  const { signal } = abortController;

  logger.info(
    `Scheduler started: daily run at ${String(config.RUN_HOUR).padStart(2, "0")}:${String(config.RUN_MINUTE).padStart(2, "0")}`
  );

  while (isRunning) {
    nextRun = nextRunAt(new Date(), config.RUN_HOUR, config.RUN_MINUTE);
    logger.info(`Next run: ${format(nextRun, "yyyy-MM-dd HH:mm")}`);

    const reached = await waitUntil(nextRun, signal);
    if (!reached) break;

    // runDailyProcess records its own failures; the loop keeps going regardless
    const result = await runDailyProcess();
    runsCompleted++;
    logger.debug(`Scheduled run finished with status ${result.status}`);
  }

  nextRun = null;
  logger.info("Scheduler stopped");
}

export function stopScheduler(): void {
  isRunning = false;
  abortController?.abort();
  abortController = null;
}

export function getSchedulerStatus(): {
  isRunning: boolean;
  runsCompleted: number;
  nextRun: Date | null;
} {
  return { isRunning, runsCompleted, nextRun };
}
