import type { Candidate } from "../types";
import * as runsRepo from "../db/repositories/runs.repo";
import { logger } from "../utils/logger";
import { analyze } from "./analysis.service";
import { collectDailyEvents, todayString } from "./data.service";
import { deliverPicks } from "./delivery.service";

export interface DailyProcessOptions {
  date?: string;
  // Re-run and resend even if this date was already delivered
  force?: boolean;
  // Score and record, but do not send
  dryRun?: boolean;
}

export type DailyProcessResult =
  | { status: "skipped"; date: string }
  | { status: "failed"; date: string; error: string }
  | { status: "completed"; date: string; runId: number; picks: Candidate[]; sent: boolean };

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Collect → score → select → record → deliver for one date.
 * Errors are logged and recorded as a failed run; this never rejects.
 */
export async function runDailyProcess(options: DailyProcessOptions = {}): Promise<DailyProcessResult> {
  const date = options.date ?? todayString();

  logger.info("=".repeat(50));
  logger.info(`Daily process for ${date}`);
  logger.info("=".repeat(50));

  try {
    if (!options.force && runsRepo.hasSentRunForDate(date)) {
      logger.info(`Picks for ${date} already sent, skipping`);
      return { status: "skipped", date };
    }

    const raw = await collectDailyEvents({ date });
    const analysis = analyze(raw);

    logger.info(`Scored ${analysis.candidates.length} candidates, selected ${analysis.picks.length}`);
    logger.candidatesReport(analysis.candidates, analysis.picks);
    analysis.picks.forEach((pick, index) => logger.pick(index + 1, pick));

    const run = runsRepo.createRun({
      date: analysis.date,
      status: "completed",
      candidatesCount: analysis.candidates.length,
      picks: analysis.picks,
    });

    let sent = false;
    if (options.dryRun) {
      logger.warn("Dry run: picks not sent");
    } else {
      const delivery = await deliverPicks({ date: analysis.date, picks: analysis.picks });
      sent = delivery.delivered > 0;
      if (sent) {
        runsRepo.markRunSent(run.id);
      }
    }

    logger.success(`Daily process for ${date} complete`);
    return { status: "completed", date, runId: run.id, picks: analysis.picks, sent };
  } catch (error) {
    const message = errorMessage(error);
    logger.error(`Daily process for ${date} failed: ${message}`, error);
    recordFailure(date, message);
    return { status: "failed", date, error: message };
  }
}

function recordFailure(date: string, message: string): void {
  try {
    runsRepo.createRun({ date, status: "failed", candidatesCount: 0, picks: [], error: message });
  } catch (error) {
    logger.error("Failed to record failed run", error);
  }
}
