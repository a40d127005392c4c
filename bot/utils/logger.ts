import { config } from "../config";
import type { Candidate } from "../types";

type LogLevel = "info" | "warn" | "error" | "debug" | "success";

const colors = {
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
  debug: "\x1b[90m", // gray
  success: "\x1b[32m", // green
  reset: "\x1b[0m",
};

// success shares the info threshold
const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  success: 1,
  warn: 2,
  error: 3,
};

function threshold(): number {
  const level = config.LOG_LEVEL;
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return LEVEL_ORDER[level];
  }
  return LEVEL_ORDER.info;
}

function timestamp(): string {
  const parts = new Date().toISOString().split("T");
  return (parts[1] || "00:00:00").slice(0, 8);
}

function log(level: LogLevel, message: string, data?: unknown) {
  if (LEVEL_ORDER[level] < threshold()) return;

  const color = colors[level];
  const prefix = `${colors.debug}[${timestamp()}]${colors.reset} ${color}[${level.toUpperCase()}]${colors.reset}`;

  if (data !== undefined) {
    console.log(prefix, message, data);
  } else {
    console.log(prefix, message);
  }
}

function formatOdds(odds: number | null): string {
  return odds === null ? "n/a" : odds.toFixed(2);
}

export const logger = {
  info: (msg: string, data?: unknown) => log("info", msg, data),
  warn: (msg: string, data?: unknown) => log("warn", msg, data),
  error: (msg: string, data?: unknown) => log("error", msg, data),
  debug: (msg: string, data?: unknown) => log("debug", msg, data),
  success: (msg: string, data?: unknown) => log("success", msg, data),

  pick: (rank: number, candidate: Candidate) => {
    if (LEVEL_ORDER.info < threshold()) return;
    console.log(
      `${colors.success}[PICK ${rank}]${colors.reset} ${candidate.sport} | ${candidate.eventLabel} | ${candidate.market} ${candidate.pick} @ ${formatOdds(candidate.odds)} | conf ${candidate.confidence.toFixed(3)}`
    );
  },

  // Every scored candidate, highest confidence first, with the selected ones marked
  candidatesReport: (candidates: Candidate[], selected: Candidate[]) => {
    if (candidates.length === 0 || LEVEL_ORDER.debug < threshold()) return;

    const sorted = [...candidates].sort((a, b) => b.confidence - a.confidence);

    console.log(`${colors.debug}[${timestamp()}]${colors.reset} --- Candidate Report (${sorted.length} events) ---`);

    for (const c of sorted) {
      const isPicked = selected.includes(c);
      const color = isPicked ? colors.success : c.confidence >= 0.5 ? colors.warn : colors.debug;
      const symbol = isPicked ? "✓" : "○";

      const label = c.eventLabel.substring(0, 35).padEnd(35);
      const choice = `${c.market} ${c.pick} @ ${formatOdds(c.odds)}`.padEnd(18);
      console.log(
        `${colors.debug}[${timestamp()}]${colors.reset} ${symbol} ${c.sport.padEnd(10)} ${label} ${choice} ${color}${c.confidence.toFixed(3)}${colors.reset}`
      );
    }
    console.log(`${colors.debug}[${timestamp()}]${colors.reset} --- End Candidate Report ---`);
  },
};
