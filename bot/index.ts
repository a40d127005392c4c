#!/usr/bin/env tsx
import "dotenv/config";
import { format } from "date-fns";
import { config, isPlaceholderApiKey, validateConfig } from "./config";
import { closeDb, getDb } from "./db/index";
import * as runsRepo from "./db/repositories/runs.repo";
import { analyze } from "./services/analysis.service";
import { runDailyProcess } from "./services/daily.service";
import { collectDailyEvents, todayString } from "./services/data.service";
import { formatPickLine } from "./services/delivery.service";
import { getSchedulerStatus, nextRunAt, startScheduler, stopScheduler } from "./services/scheduler.service";
import { startPolling, stopPolling, testConnection } from "./telegram/index";
import { logger } from "./utils/logger";

const args = process.argv.slice(2);

// Get command (first non-flag argument)
const command = args.find((arg) => !arg.startsWith("--")) || "help";
const force = args.includes("--force");
const dryRun = args.includes("--dry-run");

function flagValue(name: string): string | undefined {
  const index = args.indexOf(name);
  return index >= 0 ? args[index + 1] : undefined;
}

function parseDateFlag(): string | undefined {
  const date = flagValue("--date");
  if (date === undefined) return undefined;
  if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
    logger.error(`Invalid --date ${date}, expected YYYY-MM-DD`);
    process.exit(1);
  }
  return date;
}

async function main() {
  switch (command) {
    case "start":
      await runStart();
      break;
    case "run":
      await runOnce();
      break;
    case "preview":
      await runPreview();
      break;
    case "history":
      runHistory();
      break;
    case "status":
      runStatus();
      break;
    case "setup":
      runSetup();
      break;
    case "help":
    default:
      printHelp();
  }
}

/**
 * Start the scheduler (and the command poller when enabled)
 */
async function runStart() {
  console.log(`
======================================
  🎯 Daily Picks Bot
======================================
`);

  const { valid, missing } = validateConfig();
  if (!valid) {
    logger.error(`Missing configuration: ${missing.join(", ")}`);
    logger.info("Run 'tsx bot/index.ts setup' for setup instructions");
    process.exit(1);
  }
  if (isPlaceholderApiKey()) {
    logger.warn("SPORTS_API_KEY is still the placeholder value");
  }

  const telegramOk = await testConnection();
  if (!telegramOk) {
    logger.error("Telegram connection failed - check TELEGRAM_BOT_TOKEN");
    process.exit(1);
  }
  logger.success("Telegram connection OK");

  getDb();

  const shutdown = () => {
    logger.info(`Shutting down after ${getSchedulerStatus().runsCompleted} scheduled run(s)...`);
    stopScheduler();
    stopPolling();
    closeDb();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  if (config.ENABLE_COMMANDS) {
    startPolling().catch((err) => {
      logger.error("Telegram polling crashed", err);
    });
  }

  await startScheduler();
}

/**
 * Run the daily process once, now
 */
async function runOnce() {
  getDb();
  const result = await runDailyProcess({ date: parseDateFlag(), force, dryRun });

  switch (result.status) {
    case "skipped":
      logger.info(`Nothing to do for ${result.date} (use --force to resend)`);
      break;
    case "failed":
      logger.error(`Run failed: ${result.error}`);
      break;
    case "completed":
      logger.success(`${result.picks.length} picks recorded as run #${result.runId}${result.sent ? " and sent" : ""}`);
      break;
  }

  closeDb();
  if (result.status === "failed") process.exit(1);
}

/**
 * Collect and score without recording or sending
 */
async function runPreview() {
  const raw = await collectDailyEvents({ date: parseDateFlag() });
  const analysis = analyze(raw);

  logger.candidatesReport(analysis.candidates, analysis.picks);

  console.log(`\n🎯 Picks for ${analysis.date} (${analysis.candidates.length} candidates)\n`);
  if (analysis.picks.length === 0) {
    console.log("No recommendation today");
  }
  analysis.picks.forEach((pick, index) => {
    console.log(formatPickLine(index + 1, pick));
  });
}

function runHistory() {
  getDb();
  const runs = runsRepo.getRecentRuns(14);

  console.log("\n📅 Recent runs\n");
  if (runs.length === 0) {
    console.log("No runs recorded yet.");
  }

  for (const run of runs) {
    const flag = run.status === "completed" ? "✓" : "✗";
    console.log(
      `${flag} #${run.id} ${run.date} ${run.status.padEnd(9)} picks ${run.picksCount}/${run.candidatesCount} ${run.sent ? "sent" : "not sent"}${run.error ? ` (${run.error})` : ""}`
    );
    for (const pick of runsRepo.getPicksForRun(run.id)) {
      console.log(`    ${formatPickLine(pick.rank, pick)}`);
    }
  }

  closeDb();
}

function runStatus() {
  getDb();
  const latest = runsRepo.getLatestRun();
  const today = todayString();
  const todayRun = runsRepo.getRunByDate(today);
  const next = nextRunAt(new Date(), config.RUN_HOUR, config.RUN_MINUTE);
  const { missing } = validateConfig();

  console.log("\n📊 Daily Picks Bot Status\n");
  console.log(`Schedule: every day at ${String(config.RUN_HOUR).padStart(2, "0")}:${String(config.RUN_MINUTE).padStart(2, "0")}`);
  console.log(`Chats: ${config.TELEGRAM_CHAT_IDS.length}`);
  console.log(`Database: ${config.DB_PATH}`);
  console.log(`Config: ${missing.length === 0 ? "OK" : `missing ${missing.join(", ")}`}`);
  console.log(`Next scheduled run: ${format(next, "yyyy-MM-dd HH:mm")}`);
  console.log(
    `Today (${today}): ${todayRun ? `${todayRun.status}, ${todayRun.sent ? "sent" : "not sent"}` : "not run yet"}`
  );
  console.log(
    `Latest run: ${latest ? `${latest.date} (${latest.status}, ${latest.picksCount} picks, ${latest.sent ? "sent" : "not sent"})` : "none"}`
  );

  closeDb();
}

/**
 * Print setup instructions
 */
function runSetup() {
  console.log(`
🎯 Daily Picks Bot Setup
═══════════════════════════════

1. Add these to your .env file:

   # API-Sports (required)
   SPORTS_API_KEY=your_api_key_here

   # Telegram Bot (required)
   TELEGRAM_BOT_TOKEN=your_bot_token
   TELEGRAM_CHAT_IDS=your_chat_id

   # Optional settings
   RUN_HOUR=10
   RUN_MINUTE=0
   DB_PATH=./data/picks.db
   LOG_LEVEL=info
   ENABLE_COMMANDS=true

2. Create a Telegram bot:
   - Message @BotFather on Telegram
   - Send /newbot and follow instructions
   - Copy the token to TELEGRAM_BOT_TOKEN

3. Get your chat ID:
   - Message your new bot (or add it to a channel)
   - Visit: https://api.telegram.org/bot<TOKEN>/getUpdates
   - Find your chat.id in the response

4. Start the bot:
   npm start
`);
}

/**
 * Print help message
 */
function printHelp() {
  console.log(`
🎯 Daily Picks Bot

Usage: tsx bot/index.ts <command> [flags]

Commands:
  start           Run the daily scheduler and Telegram commands
  run             Run the daily process now
  preview         Collect and score today's events, print picks only
  history         Show recent runs and their picks
  status          Show configuration and the latest run
  setup           Show setup instructions
  help            Show this message

Flags:
  --date YYYY-MM-DD   Score another date (run, preview)
  --force             Resend even if the date was already sent (run)
  --dry-run           Record but do not send (run)
`);
}

main().catch((err) => {
  logger.error("Fatal error", err);
  process.exit(1);
});
