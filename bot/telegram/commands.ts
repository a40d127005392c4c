import { sendMessage, escapeHtml, type TelegramMessage } from "./index";
import * as runsRepo from "../db/repositories/runs.repo";
import { formatPicksMessage } from "../services/delivery.service";
import type { DailyRun } from "../types";
import { logger } from "../utils/logger";

const HISTORY_LIMIT = 7;

// Parse command from message
export function parseCommand(text: string): { command: string; args: string[] } {
  const parts = text.trim().split(/\s+/);
  const command = (parts[0] || "").toLowerCase().replace("/", "").replace(/@.*$/, "");
  const args = parts.slice(1);
  return { command, args };
}

// Handle incoming message with command
export async function handleCommand(message: TelegramMessage): Promise<void> {
  const text = message.text;
  if (!text || !text.startsWith("/")) return;

  const chatId = message.chat.id.toString();
  const { command } = parseCommand(text);

  logger.info(`Command: /${command} from chat ${chatId}`);

  switch (command) {
    case "start":
    case "help":
      await handleHelp(chatId);
      break;
    case "today":
      await handleToday(chatId);
      break;
    case "history":
      await handleHistory(chatId);
      break;
    default:
      await sendMessage(chatId, "Unknown command. Use /help to see what I can do.");
  }
}

async function handleHelp(chatId: string): Promise<void> {
  await sendMessage(
    chatId,
    [
      "<b>Daily Picks Bot</b>",
      "",
      "Every day I score the day's fixtures from their odds and post the three best bets.",
      "",
      "/today - latest picks",
      "/history - recent runs",
      "/help - this message",
    ].join("\n")
  );
}

async function handleToday(chatId: string): Promise<void> {
  const run = runsRepo.getLatestRun();
  if (!run) {
    await sendMessage(chatId, "No picks yet. The first run has not happened.");
    return;
  }
  if (run.status === "failed") {
    await sendMessage(chatId, `The last run (${escapeHtml(run.date)}) failed. No picks available.`);
    return;
  }

  const picks = runsRepo.getPicksForRun(run.id);
  await sendMessage(chatId, formatPicksMessage({ date: run.date, picks }));
}

export function formatHistory(runs: DailyRun[]): string {
  if (runs.length === 0) return "No runs recorded yet.";

  const lines = ["<b>Recent runs</b>", ""];
  for (const run of runs) {
    const icon = run.status === "completed" ? "✅" : "❌";
    const sent = run.sent ? "sent" : "not sent";
    lines.push(`${icon} ${escapeHtml(run.date)} | ${run.picksCount} picks of ${run.candidatesCount} | ${sent}`);
  }
  return lines.join("\n");
}

async function handleHistory(chatId: string): Promise<void> {
  await sendMessage(chatId, formatHistory(runsRepo.getRecentRuns(HISTORY_LIMIT)));
}
