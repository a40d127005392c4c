import { config } from "../config";
import { escapeHtml, sendMessage } from "../telegram";
import type { Candidate, ScoredSport, Selection } from "../types";
import { logger } from "../utils/logger";

const SPORT_LABELS: Record<ScoredSport, string> = {
  football: "⚽ Football",
  basketball: "🏀 Basketball",
  volleyball: "🏐 Volleyball",
};

export function formatPickLine(rank: number, pick: Candidate): string {
  const odds = pick.odds === null ? "n/a" : pick.odds.toFixed(2);
  const parts = [
    SPORT_LABELS[pick.sport],
    escapeHtml(pick.eventLabel),
    `${pick.market} ${escapeHtml(pick.pick)} @ ${odds}`,
    `P ${pick.probability.toFixed(2)}`,
    `Conf ${pick.confidence.toFixed(2)}`,
    escapeHtml(pick.rationale),
  ];
  return `${rank}. ${parts.join(" | ")}`;
}

/**
 * Render a selection as a Telegram HTML message.
 * An empty selection renders a single line carrying the date.
 */
export function formatPicksMessage(selection: Selection): string {
  if (selection.picks.length === 0) {
    return `No recommendation today (${escapeHtml(selection.date)})`;
  }

  const lines = [`<b>🎯 Best bets for ${escapeHtml(selection.date)}</b>`, ""];
  selection.picks.forEach((pick, index) => {
    lines.push(formatPickLine(index + 1, pick));
  });
  return lines.join("\n");
}

export interface DeliveryResult {
  delivered: number;
  failed: number;
}

// Send the rendered selection to every configured chat
export async function deliverPicks(
  selection: Selection,
  chatIds: string[] = config.TELEGRAM_CHAT_IDS
): Promise<DeliveryResult> {
  const text = formatPicksMessage(selection);
  const result: DeliveryResult = { delivered: 0, failed: 0 };

  if (chatIds.length === 0) {
    logger.warn("No Telegram chats configured, picks not sent");
    return result;
  }

  logger.info(`Sending picks to ${chatIds.length} chat(s)...`);

  for (const chatId of chatIds) {
    try {
      await sendMessage(chatId, text);
      result.delivered++;
    } catch (error) {
      logger.error(`Failed to send picks to chat ${chatId}`, error);
      result.failed++;
    }
  }

  return result;
}
