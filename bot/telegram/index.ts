import { setTimeout as sleep } from "node:timers/promises";
import { config } from "../config";
import { logger } from "../utils/logger";
import { getPath } from "../utils/path";
import { handleCommand } from "./commands";

function telegramApi(): string {
  return `https://api.telegram.org/bot${config.TELEGRAM_BOT_TOKEN}`;
}

// Telegram update types
export interface TelegramUser {
  id: number;
  is_bot: boolean;
  first_name: string;
  username?: string;
}

export interface TelegramChat {
  id: number;
  type: "private" | "group" | "supergroup" | "channel";
  title?: string;
}

export interface TelegramMessage {
  message_id: number;
  from?: TelegramUser;
  chat: TelegramChat;
  date: number;
  text?: string;
}

export interface TelegramUpdate {
  update_id: number;
  message?: TelegramMessage;
}

function isTelegramMessage(value: unknown): value is TelegramMessage {
  return (
    typeof getPath(value, ["message_id"], null) === "number" &&
    typeof getPath(value, ["chat", "id"], null) === "number"
  );
}

function isTelegramUpdate(value: unknown): value is TelegramUpdate {
  if (typeof getPath(value, ["update_id"], null) !== "number") return false;
  const message = getPath(value, ["message"], undefined);
  return message === undefined || isTelegramMessage(message);
}

// Generic Telegram API call
export async function callTelegram(method: string, params: Record<string, unknown> = {}): Promise<unknown> {
  const response = await fetch(`${telegramApi()}/${method}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(params),
  });

  const data: unknown = await response.json();

  if (getPath(data, ["ok"], false) !== true) {
    const description = getPath(data, ["description"], "Telegram API error");
    logger.error(`Telegram API error: ${method}`, data);
    throw new Error(typeof description === "string" ? description : "Telegram API error");
  }

  return getPath(data, ["result"], null);
}

// Send a message
export async function sendMessage(
  chatId: string | number,
  text: string,
  options: {
    parseMode?: "Markdown" | "HTML";
    disablePreview?: boolean;
  } = {}
): Promise<TelegramMessage> {
  const result = await callTelegram("sendMessage", {
    chat_id: chatId,
    text,
    parse_mode: options.parseMode || "HTML",
    disable_web_page_preview: options.disablePreview ?? true,
  });

  if (!isTelegramMessage(result)) {
    throw new Error("Unexpected sendMessage result");
  }
  return result;
}

// Test connection
export async function testConnection(): Promise<boolean> {
  try {
    await callTelegram("getMe");
    return true;
  } catch (error) {
    logger.debug("Telegram getMe failed", error);
    return false;
  }
}

// Handle incoming update
export async function handleUpdate(update: TelegramUpdate): Promise<void> {
  try {
    if (update.message?.text) {
      await handleCommand(update.message);
    }
  } catch (error) {
    logger.error("Error handling update", error);
  }
}

// Long polling for commands
let pollingOffset = 0;
let pollingActive = false;

export async function startPolling(): Promise<void> {
  if (pollingActive) return;
  pollingActive = true;

  logger.info("Starting Telegram polling...");

  while (pollingActive) {
    try {
      const result = await callTelegram("getUpdates", {
        offset: pollingOffset,
        timeout: 30,
        allowed_updates: ["message"],
      });
      const updates = Array.isArray(result) ? result.filter(isTelegramUpdate) : [];

      for (const update of updates) {
        pollingOffset = Math.max(pollingOffset, update.update_id + 1);
        await handleUpdate(update);
      }
    } catch (error) {
      logger.error("Polling error", error);
      await sleep(5000);
    }
  }
}

export function stopPolling(): void {
  pollingActive = false;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
