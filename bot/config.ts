const PLACEHOLDER_API_KEY = "YOUR_SPORTS_API_KEY_HERE";

function parseChatIds(): string[] {
  const raw = process.env.TELEGRAM_CHAT_IDS || process.env.TELEGRAM_CHAT_ID || "";
  return raw
    .split(",")
    .map((id) => id.trim())
    .filter(Boolean);
}

function parseClock(value: string | undefined, fallback: number, max: number): number {
  const parsed = Number(value);
  if (value === undefined || value === "" || !Number.isInteger(parsed)) return fallback;
  if (parsed < 0 || parsed > max) return fallback;
  return parsed;
}

export const config = {
  // API-Sports endpoints (one host per sport)
  SPORTS_API_KEY: process.env.SPORTS_API_KEY || "",
  FOOTBALL_API: process.env.FOOTBALL_API || "https://v3.football.api-sports.io",
  BASKETBALL_API: process.env.BASKETBALL_API || "https://v1.basketball.api-sports.io",
  VOLLEYBALL_API: process.env.VOLLEYBALL_API || "https://v1.volleyball.api-sports.io",

  // Telegram
  TELEGRAM_BOT_TOKEN: process.env.TELEGRAM_BOT_TOKEN || "",
  TELEGRAM_CHAT_IDS: parseChatIds(),
  ENABLE_COMMANDS: process.env.ENABLE_COMMANDS !== "false",

  // Daily schedule (local time)
  RUN_HOUR: parseClock(process.env.RUN_HOUR, 10, 23),
  RUN_MINUTE: parseClock(process.env.RUN_MINUTE, 0, 59),

  // Database
  DB_PATH: process.env.DB_PATH || "./data/picks.db",

  LOG_LEVEL: process.env.LOG_LEVEL || "info",
};

export function isPlaceholderApiKey(): boolean {
  return config.SPORTS_API_KEY === PLACEHOLDER_API_KEY;
}

export function validateConfig(): { valid: boolean; missing: string[] } {
  const missing: string[] = [];

  if (!config.SPORTS_API_KEY) {
    missing.push("SPORTS_API_KEY");
  }
  if (!config.TELEGRAM_BOT_TOKEN) {
    missing.push("TELEGRAM_BOT_TOKEN");
  }
  if (config.TELEGRAM_CHAT_IDS.length === 0) {
    missing.push("TELEGRAM_CHAT_IDS");
  }

  return { valid: missing.length === 0, missing };
}
