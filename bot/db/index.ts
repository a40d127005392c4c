import Database from "better-sqlite3";
import { existsSync, mkdirSync, readFileSync } from "node:fs";
import { dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { config } from "../config";
import { logger } from "../utils/logger";

const IN_MEMORY = ":memory:";

let _db: Database.Database | null = null;

export function getDb(): Database.Database {
  if (_db) return _db;

  if (config.DB_PATH !== IN_MEMORY) {
    // Ensure data directory exists
    const dataDir = dirname(config.DB_PATH);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
    }
  }

  _db = new Database(config.DB_PATH);

  // Enable WAL mode for better concurrent performance
  if (config.DB_PATH !== IN_MEMORY) {
    _db.pragma("journal_mode = WAL");
  }
  _db.pragma("foreign_keys = ON");

  runMigrations(_db);

  logger.info(`Database initialized at ${config.DB_PATH}`);
  return _db;
}

function runMigrations(database: Database.Database): void {
  const schemaPath = fileURLToPath(new URL("./schema.sql", import.meta.url));
  const schema = readFileSync(schemaPath, "utf8");

  // Statements are all CREATE ... IF NOT EXISTS, safe to replay on every start
  database.exec(schema);

  logger.debug("Database migrations complete");
}

// Close database connection
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

// Row shapes as stored
export interface DailyRunRow {
  id: number;
  run_date: string;
  status: string;
  candidates_count: number;
  picks_count: number;
  sent: number;
  error: string | null;
  created_at: number;
}

export interface PickRow {
  id: number;
  run_id: number;
  rank: number;
  sport: string;
  market: string;
  pick: string;
  event_label: string;
  league: string;
  start_time: string;
  odds: number | null;
  probability: number;
  confidence: number;
  rationale: string;
}
