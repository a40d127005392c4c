import { getDb, type DailyRunRow, type PickRow } from "../index";
import type { Candidate, DailyRun, Market, RunStatus, ScoredSport, StoredPick } from "../../types";

function toSport(value: string): ScoredSport {
  if (value === "football" || value === "basketball" || value === "volleyball") return value;
  throw new Error(`Unknown sport in picks table: ${value}`);
}

function toMarket(value: string): Market {
  if (value === "1X2" || value === "ML") return value;
  throw new Error(`Unknown market in picks table: ${value}`);
}

function toStatus(value: string): RunStatus {
  return value === "completed" ? "completed" : "failed";
}

function toRun(row: DailyRunRow): DailyRun {
  return {
    id: row.id,
    date: row.run_date,
    status: toStatus(row.status),
    candidatesCount: row.candidates_count,
    picksCount: row.picks_count,
    sent: row.sent === 1,
    error: row.error,
    createdAt: row.created_at,
  };
}

function toPick(row: PickRow): StoredPick {
  return {
    runId: row.run_id,
    rank: row.rank,
    sport: toSport(row.sport),
    market: toMarket(row.market),
    pick: row.pick,
    eventLabel: row.event_label,
    league: row.league,
    startTime: row.start_time,
    odds: row.odds,
    probability: row.probability,
    confidence: row.confidence,
    rationale: row.rationale,
  };
}

// Record a run and its picks in one transaction
export function createRun(params: {
  date: string;
  status: RunStatus;
  candidatesCount: number;
  picks: Candidate[];
  error?: string;
}): DailyRun {
  const db = getDb();

  const insertRun = db.prepare<[string, string, number, number, string | null], DailyRunRow>(
    `INSERT INTO daily_runs (run_date, status, candidates_count, picks_count, error)
     VALUES (?, ?, ?, ?, ?)
     RETURNING *`
  );
  const insertPick = db.prepare(
    `INSERT INTO picks
     (run_id, rank, sport, market, pick, event_label, league, start_time, odds, probability, confidence, rationale)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  );

  const insert = db.transaction((): DailyRunRow => {
    const row = insertRun.get(
      params.date,
      params.status,
      params.candidatesCount,
      params.picks.length,
      params.error ?? null
    );
    if (!row) throw new Error("Failed to insert daily run");

    params.picks.forEach((pick, index) => {
      insertPick.run(
        row.id,
        index + 1,
        pick.sport,
        pick.market,
        pick.pick,
        pick.eventLabel,
        pick.league,
        pick.startTime,
        pick.odds,
        pick.probability,
        pick.confidence,
        pick.rationale
      );
    });

    return row;
  });

  return toRun(insert());
}

export function markRunSent(runId: number): void {
  getDb().prepare("UPDATE daily_runs SET sent = 1 WHERE id = ?").run(runId);
}

// Latest run for a date, newest first
export function getRunByDate(date: string): DailyRun | null {
  const row = getDb()
    .prepare<[string], DailyRunRow>("SELECT * FROM daily_runs WHERE run_date = ? ORDER BY id DESC LIMIT 1")
    .get(date);
  return row ? toRun(row) : null;
}

export function hasSentRunForDate(date: string): boolean {
  const row = getDb()
    .prepare<[string], { found: number }>(
      "SELECT 1 AS found FROM daily_runs WHERE run_date = ? AND sent = 1 LIMIT 1"
    )
    .get(date);
  return row !== undefined;
}

export function getLatestRun(): DailyRun | null {
  const row = getDb().prepare<[], DailyRunRow>("SELECT * FROM daily_runs ORDER BY id DESC LIMIT 1").get();
  return row ? toRun(row) : null;
}

export function getRecentRuns(limit = 7): DailyRun[] {
  return getDb()
    .prepare<[number], DailyRunRow>("SELECT * FROM daily_runs ORDER BY id DESC LIMIT ?")
    .all(limit)
    .map(toRun);
}

export function getPicksForRun(runId: number): StoredPick[] {
  return getDb()
    .prepare<[number], PickRow>("SELECT * FROM picks WHERE run_id = ? ORDER BY rank ASC")
    .all(runId)
    .map(toPick);
}
