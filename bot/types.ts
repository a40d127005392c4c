// =============================================
// DAILY PICKS TYPES
// =============================================

export const SPORTS = ["football", "basketball", "tennis", "volleyball"] as const;

export type Sport = (typeof SPORTS)[number];

// Sports that currently produce candidates; tennis is collected but always empty
export type ScoredSport = Exclude<Sport, "tennis">;

// An upstream fixture/game record. Its shape varies by sport and is never trusted.
export type RawEvent = Record<string, unknown>;

// Collector output: per-sport event lists plus the collection date (YYYY-MM-DD)
export type RawEventMap = {
  [S in Sport]?: RawEvent[] | null;
} & {
  data_raccolta: string;
};

export type Side = "home" | "away";

export interface OddsPair {
  home?: number;
  away?: number;
}

export interface ProbabilityDistribution {
  home: number;
  away: number;
}

export type Market = "1X2" | "ML";

export interface Candidate {
  sport: ScoredSport;
  market: Market;
  pick: string;
  eventLabel: string;
  league: string;
  startTime: string;
  odds: number | null;
  probability: number;
  confidence: number;
  rationale: string;
}

export interface Selection {
  date: string;
  picks: Candidate[];
}

export type RunStatus = "completed" | "failed";

export interface DailyRun {
  id: number;
  date: string;
  status: RunStatus;
  candidatesCount: number;
  picksCount: number;
  sent: boolean;
  error: string | null;
  createdAt: number;
}

export interface StoredPick extends Candidate {
  runId: number;
  rank: number;
}
