// =============================================
// SCORING CONFIG
// =============================================

import type { Market, RawEvent, ScoredSport } from "../../types";
import type { PathSegment } from "../../utils/path";

// Blend weights: implied probability / recent form / league prior
export const BLEND_WEIGHTS = {
  implied: 0.6,
  form: 0.3,
  league: 0.1,
} as const;

// Logistic steepness applied to EV per unit stake
export const VALUE_STEEPNESS = 4;

// Confidence = CONFIDENCE_PROB_WEIGHT * p + (1 - CONFIDENCE_PROB_WEIGHT) * value
export const CONFIDENCE_PROB_WEIGHT = 0.5;

export const NEUTRAL_FORM = 0.5;
export const NEUTRAL_LEAGUE_WEIGHT = 0.5;
export const TOP_TIER_LEAGUE_WEIGHT = 0.55;
export const TOP_TIER_MARKERS = ["Serie", "Premier"];

// Odds-band penalties
export const HEAVY_FAVORITE_ODDS = 1.3;
export const HEAVY_FAVORITE_PENALTY = 0.1;
export const LONGSHOT_ODDS = 5.0;
export const LONGSHOT_PENALTY = 0.05;

// Selection
export const MAX_PICKS = 3;
export const MAX_PICKS_PER_SPORT = 2;

export interface EventPaths {
  league: readonly PathSegment[];
  homeTeam: readonly PathSegment[];
  awayTeam: readonly PathSegment[];
  startTime: readonly PathSegment[];
}

export interface SportProfile {
  sport: ScoredSport;
  market: Market;
  pickLabels: { home: string; away: string };
  paths: EventPaths;
  // Home-side league prior; away is always 1 - home
  leagueWeight: (league: string) => number;
  // Recent-form prior per side
  form: (event: RawEvent, team: string) => number;
}

const API_SPORTS_TEAMS = {
  league: ["league", "name"],
  homeTeam: ["teams", "home", "name"],
  awayTeam: ["teams", "away", "name"],
} as const;

// No form feed yet: every team gets the neutral prior
const neutralForm = (): number => NEUTRAL_FORM;

const flatLeagueWeight = (): number => NEUTRAL_LEAGUE_WEIGHT;

export function topTierLeagueWeight(league: string): number {
  return TOP_TIER_MARKERS.some((marker) => league.includes(marker))
    ? TOP_TIER_LEAGUE_WEIGHT
    : NEUTRAL_LEAGUE_WEIGHT;
}

export const SPORT_PROFILES: Record<ScoredSport, SportProfile> = {
  football: {
    sport: "football",
    market: "1X2",
    pickLabels: { home: "1", away: "2" },
    paths: { ...API_SPORTS_TEAMS, startTime: ["fixture", "date"] },
    leagueWeight: topTierLeagueWeight,
    form: neutralForm,
  },
  basketball: {
    sport: "basketball",
    market: "ML",
    pickLabels: { home: "Home", away: "Away" },
    paths: { ...API_SPORTS_TEAMS, startTime: ["date"] },
    leagueWeight: flatLeagueWeight,
    form: neutralForm,
  },
  volleyball: {
    sport: "volleyball",
    market: "ML",
    pickLabels: { home: "Home", away: "Away" },
    paths: { ...API_SPORTS_TEAMS, startTime: ["date"] },
    leagueWeight: flatLeagueWeight,
    form: neutralForm,
  },
};

export const SCORED_SPORTS: ScoredSport[] = ["football", "basketball", "volleyball"];
