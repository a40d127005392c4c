import type { OddsPair, ProbabilityDistribution } from "../../types";
import { getPath } from "../../utils/path";
import { VALUE_STEEPNESS } from "./config";

const UNIFORM: ProbabilityDistribution = { home: 0.5, away: 0.5 };

// Upstream ordering assumption: first bookmaker, first bet market, value 0 = home, 1 = away
export const ODDS_PATH = {
  home: ["bookmakers", 0, "bets", 0, "values", 0, "odd"],
  away: ["bookmakers", 0, "bets", 0, "values", 1, "odd"],
} as const;

export function isUsableOdds(odds: number | undefined): odds is number {
  return odds !== undefined && odds > 1.0;
}

// Returns undefined for absent values, NaN for values that are present but not numeric
function coerceOdds(value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return Number.isFinite(value) ? value : Number.NaN;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : Number.NaN;
  }
  return Number.NaN;
}

/**
 * Read the home/away decimal odds from an event.
 * A value that cannot be read as a number discards both sides.
 */
export function extractOdds(event: unknown): OddsPair {
  const home = coerceOdds(getPath(event, ODDS_PATH.home, undefined));
  const away = coerceOdds(getPath(event, ODDS_PATH.away, undefined));

  if (Number.isNaN(home) || Number.isNaN(away)) {
    return {};
  }
  return { home, away };
}

/**
 * Implied probabilities from decimal odds.
 * Both sides priced: the inverse odds are normalised to sum to 1.
 * One side priced: the other side is its complement.
 * Neither: uniform prior.
 */
export function impliedProbabilities(odds: OddsPair): ProbabilityDistribution {
  const homeWeight = isUsableOdds(odds.home) ? 1 / odds.home : undefined;
  const awayWeight = isUsableOdds(odds.away) ? 1 / odds.away : undefined;

  if (homeWeight !== undefined && awayWeight !== undefined) {
    const total = homeWeight + awayWeight;
    return { home: homeWeight / total, away: awayWeight / total };
  }
  if (homeWeight !== undefined) {
    return { home: homeWeight, away: 1 - homeWeight };
  }
  if (awayWeight !== undefined) {
    return { home: 1 - awayWeight, away: awayWeight };
  }
  return { ...UNIFORM };
}

// Expected profit per unit stake at decimal odds
export function expectedValue(probability: number, odds: number): number {
  return probability * (odds - 1) - (1 - probability);
}

/**
 * Logistic squash of EV into (0, 1); 0.5 at break-even.
 * Unpriced sides score exactly 0.
 */
export function valueScore(probability: number, odds: number | undefined): number {
  if (!isUsableOdds(odds)) return 0.0;
  const ev = expectedValue(probability, odds);
  return 1 / (1 + Math.exp(-VALUE_STEEPNESS * ev));
}
