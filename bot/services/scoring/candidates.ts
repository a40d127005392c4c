import type {
  Candidate,
  OddsPair,
  ProbabilityDistribution,
  RawEvent,
  RawEventMap,
  ScoredSport,
  Side,
} from "../../types";
import { getString } from "../../utils/path";
import { logger } from "../../utils/logger";
import {
  BLEND_WEIGHTS,
  CONFIDENCE_PROB_WEIGHT,
  SCORED_SPORTS,
  SPORT_PROFILES,
  type SportProfile,
} from "./config";
import { extractOdds, impliedProbabilities, valueScore } from "./odds";

export function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function blend(implied: number, form: number, league: number): number {
  return BLEND_WEIGHTS.implied * implied + BLEND_WEIGHTS.form * form + BLEND_WEIGHTS.league * league;
}

export interface ScoredEvent {
  league: string;
  homeTeam: string;
  awayTeam: string;
  startTime: string;
  odds: OddsPair;
  implied: ProbabilityDistribution;
  probability: Record<Side, number>;
  value: Record<Side, number>;
}

// Blended probability and value score for both sides of one event
export function scoreEvent(event: RawEvent, profile: SportProfile): ScoredEvent {
  const { paths } = profile;
  const league = getString(event, paths.league, "");
  const homeTeam = getString(event, paths.homeTeam, "Home");
  const awayTeam = getString(event, paths.awayTeam, "Away");
  const startTime = getString(event, paths.startTime, "");

  const odds = extractOdds(event);
  const implied = impliedProbabilities(odds);

  const homeLeague = profile.leagueWeight(league);
  const probability: Record<Side, number> = {
    home: blend(implied.home, profile.form(event, homeTeam), homeLeague),
    away: blend(implied.away, profile.form(event, awayTeam), 1 - homeLeague),
  };
  const value: Record<Side, number> = {
    home: valueScore(probability.home, odds.home),
    away: valueScore(probability.away, odds.away),
  };

  return { league, homeTeam, awayTeam, startTime, odds, implied, probability, value };
}

/**
 * Score one event and emit the side with the better value score (home on ties).
 * Never throws: missing fields fall back to neutral defaults.
 */
export function buildCandidate(event: RawEvent, profile: SportProfile): Candidate {
  const scored = scoreEvent(event, profile);
  const { probability, value } = scored;

  const side: Side = value.home >= value.away ? "home" : "away";
  const team = side === "home" ? scored.homeTeam : scored.awayTeam;

  return {
    sport: profile.sport,
    market: profile.market,
    pick: profile.pickLabels[side],
    eventLabel: `${scored.homeTeam} vs ${scored.awayTeam}`,
    league: scored.league,
    startTime: scored.startTime,
    odds: scored.odds[side] ?? null,
    probability: round3(probability[side]),
    confidence: round3(CONFIDENCE_PROB_WEIGHT * probability[side] + (1 - CONFIDENCE_PROB_WEIGHT) * value[side]),
    rationale: `${team} favoured, value score ${value[side].toFixed(2)}`,
  };
}

export function buildCandidatesForSport(sport: ScoredSport, events: RawEvent[] | null | undefined): Candidate[] {
  if (!events || events.length === 0) return [];
  const profile = SPORT_PROFILES[sport];
  return events.map((event) => buildCandidate(event, profile));
}

/**
 * One candidate per event across every scored sport, in sport then event order.
 * Tennis is accepted in the map but carries no events yet.
 */
export function buildCandidates(raw: RawEventMap): Candidate[] {
  const candidates: Candidate[] = [];

  for (const sport of SCORED_SPORTS) {
    const sportCandidates = buildCandidatesForSport(sport, raw[sport]);
    logger.debug(`${sport}: ${sportCandidates.length} candidates`);
    candidates.push(...sportCandidates);
  }

  const tennis = raw.tennis ?? [];
  if (tennis.length > 0) {
    logger.debug(`tennis: ${tennis.length} events skipped (no scoring profile)`);
  }

  return candidates;
}
