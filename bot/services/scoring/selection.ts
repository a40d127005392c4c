import type { Candidate, ScoredSport } from "../../types";
import { round3 } from "./candidates";
import {
  HEAVY_FAVORITE_ODDS,
  HEAVY_FAVORITE_PENALTY,
  LONGSHOT_ODDS,
  LONGSHOT_PENALTY,
  MAX_PICKS,
  MAX_PICKS_PER_SPORT,
} from "./config";

export function oddsPenalty(odds: number | null): number {
  if (odds === null) return 0;
  if (odds < HEAVY_FAVORITE_ODDS) return HEAVY_FAVORITE_PENALTY;
  if (odds > LONGSHOT_ODDS) return LONGSHOT_PENALTY;
  return 0;
}

// Returns a new candidate; the input is left as built
export function adjustConfidence(candidate: Candidate): Candidate {
  const adjusted = Math.max(0, candidate.confidence - oddsPenalty(candidate.odds));
  return { ...candidate, confidence: round3(adjusted) };
}

export function adjustAll(candidates: Candidate[]): Candidate[] {
  return candidates.map(adjustConfidence);
}

/**
 * Greedy top-N by confidence with a soft per-sport cap.
 * Array.prototype.sort is stable, so equal confidences keep input order.
 */
export function selectPicks(candidates: Candidate[]): Candidate[] {
  const ranked = [...candidates].sort((a, b) => b.confidence - a.confidence);
  const perSport = new Map<ScoredSport, number>();
  const result: Candidate[] = [];

  for (const candidate of ranked) {
    const count = perSport.get(candidate.sport) ?? 0;
    // Cap only applies while slots remain; the loop exits at MAX_PICKS
    if (count >= MAX_PICKS_PER_SPORT && result.length < MAX_PICKS) continue;

    result.push(candidate);
    perSport.set(candidate.sport, count + 1);
    if (result.length === MAX_PICKS) break;
  }

  return result;
}
