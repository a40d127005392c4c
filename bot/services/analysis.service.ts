import type { Candidate, RawEventMap, Selection } from "../types";
import { buildCandidates } from "./scoring/candidates";
import { adjustAll, selectPicks } from "./scoring/selection";

export interface Analysis extends Selection {
  candidates: Candidate[];
}

// Pure: raw event map in, ranked selection out. No I/O.
export function analyze(raw: RawEventMap): Analysis {
  const candidates = adjustAll(buildCandidates(raw));
  return {
    date: raw.data_raccolta,
    candidates,
    picks: selectPicks(candidates),
  };
}
