/**
 * Candidate ranking.
 *
 * Fewer transfers always wins; among equal transfer counts, fewer stations
 * wins. Exact ties keep input order.
 */

import type { CandidateRoute } from "@transfer-planner/types";

export function compareCandidates(a: CandidateRoute, b: CandidateRoute): number {
  return a.transferCount - b.transferCount || a.stationCount - b.stationCount;
}

/** The best candidate, or null when there is none. */
export function selectBest(candidates: readonly CandidateRoute[]): CandidateRoute | null {
  let best: CandidateRoute | null = null;
  for (const candidate of candidates) {
    if (best === null || compareCandidates(candidate, best) < 0) {
      best = candidate;
    }
  }
  return best;
}

/** All candidates, best first. Does not modify the input. */
export function rankCandidates(candidates: readonly CandidateRoute[]): CandidateRoute[] {
  return [...candidates].sort(compareCandidates);
}
