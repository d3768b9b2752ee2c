import type { CandidateRoute } from "@transfer-planner/types";
import type { LineTraversal } from "./traversal.js";

/**
 * Match a ride on a single line.
 *
 * Both stations must be on the line with the origin before the destination.
 * The route is the contiguous slice between them, both ends included.
 */
export function matchDirect(
  origin: string,
  destination: string,
  traversal: LineTraversal,
): CandidateRoute | null {
  const from = traversal.indexOf.get(origin);
  const to = traversal.indexOf.get(destination);
  if (from === undefined || to === undefined || from >= to) return null;

  const stations = traversal.stations.slice(from, to + 1);
  return {
    kind: "direct",
    lines: [traversal.lineId],
    label: traversal.lineId,
    stations,
    transferCount: 0,
    stationCount: stations.length,
    legs: [{ lineId: traversal.lineId, reversed: traversal.reversed, stations: [...stations] }],
  };
}
