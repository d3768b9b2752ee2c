/**
 * A line as ridden in one direction, with a station → index lookup.
 *
 * In "forward" mode every line yields one traversal in stored order. In
 * "both" mode it also yields a reversed one, so the matching rules only
 * ever have to check for ascending indexes.
 */

import type { Line, TransitNetwork, TravelDirection } from "@transfer-planner/types";

export interface LineTraversal {
  lineId: string;
  reversed: boolean;
  stations: readonly string[];
  /** station → position in `stations` */
  indexOf: ReadonlyMap<string, number>;
}

function makeTraversal(line: Line, reversed: boolean): LineTraversal {
  const stations = reversed ? [...line.stations].reverse() : line.stations;
  const indexOf = new Map<string, number>();
  stations.forEach((station, i) => indexOf.set(station, i));
  return { lineId: line.id, reversed, stations, indexOf };
}

/** Traversals for every line, in line order (forward before reversed). */
export function buildTraversals(
  network: TransitNetwork,
  direction: TravelDirection,
): LineTraversal[] {
  const traversals: LineTraversal[] = [];
  for (const line of network.lines) {
    traversals.push(makeTraversal(line, false));
    if (direction === "both") traversals.push(makeTraversal(line, true));
  }
  return traversals;
}
