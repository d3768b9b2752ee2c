/**
 * Candidate generation.
 *
 * Evaluates the direct rule on every line and the transfer rule on every
 * ordered pair of distinct lines and every transfer point they share.
 * Output order is fixed: direct candidates in line order, then transfer
 * candidates in (first line, second line, transfer point) order. The
 * selector relies on this order to break exact ties.
 */

import type { CandidateRoute, TransitNetwork, TravelDirection } from "@transfer-planner/types";
import { buildTraversals } from "./traversal.js";
import { matchDirect } from "./direct-rule.js";
import { matchTransfer } from "./transfer-rule.js";

export interface GeneratorOptions {
  /** Which way lines may be ridden (default "forward") */
  direction?: TravelDirection;
}

export function generateCandidates(
  origin: string,
  destination: string,
  network: TransitNetwork,
  options: GeneratorOptions = {},
): CandidateRoute[] {
  const traversals = buildTraversals(network, options.direction ?? "forward");
  const candidates: CandidateRoute[] = [];

  for (const traversal of traversals) {
    const direct = matchDirect(origin, destination, traversal);
    if (direct) candidates.push(direct);
  }

  for (const first of traversals) {
    if (!first.indexOf.has(origin)) continue;
    for (const second of traversals) {
      if (second.lineId === first.lineId || !second.indexOf.has(destination)) continue;
      for (const transfer of network.transferPoints) {
        const route = matchTransfer(origin, destination, first, second, transfer);
        if (route) candidates.push(route);
      }
    }
  }

  return candidates;
}
