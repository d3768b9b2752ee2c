/**
 * Route results - the output of the planner.
 *
 * A candidate route is built fresh for each query and holds no reference
 * back to the network it was derived from.
 */

/** Kind of candidate: a single line, or exactly one change of line */
export type RouteKind = "direct" | "transfer";

/** The part of a route ridden on one line */
export interface RouteLeg {
  lineId: string;
  /** Was the line ridden against its stored order? */
  reversed: boolean;
  /** Stations ridden on this leg, boarding and alighting stations included */
  stations: string[];
}

/** One possible path between origin and destination */
export interface CandidateRoute {
  kind: RouteKind;
  /** Line ids in riding order (one for direct, two for transfer) */
  lines: string[];
  /** Human label, e.g. "H72" or "H72 → G12" */
  label: string;
  /** Station where the line change happens (transfer routes only) */
  transferStation?: string;
  /** Every station traversed, in order, each listed once */
  stations: string[];
  /** 0 for direct routes, 1 for transfer routes */
  transferCount: number;
  /** Length of `stations` */
  stationCount: number;
  legs: RouteLeg[];
}

/** Best route plus the next-ranked candidates */
export interface RouteAlternatives {
  /** The recommended route */
  primary: CandidateRoute;
  /** Next-best candidates, best first */
  alternatives: CandidateRoute[];
  /** How many candidates the generator produced */
  candidateCount: number;
}
