/**
 * Planner facade.
 *
 * Validates a query, runs candidate generation and selection once, and
 * returns the result. Every call starts from scratch: the only state a
 * planner holds is the frozen network and the set of station names
 * derived from it.
 */

import type {
  CandidateRoute,
  RouteAlternatives,
  TransitNetwork,
  TravelDirection,
} from "@transfer-planner/types";
import { InvalidQueryError } from "../errors.js";
import { generateCandidates } from "../candidates/index.js";
import { rankCandidates, selectBest } from "../selection/index.js";
import { listStations } from "../network/index.js";
import type { UnknownStationPolicy } from "../config/index.js";

export interface PlannerOptions {
  /** Which way lines may be ridden (default "forward") */
  direction?: TravelDirection;
  /** Unknown station names: empty result or InvalidQueryError (default "no-route") */
  unknownStations?: UnknownStationPolicy;
  /** Alternatives returned by planWithAlternatives (default 3) */
  maxAlternatives?: number;
}

export const DEFAULT_PLANNER_OPTIONS: Required<PlannerOptions> = {
  direction: "forward",
  unknownStations: "no-route",
  maxAlternatives: 3,
};

interface PreparedQuery {
  origin: string;
  destination: string;
  /** False when a station is on no line and the policy allows an empty result */
  known: boolean;
}

export class RoutePlanner {
  private readonly options: Required<PlannerOptions>;
  private readonly stations: ReadonlySet<string>;

  constructor(
    private readonly network: TransitNetwork,
    options: PlannerOptions = {},
  ) {
    this.options = { ...DEFAULT_PLANNER_OPTIONS, ...stripUndefined(options) };
    this.stations = new Set(listStations(network));
  }

  getNetwork(): TransitNetwork {
    return this.network;
  }

  getOptions(): Readonly<Required<PlannerOptions>> {
    return this.options;
  }

  /**
   * Best route from origin to destination, or null when none exists.
   *
   * @throws InvalidQueryError for empty or identical stations, and for
   *   unknown stations under the "reject" policy
   */
  plan(origin: string, destination: string): CandidateRoute | null {
    const query = this.prepare(origin, destination);
    if (!query.known) return null;

    const candidates = this.generate(query);
    return selectBest(candidates);
  }

  /**
   * Best route plus the next-ranked candidates.
   *
   * @param maxAlternatives - Overrides the configured count
   */
  planWithAlternatives(
    origin: string,
    destination: string,
    maxAlternatives: number = this.options.maxAlternatives,
  ): RouteAlternatives | null {
    const query = this.prepare(origin, destination);
    if (!query.known) return null;

    const candidates = this.generate(query);
    const [primary, ...rest] = rankCandidates(candidates);
    if (!primary) return null;

    return {
      primary,
      alternatives: rest.slice(0, Math.max(0, maxAlternatives)),
      candidateCount: candidates.length,
    };
  }

  private prepare(rawOrigin: string, rawDestination: string): PreparedQuery {
    const origin = rawOrigin.trim();
    const destination = rawDestination.trim();

    if (!origin || !destination) {
      throw new InvalidQueryError("Origin and destination are required");
    }
    if (origin === destination) {
      throw new InvalidQueryError(`Origin and destination are the same station: "${origin}"`);
    }

    const unknown = [origin, destination].filter((s) => !this.stations.has(s));
    if (unknown.length === 0) return { origin, destination, known: true };

    const names = unknown.map((s) => `"${s}"`).join(", ");
    if (this.options.unknownStations === "reject") {
      throw new InvalidQueryError(`Unknown station: ${names}`);
    }
    console.warn(`[planner] Unknown station ${names}, no route`);
    return { origin, destination, known: false };
  }

  private generate(query: PreparedQuery): CandidateRoute[] {
    const candidates = generateCandidates(query.origin, query.destination, this.network, {
      direction: this.options.direction,
    });
    const direct = candidates.filter((c) => c.kind === "direct").length;
    console.log(
      `[planner] ${query.origin} → ${query.destination}: ${candidates.length} candidates (${direct} direct, ${candidates.length - direct} transfer)`,
    );
    return candidates;
  }
}

function stripUndefined(options: PlannerOptions): PlannerOptions {
  const result: PlannerOptions = {};
  if (options.direction !== undefined) result.direction = options.direction;
  if (options.unknownStations !== undefined) result.unknownStations = options.unknownStations;
  if (options.maxAlternatives !== undefined) result.maxAlternatives = options.maxAlternatives;
  return result;
}
