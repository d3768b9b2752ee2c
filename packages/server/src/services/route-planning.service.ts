/**
 * Route planning service: request → planner → response body.
 */

import { formatRoute, type RoutePlanner } from "@transfer-planner/routing";
import type { PlanRouteRequest } from "../models/requests.js";
import type { PlanRouteResponse } from "../models/responses.js";
import { RouteNotFoundError } from "../errors.js";

export class RoutePlanningService {
  constructor(private readonly planner: RoutePlanner) {}

  /**
   * Plan a route with alternatives.
   *
   * @throws InvalidQueryError from the planner for a bad query
   * @throws RouteNotFoundError when the network has no matching route
   */
  plan(req: PlanRouteRequest): PlanRouteResponse {
    const start = performance.now();
    const result = this.planner.planWithAlternatives(req.origin, req.destination, req.alternatives);
    const elapsed = performance.now() - start;

    if (!result) {
      throw new RouteNotFoundError(
        `No route from "${req.origin.trim()}" to "${req.destination.trim()}"`,
      );
    }

    const description = formatRoute(result.primary);
    console.log(`[route-plan] ${description} in ${elapsed.toFixed(2)}ms`);

    return {
      route: result.primary,
      alternatives: result.alternatives,
      meta: {
        candidateCount: result.candidateCount,
        searchTimeMs: Math.round(elapsed * 100) / 100,
        description,
      },
    };
  }
}
