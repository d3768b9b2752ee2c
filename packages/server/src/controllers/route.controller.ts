import type { PlanRouteResponse } from "../models/responses.js";
import { PlanRouteRequestSchema } from "../models/requests.js";
import { RequestValidationError } from "../errors.js";
import type { RoutePlanningService } from "../services/route-planning.service.js";

export class RouteController {
  constructor(private readonly service: RoutePlanningService) {}

  /** Plan the best route between two stations */
  public async planRoute(body: unknown): Promise<PlanRouteResponse> {
    const parsed = PlanRouteRequestSchema.safeParse(body);
    if (!parsed.success) {
      const details: Record<string, string> = {};
      for (const issue of parsed.error.issues) {
        details[issue.path.join(".") || "body"] = issue.message;
      }
      throw new RequestValidationError(details);
    }
    return this.service.plan(parsed.data);
  }
}
