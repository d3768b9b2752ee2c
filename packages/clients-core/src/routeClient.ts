import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { PlanRouteRequest, PlanRouteResponse } from "./types.js";

export class RouteClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api/routes", config);
  }

  /** Plan the best route between two stations */
  public async planRoute(request: PlanRouteRequest): Promise<PlanRouteResponse> {
    return this.client.post<PlanRouteResponse>({
      path: "plan",
      body: request,
    });
  }
}
