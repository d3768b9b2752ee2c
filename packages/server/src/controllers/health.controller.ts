import { listStations, type RoutePlanner } from "@transfer-planner/routing";
import type { HealthResponse } from "../models/responses.js";

export class HealthController {
  constructor(private readonly planner: RoutePlanner) {}

  /** Health check with network statistics */
  public async getHealth(): Promise<HealthResponse> {
    const network = this.planner.getNetwork();
    return {
      status: "ok",
      uptime: process.uptime(),
      network: {
        lines: network.lines.length,
        transferPoints: network.transferPoints.length,
        stations: listStations(network).length,
      },
    };
  }
}
