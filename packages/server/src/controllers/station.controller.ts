import { listStations, type RoutePlanner } from "@transfer-planner/routing";
import type { LineListResponse, StationListResponse } from "../models/responses.js";

export class StationController {
  constructor(private readonly planner: RoutePlanner) {}

  /** Every station name, in network order */
  public async getStations(): Promise<StationListResponse> {
    return { stations: listStations(this.planner.getNetwork()) };
  }

  /** Lines and transfer points of the loaded network */
  public async getLines(): Promise<LineListResponse> {
    const network = this.planner.getNetwork();
    return {
      lines: network.lines.map((l) => ({ id: l.id, stations: [...l.stations] })),
      transferPoints: network.transferPoints.map((tp) => ({
        station: tp.station,
        lines: [...tp.lines],
      })),
    };
  }
}
