import { BaseClient, type ClientConfig } from "./baseClient.js";
import type { LineListResponse, StationListResponse } from "./types.js";

export class StationClient {
  private client: BaseClient;

  constructor(config: ClientConfig) {
    this.client = new BaseClient("api", config);
  }

  /** Every station name, in network order */
  public async getStations(): Promise<StationListResponse> {
    return this.client.get<StationListResponse>({ path: "stations" });
  }

  /** Lines and transfer points of the loaded network */
  public async getLines(): Promise<LineListResponse> {
    return this.client.get<LineListResponse>({ path: "lines" });
  }
}
