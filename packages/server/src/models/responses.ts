import type { CandidateRoute, Line, TransferPoint } from "@transfer-planner/types";

export interface NetworkStats {
  lines: number;
  transferPoints: number;
  stations: number;
}

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: NetworkStats;
}

export interface StationListResponse {
  stations: string[];
}

export interface LineListResponse {
  lines: Line[];
  transferPoints: TransferPoint[];
}

export interface PlanRouteResponse {
  route: CandidateRoute;
  alternatives: CandidateRoute[];
  meta: {
    candidateCount: number;
    searchTimeMs: number;
    /** One-line summary of `route` */
    description: string;
  };
}

export interface ErrorResponse {
  message: string;
  details?: Record<string, string>;
}
