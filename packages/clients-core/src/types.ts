/**
 * API request/response types for the transfer planner server.
 *
 * These mirror the server's models so the client has no server dependency.
 */

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

export interface Line {
  id: string;
  stations: string[];
}

export interface TransferPoint {
  station: string;
  lines: string[];
}

export interface StationListResponse {
  stations: string[];
}

export interface LineListResponse {
  lines: Line[];
  transferPoints: TransferPoint[];
}

// ---------------------------------------------------------------------------
// Route planning
// ---------------------------------------------------------------------------

export type RouteKind = "direct" | "transfer";

export interface RouteLeg {
  lineId: string;
  reversed: boolean;
  stations: string[];
}

export interface CandidateRoute {
  kind: RouteKind;
  lines: string[];
  label: string;
  transferStation?: string;
  stations: string[];
  transferCount: number;
  stationCount: number;
  legs: RouteLeg[];
}

export interface PlanRouteRequest {
  origin: string;
  destination: string;
  /** Number of runner-up routes (0-10) */
  alternatives?: number;
}

export interface PlanRouteResponse {
  route: CandidateRoute;
  alternatives: CandidateRoute[];
  meta: {
    candidateCount: number;
    searchTimeMs: number;
    description: string;
  };
}

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

export interface HealthResponse {
  status: "ok";
  uptime: number;
  network: {
    lines: number;
    transferPoints: number;
    stations: number;
  };
}

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  message: string;
  details?: Record<string, string>;
}
