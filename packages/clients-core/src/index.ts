// Base
export {
  BaseClient,
  ApiError,
  toApiError,
  type ClientConfig,
  type RequestParams,
} from "./baseClient.js";

// Domain clients
export { RouteClient } from "./routeClient.js";
export { StationClient } from "./stationClient.js";
export { HealthClient } from "./healthClient.js";

// Types
export type {
  // Network
  Line,
  TransferPoint,
  StationListResponse,
  LineListResponse,
  // Routes
  RouteKind,
  RouteLeg,
  CandidateRoute,
  PlanRouteRequest,
  PlanRouteResponse,
  // Health
  HealthResponse,
  // Errors
  ErrorResponse,
} from "./types.js";
