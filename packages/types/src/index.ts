/**
 * @transfer-planner/types
 *
 * Shared domain types for the transfer route planner.
 *
 * - Network: lines and transfer points
 * - Route: candidates produced and ranked by the planner
 */

export * from "./network.js";
export * from "./route.js";
