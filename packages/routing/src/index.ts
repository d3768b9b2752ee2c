/**
 * @transfer-planner/routing
 *
 * Direct and single-transfer route planning over a small transit network.
 *
 * Pipeline:
 * 1. Load network data -> TransitNetwork (validated, frozen)
 * 2. Generate candidates for an origin/destination pair
 * 3. Select the best candidate by (transfers, stations)
 */

export * from "./errors.js";
export * from "./network/index.js";
export * from "./config/index.js";
export * from "./candidates/index.js";
export * from "./selection/index.js";
export * from "./planner/index.js";
