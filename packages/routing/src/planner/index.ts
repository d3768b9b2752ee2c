/**
 * Planner module.
 *
 * network + query → generate candidates → select best → result
 */

export {
  RoutePlanner,
  DEFAULT_PLANNER_OPTIONS,
  type PlannerOptions,
} from "./planner.js";
export { formatRoute } from "./format.js";
