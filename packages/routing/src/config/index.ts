export {
  PlannerConfigSchema,
  DEFAULT_PLANNER_CONFIG,
  deepMerge,
  findConfigsRoot,
  loadBaseConfig,
  loadProfileConfig,
  loadPlannerConfig,
  listPlannerProfiles,
  type PlannerConfig,
  type UnknownStationPolicy,
  type ProfileInfo,
} from "./planner-config.js";
