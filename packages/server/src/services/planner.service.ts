/**
 * Planner construction from config files and environment.
 *
 * Runs once at startup. Any bad network or config data fails here, before
 * the server accepts a request.
 */

import {
  RoutePlanner,
  loadPlannerConfig,
  loadNamedNetwork,
  loadNetworkFile,
} from "@transfer-planner/routing";

export interface PlannerSetup {
  /** Planner profile under configs/planner/profiles */
  profileName?: string;
  /** Path to a network JSON file, instead of the configured network name */
  networkFile?: string;
  /** Override for the configs directory (tests) */
  configsRoot?: string;
}

export function createPlanner(setup: PlannerSetup = {}): RoutePlanner {
  const config = loadPlannerConfig(setup.profileName, setup.configsRoot);
  const network = setup.networkFile
    ? loadNetworkFile(setup.networkFile)
    : loadNamedNetwork(config.networkFile, setup.configsRoot);

  console.log(
    `[planner] profile=${setup.profileName ?? "base"}, direction=${config.direction}, unknownStations=${config.unknownStations}`,
  );

  return new RoutePlanner(network, {
    direction: config.direction,
    unknownStations: config.unknownStations,
    maxAlternatives: config.maxAlternatives,
  });
}
