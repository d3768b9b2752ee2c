import { readFileSync } from "node:fs";
import { join } from "node:path";

import type { TransitNetwork } from "@transfer-planner/types";
import { NetworkConfigError } from "../errors.js";
import { findConfigsRoot } from "../config/planner-config.js";
import { parseNetwork } from "./network.js";

/** Read and validate a network JSON file. */
export function loadNetworkFile(filePath: string): TransitNetwork {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new NetworkConfigError([`cannot read network file: ${reason}`], filePath);
  }

  const network = parseNetwork(raw, filePath);
  console.log(
    `[network] Loaded ${filePath}: ${network.lines.length} lines, ${network.transferPoints.length} transfer points`,
  );
  return network;
}

/** Load `configs/networks/<name>.json`. */
export function loadNamedNetwork(name: string, configsRoot: string = findConfigsRoot()): TransitNetwork {
  return loadNetworkFile(join(configsRoot, "networks", `${name}.json`));
}
