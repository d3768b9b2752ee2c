/**
 * Network module.
 *
 * Builds the read-only network model from JSON or in-code data and answers
 * simple lookups over it.
 */

export { NetworkSchema, LineSchema, TransferPointSchema, type NetworkInput } from "./schema.js";
export { parseNetwork, createNetwork, listStations, linesServing } from "./network.js";
export { loadNetworkFile, loadNamedNetwork } from "./loader.js";
