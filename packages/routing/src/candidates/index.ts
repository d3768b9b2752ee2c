/**
 * Candidate module.
 *
 * Turns an origin/destination pair into every direct and single-transfer
 * path the network allows.
 */

export { generateCandidates, type GeneratorOptions } from "./generator.js";
export { matchDirect } from "./direct-rule.js";
export { matchTransfer } from "./transfer-rule.js";
export { buildTraversals, type LineTraversal } from "./traversal.js";
