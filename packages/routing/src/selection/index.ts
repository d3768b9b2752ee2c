export { compareCandidates, selectBest, rankCandidates } from "./selector.js";
