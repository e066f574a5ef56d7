export { synthesize, DEFAULT_SEED } from "./synthesizer.js";
export { SeededRandom } from "./random.js";
export type { RandomSource } from "./random.js";
export { topologicalGenerations, successorMap, graphLabels, isAcyclic } from "./topology.js";
