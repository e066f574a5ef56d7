export { analyze, explainRootCauses, collectCandidatePaths, rankTerminalNodes } from "./analyzer.js";
export { allSimplePaths, pathString } from "./paths.js";
export { containsRun, filterRootCausePaths } from "./containment.js";
