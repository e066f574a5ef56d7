export { AnalysisSession } from "./session.js";
export type { AnalysisSessionOptions } from "./session.js";
