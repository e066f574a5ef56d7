export * from "./types.js";
export * from "./errors.js";
export { SynthesizeParamsSchema } from "./synthesize-params.schema.js";
export { AnalyzeRequestSchema } from "./analyze-request.schema.js";
export { JournalEventSchema } from "./journal-event.schema.js";
export {
  validateSynthesizeParamsData,
  validateAnalyzeRequestData,
  validateJournalEventData,
  parseSynthesizeParams,
  parseAnalyzeRequest,
  parseJournalEvent,
} from "./validator.js";
export type { ValidationResult } from "./validator.js";
