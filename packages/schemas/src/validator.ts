import AjvModule, { type ErrorObject, type ValidateFunction } from "ajv";
import addFormatsModule from "ajv-formats";
import { SynthesizeParamsSchema } from "./synthesize-params.schema.js";
import { AnalyzeRequestSchema } from "./analyze-request.schema.js";
import { JournalEventSchema } from "./journal-event.schema.js";
import { InvalidInputError, InvalidParameterError } from "./errors.js";
import type { AnalyzeRequest, JournalEvent, SynthesizeParams } from "./types.js";

// Both packages are CommonJS; under ESM the default import is the module object.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

const ajv = new Ajv({ allErrors: true, strict: false });
addFormats(ajv);

const validateSynthesizeParams = ajv.compile(SynthesizeParamsSchema);
const validateAnalyzeRequest = ajv.compile(AnalyzeRequestSchema);
const validateJournalEvent = ajv.compile(JournalEventSchema);

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function toResult(valid: boolean, errors: ErrorObject[] | null | undefined): ValidationResult {
  if (valid) return { valid: true, errors: [] };
  const msgs = (errors ?? []).map(
    (e: ErrorObject) => `${e.instancePath || "/"}: ${e.message ?? "unknown error"}`
  );
  return { valid: false, errors: msgs };
}

function check(validate: ValidateFunction, data: unknown): ValidationResult {
  const valid = validate(data);
  return toResult(valid, validate.errors);
}

export function validateSynthesizeParamsData(data: unknown): ValidationResult {
  return check(validateSynthesizeParams, data);
}

export function validateAnalyzeRequestData(data: unknown): ValidationResult {
  return check(validateAnalyzeRequest, data);
}

export function validateJournalEventData(data: unknown): ValidationResult {
  return check(validateJournalEvent, data);
}

function isSynthesizeParams(data: unknown): data is SynthesizeParams {
  return validateSynthesizeParams(data);
}

function isAnalyzeRequest(data: unknown): data is AnalyzeRequest {
  return validateAnalyzeRequest(data);
}

function isJournalEvent(data: unknown): data is JournalEvent {
  return validateJournalEvent(data);
}

/** Narrow untrusted input to synthesis parameters or throw InvalidParameterError. */
export function parseSynthesizeParams(data: unknown): SynthesizeParams {
  if (isSynthesizeParams(data)) return data;
  const { errors } = toResult(false, validateSynthesizeParams.errors);
  throw new InvalidParameterError(`Invalid synthesis parameters: ${errors.join("; ")}`);
}

/** Narrow untrusted input to an analysis request or throw InvalidInputError. */
export function parseAnalyzeRequest(data: unknown): AnalyzeRequest {
  if (isAnalyzeRequest(data)) return data;
  const { errors } = toResult(false, validateAnalyzeRequest.errors);
  throw new InvalidInputError(`Invalid analysis request: ${errors.join("; ")}`);
}

export function parseJournalEvent(data: unknown): JournalEvent {
  if (isJournalEvent(data)) return data;
  const { errors } = toResult(false, validateJournalEvent.errors);
  throw new InvalidInputError(`Invalid journal event: ${errors.join("; ")}`);
}
