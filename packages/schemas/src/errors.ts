export type ServiceMapErrorCode = "INVALID_PARAMETER" | "INVALID_INPUT" | "NO_GRAPH";

export class ServiceMapError extends Error {
  readonly code: ServiceMapErrorCode;

  constructor(code: ServiceMapErrorCode, message: string) {
    super(message);
    this.name = "ServiceMapError";
    this.code = code;
  }
}

/** Synthesis parameters outside the supported range. */
export class InvalidParameterError extends ServiceMapError {
  constructor(message: string) {
    super("INVALID_PARAMETER", message);
    this.name = "InvalidParameterError";
  }
}

/** Analysis input that breaks a precondition: unknown label, cyclic graph, malformed request. */
export class InvalidInputError extends ServiceMapError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

export class NoGraphError extends ServiceMapError {
  constructor(message = "No graph has been generated yet") {
    super("NO_GRAPH", message);
    this.name = "NoGraphError";
  }
}

export function isServiceMapError(err: unknown): err is ServiceMapError {
  return err instanceof ServiceMapError;
}
