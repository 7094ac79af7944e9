export type DraftingErrorCode =
  | "NOT_CONFIGURED"
  | "EXTRACTION_FAILED"
  | "LOOKUP_UNAVAILABLE"
  | "AMBIGUOUS_ANSWER"
  | "UNKNOWN_VARIABLE"
  | "INVALID_VALUE"
  | "SESSION_NOT_FOUND"
  | "TIMEOUT";

interface DraftingErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class DraftingError extends Error {
  readonly code: DraftingErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: DraftingErrorCode, options: DraftingErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

/** Knowledge store or drafting agent id missing from the workspace config. */
export class NotConfiguredError extends DraftingError {
  constructor(message: string, options: DraftingErrorOptions = {}) {
    super(message, "NOT_CONFIGURED", options);
  }
}

export class ExtractionFailedError extends DraftingError {
  constructor(message: string, options: DraftingErrorOptions = {}) {
    super(message, "EXTRACTION_FAILED", options);
  }
}

export class LookupUnavailableError extends DraftingError {
  constructor(message: string, options: DraftingErrorOptions = {}) {
    super(message, "LOOKUP_UNAVAILABLE", options);
  }
}

export class UnknownVariableError extends DraftingError {
  constructor(name: string) {
    super(`Unknown case variable "${name}"`, "UNKNOWN_VARIABLE", { details: { name } });
  }
}

export class InvalidValueError extends DraftingError {
  constructor(name: string, value: unknown) {
    super(`"${String(value)}" is not a valid value for ${name}`, "INVALID_VALUE", { details: { name } });
  }
}

export class SessionNotFoundError extends DraftingError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`, "SESSION_NOT_FOUND", { details: { sessionId } });
  }
}

export class TimeoutError extends DraftingError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, "TIMEOUT", { details: { label, timeoutMs } });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
