export type ErrorCode = "validation" | "not_found" | "integrity" | "internal";

export type ErrorDetails = Record<string, unknown>;

export class GatewayError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class ValidationError extends GatewayError {
  public readonly field?: string;

  constructor(message = "Validation failed", field?: string) {
    super("validation", message, field ? { field } : undefined);
    this.field = field;
  }
}

export class NotFoundError extends GatewayError {
  constructor(message = "Not found", details?: ErrorDetails) {
    super("not_found", message, details);
  }
}

/** The backend broke its contract, e.g. a persisted row without an id. */
export class IntegrityError extends GatewayError {
  constructor(message = "Integrity violation", details?: ErrorDetails) {
    super("integrity", message, details);
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError;
}

export function toToolError(err: unknown): { code: ErrorCode; message: string; details?: ErrorDetails } {
  if (isGatewayError(err)) {
    return { code: err.code, message: err.message, details: err.details };
  }

  if (err instanceof Error) {
    return { code: "internal", message: err.message };
  }

  return { code: "internal", message: "Unknown error" };
}
