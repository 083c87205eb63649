export type RealtimeErrorCode =
  | "AUTHENTICATION_REQUIRED"
  | "ACCESS_DENIED"
  | "VALIDATION"
  | "NOT_FOUND"
  | "TRANSIENT_DISPATCH"
  | "INTERNAL";

/**
 * WebSocket close codes in the private 4000-4999 range, plus 1011 for
 * unexpected server failures.
 */
export const WS_CLOSE_CODES = {
  AUTHENTICATION_REQUIRED: 4401,
  ACCESS_DENIED: 4403,
  NOT_FOUND: 4404,
  INTERNAL: 1011,
} as const;

export class RealtimeError extends Error {
  constructor(
    public readonly code: RealtimeErrorCode,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "RealtimeError";
  }
}

export class AuthenticationRequiredError extends RealtimeError {
  constructor(message = "Authentication required.") {
    super("AUTHENTICATION_REQUIRED", message);
    this.name = "AuthenticationRequiredError";
  }
}

export class AccessDeniedError extends RealtimeError {
  constructor(message = "Access denied.", details?: unknown) {
    super("ACCESS_DENIED", message, details);
    this.name = "AccessDeniedError";
  }
}

export class RealtimeValidationError extends RealtimeError {
  constructor(message: string, details?: unknown) {
    super("VALIDATION", message, details);
    this.name = "RealtimeValidationError";
  }
}

export class RealtimeNotFoundError extends RealtimeError {
  constructor(message: string, details?: unknown) {
    super("NOT_FOUND", message, details);
    this.name = "RealtimeNotFoundError";
  }
}

export class TransientDispatchError extends RealtimeError {
  constructor(message: string, details?: unknown) {
    super("TRANSIENT_DISPATCH", message, details);
    this.name = "TransientDispatchError";
  }
}

export class RealtimeInternalError extends RealtimeError {
  constructor(message = "Internal error.", details?: unknown) {
    super("INTERNAL", message, details);
    this.name = "RealtimeInternalError";
  }
}

/**
 * Close code for a failure that ends a connection while it is being set up.
 */
export function closeCodeFor(error: unknown): number {
  if (!(error instanceof RealtimeError)) return WS_CLOSE_CODES.INTERNAL;

  switch (error.code) {
    case "AUTHENTICATION_REQUIRED":
      return WS_CLOSE_CODES.AUTHENTICATION_REQUIRED;
    case "ACCESS_DENIED":
      return WS_CLOSE_CODES.ACCESS_DENIED;
    case "NOT_FOUND":
      return WS_CLOSE_CODES.NOT_FOUND;
    default:
      return WS_CLOSE_CODES.INTERNAL;
  }
}
