export type UserFacingErrorBody = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

/**
 * An error whose message is safe to show to the caller. HTTP routes answer with
 * `statusCode` and `toBody()`; socket handlers turn it into an error frame.
 */
export class UserFacingError extends Error {
  public readonly userMessage: string;
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(params: {
    userMessage: string;
    code?: string;
    statusCode?: number;
    debugMessage?: string;
    details?: Record<string, unknown>;
  }) {
    super(params.debugMessage ?? params.userMessage);
    this.name = "UserFacingError";
    this.userMessage = params.userMessage;
    this.code = params.code ?? "USER_ERROR";
    this.statusCode = params.statusCode ?? 400;
    this.details = params.details;
  }

  toBody(): UserFacingErrorBody {
    return this.details
      ? { code: this.code, message: this.userMessage, details: this.details }
      : { code: this.code, message: this.userMessage };
  }
}
