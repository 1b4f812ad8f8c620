// Client-visible failures map to 400; everything the backend or its neighbours fail on maps to 500.
export type GatewayErrorType =
  | "unsupported_model"
  | "unsupported_modality"
  | "invalid_request" // malformed body, backend validation, bad image format
  | "resource_fetch" // remote image unreachable
  | "turn_limit" // tool loop did not converge
  | "upstream"; // backend / service transport failure

const CLIENT_ERRORS: ReadonlySet<GatewayErrorType> = new Set([
  "unsupported_model",
  "unsupported_modality",
  "invalid_request",
  "resource_fetch",
  "turn_limit",
]);

export class GatewayError extends Error {
  public readonly statusCode: number;

  constructor(
    message: string,
    public readonly errorType: GatewayErrorType,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "GatewayError";
    this.statusCode = CLIENT_ERRORS.has(errorType) ? 400 : 500;
  }

  get isClientError(): boolean {
    return this.statusCode === 400;
  }

  /** OpenAI-style error envelope. Never includes a stack. */
  toErrorBody(): { error: { message: string; type: string; code: GatewayErrorType } } {
    return {
      error: {
        message: this.message,
        type: this.isClientError ? "invalid_request_error" : "api_error",
        code: this.errorType,
      },
    };
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
