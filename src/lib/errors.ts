export type ShareGateErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_OPTIONS"
  | "INVALID_KEY"
  | "INVALID_TRANSITION"
  | "ENCRYPTION_FAILED"
  | "DECRYPTION_FAILED"
  | "LOG_WRITE_FAILED"
  | "LOG_READ_FAILED"
  | "RATES_TIMEOUT"
  | "RATES_UNAVAILABLE";

export class ShareGateError extends Error {
  readonly code: ShareGateErrorCode;
  readonly status?: number;

  constructor(
    code: ShareGateErrorCode,
    message: string,
    options: {
      status?: number;
      cause?: unknown;
    } = {},
  ) {
    super(message);
    this.name = "ShareGateError";
    this.code = code;
    this.status = options.status;

    if (options.cause !== undefined) {
      (this as Error & { cause?: unknown }).cause = options.cause;
    }
  }
}

export function isShareGateError(error: unknown): error is ShareGateError {
  return error instanceof ShareGateError;
}
