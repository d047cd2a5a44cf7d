// ============================================
// Error taxonomy — every failure the predictor reports
// maps to one of three machine keys and an HTTP status
// ============================================

export type ErrorKey =
  | "bad_prediction_request"
  | "prediction_request_failed"
  | "server_error";

export const ERROR_STATUS: Record<ErrorKey, number> = {
  bad_prediction_request: 400,
  prediction_request_failed: 422,
  server_error: 500,
};

export interface AppError {
  errorKey: ErrorKey;
  messages: string[];
  requestId?: string;
  cause?: unknown;
  /** Overrides the status the key maps to. */
  statusCode?: number;
}

/** One entry of the `error` array in an error response body. */
export type ErrorEntry = Partial<Record<ErrorKey, string>>;

export interface ErrorPayload {
  error: ErrorEntry[];
}

export class PredictorError extends Error implements AppError {
  errorKey: ErrorKey;
  messages: string[];
  requestId?: string;
  override cause?: unknown;
  private readonly statusOverride?: number;

  constructor(options: AppError) {
    super(options.messages.join("; "));
    this.name = "PredictorError";
    this.errorKey = options.errorKey;
    this.messages = options.messages;
    this.requestId = options.requestId;
    this.cause = options.cause;
    this.statusOverride = options.statusCode;
  }

  get statusCode(): number {
    return this.statusOverride ?? ERROR_STATUS[this.errorKey];
  }

  /** Body of the error response: one `{ key: message }` entry per message. */
  toPayload(): ErrorPayload {
    return {
      error: this.messages.map((msg) => ({ [this.errorKey]: msg })),
    };
  }
}

function toMessages(messages: string | string[]): string[] {
  return Array.isArray(messages) ? messages : [messages];
}

/** The request is unacceptable: malformed body, missing keys, bad values. */
export function badRequestError(messages: string | string[], cause?: unknown): PredictorError {
  return new PredictorError({
    errorKey: "bad_prediction_request",
    messages: toMessages(messages),
    cause,
  });
}

/** The request was valid but the model cannot complete the prediction. */
export function predictionFailedError(messages: string | string[]): PredictorError {
  return new PredictorError({
    errorKey: "prediction_request_failed",
    messages: toMessages(messages),
  });
}

/** Backend failure: serialization, unreadable resources, unexpected crashes. */
export function serverError(messages: string | string[], cause?: unknown): PredictorError {
  return new PredictorError({
    errorKey: "server_error",
    messages: toMessages(messages),
    cause,
  });
}

/** No route matches the request: 404 for an unknown path, 405 for a wrong method. */
export function unmatchedRouteError(message: string, statusCode: 404 | 405): PredictorError {
  return new PredictorError({
    errorKey: "bad_prediction_request",
    messages: [message],
    statusCode,
  });
}

export function isPredictorError(err: unknown): err is PredictorError {
  return err instanceof PredictorError;
}

/** Wrap unknown errors */
export function wrapError(err: unknown, requestId?: string): PredictorError {
  if (err instanceof PredictorError) {
    if (requestId && !err.requestId) {
      err.requestId = requestId;
    }
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  return new PredictorError({
    errorKey: "server_error",
    messages: [`An unexpected internal error occurred: ${message}.`],
    requestId,
    cause: err,
  });
}
