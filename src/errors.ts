export type TransportErrorKind = "timeout" | "network";

/**
 * The request never produced an HTTP response: it timed out, the connection
 * was refused or reset, or the body stream broke mid-read.
 */
export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
  }
}

export class RetryExhaustedError extends Error {
  readonly operationName: string;
  readonly attempts: number;

  constructor(operationName: string, attempts: number, lastError: unknown) {
    const reason = lastError instanceof Error ? lastError.message : String(lastError);
    super(`${operationName} failed after ${attempts} attempt(s): ${reason}`, { cause: lastError });
    this.name = "RetryExhaustedError";
    this.operationName = operationName;
    this.attempts = attempts;
  }
}

export type FetchErrorKind = "retry_exhausted" | "http_status" | "malformed_response";

/**
 * Fatal for the current fetch run. The page loop stops and the last
 * checkpoint written stays as it was.
 */
export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly sourceKey: string;
  readonly offset: number;
  readonly status?: number;
  /** Parsed response body of an `http_status` failure. */
  readonly responseBody?: unknown;

  constructor(
    kind: FetchErrorKind,
    message: string,
    details: {
      sourceKey: string;
      offset: number;
      status?: number;
      responseBody?: unknown;
      cause?: unknown;
    },
  ) {
    super(message, { cause: details.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.sourceKey = details.sourceKey;
    this.offset = details.offset;
    this.status = details.status;
    this.responseBody = details.responseBody;
  }
}

export class FetchInterruptedError extends Error {
  constructor(message = "Fetch interrupted") {
    super(message);
    this.name = "FetchInterruptedError";
  }
}
