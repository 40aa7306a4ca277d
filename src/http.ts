import { TransportError } from "./errors.js";

export type FetchLike = typeof fetch;

export class HttpError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(message: string, status: number, body: unknown) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
  }
}

export interface RequestOptions {
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

function tryParseBody(text: string): unknown {
  if (!text) {
    return undefined;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * Issues one request with its own timeout. Failures that never reached an
 * HTTP status become {@link TransportError}; an abort from the caller's own
 * signal is rethrown untouched.
 */
export async function requestJson(
  input: string,
  init: RequestInit = {},
  options: RequestOptions = {},
): Promise<unknown> {
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchImpl = options.fetchImpl ?? fetch;
  const callerSignal = init.signal ?? undefined;
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const signal = callerSignal ? AbortSignal.any([callerSignal, timeoutSignal]) : timeoutSignal;

  let response: Response;
  let text: string;
  try {
    response = await fetchImpl(input, { ...init, signal });
    text = await response.text();
  } catch (error) {
    if (callerSignal?.aborted) {
      throw error;
    }
    if (timeoutSignal.aborted) {
      throw new TransportError("timeout", `Request timed out after ${timeoutMs}ms for ${input}`, {
        cause: error,
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TransportError("network", `Request failed for ${input}: ${reason}`, { cause: error });
  }

  const parsed = tryParseBody(text);

  if (!response.ok) {
    throw new HttpError(
      `Request failed with status ${response.status} for ${input}`,
      response.status,
      parsed,
    );
  }

  return parsed;
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export async function wait(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return;
  }

  await new Promise<void>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
