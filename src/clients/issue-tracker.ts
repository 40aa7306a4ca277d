import type pino from "pino";
import { z } from "zod";
import {
  FetchError,
  FetchInterruptedError,
  RetryExhaustedError,
  TransportError,
} from "../errors.js";
import { HttpError, requestJson, wait, type FetchLike } from "../http.js";
import { withRetry, type RetryPolicy } from "../retry.js";

export type RawIssue = Record<string, unknown>;

export interface IssueSearchPage {
  total: number;
  issues: RawIssue[];
}

export interface IssueSearchClient {
  searchPage(sourceKey: string, startAt: number, signal?: AbortSignal): Promise<IssueSearchPage>;
}

export interface IssueTrackerClientOptions {
  baseUrl: string;
  pageSize: number;
  filterField: string;
  fields: string[];
  expand: string;
  requestTimeoutMs: number;
  rateLimitCooldownMs: number;
  retry: Omit<RetryPolicy, "isRetryable">;
}

export interface IssueTrackerClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

const SearchResponseSchema = z.object({
  total: z.number().int().nonnegative(),
  issues: z.array(z.record(z.unknown())),
});

export function buildSearchUrl(
  options: Pick<IssueTrackerClientOptions, "baseUrl" | "pageSize" | "filterField" | "fields" | "expand">,
  sourceKey: string,
  startAt: number,
): URL {
  const base = options.baseUrl.endsWith("/") ? options.baseUrl : `${options.baseUrl}/`;
  const url = new URL("search", base);
  url.searchParams.set("jql", `${options.filterField}=${sourceKey}`);
  url.searchParams.set("fields", options.fields.join(","));
  url.searchParams.set("startAt", String(startAt));
  url.searchParams.set("maxResults", String(options.pageSize));
  if (options.expand) {
    url.searchParams.set("expand", options.expand);
  }
  return url;
}

export function isTransientTransportError(error: unknown): boolean {
  return error instanceof TransportError;
}

export class IssueTrackerClient implements IssueSearchClient {
  private readonly fetchImpl?: FetchLike;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;
  private readonly retryPolicy: RetryPolicy;

  constructor(
    private readonly options: IssueTrackerClientOptions,
    private readonly logger: pino.Logger,
    dependencies: IssueTrackerClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl;
    this.sleep = dependencies.sleep ?? wait;
    this.random = dependencies.random ?? Math.random;
    this.retryPolicy = {
      ...options.retry,
      isRetryable: isTransientTransportError,
    };
  }

  async searchPage(sourceKey: string, startAt: number, signal?: AbortSignal): Promise<IssueSearchPage> {
    const url = buildSearchUrl(this.options, sourceKey, startAt).toString();

    // 429 is handled here rather than by the retry policy: the same request is
    // re-issued after a fixed cooldown without spending the attempt budget.
    while (true) {
      this.throwIfAborted(signal);

      let payload: unknown;
      try {
        payload = await withRetry(
          this.logger,
          "issue_search",
          async () => {
            this.logger.debug({ sourceKey, startAt, url }, "Requesting issue page");
            return requestJson(
              url,
              {
                method: "GET",
                headers: {
                  Accept: "application/json",
                },
                signal,
              },
              {
                timeoutMs: this.options.requestTimeoutMs,
                fetchImpl: this.fetchImpl,
              },
            );
          },
          this.retryPolicy,
          { sleep: this.sleep, random: this.random, signal },
        );
      } catch (error) {
        this.throwIfAborted(signal);

        if (error instanceof HttpError && error.status === 429) {
          this.logger.warn(
            { sourceKey, startAt, cooldownMs: this.options.rateLimitCooldownMs },
            "Rate limited, cooling down before retrying the same page",
          );
          await this.sleep(this.options.rateLimitCooldownMs, signal);
          continue;
        }

        if (error instanceof HttpError) {
          throw new FetchError("http_status", `Issue search failed with status ${error.status}`, {
            sourceKey,
            offset: startAt,
            status: error.status,
            responseBody: error.body,
            cause: error,
          });
        }

        if (error instanceof RetryExhaustedError) {
          throw new FetchError("retry_exhausted", error.message, {
            sourceKey,
            offset: startAt,
            cause: error,
          });
        }

        throw error;
      }

      return this.parsePage(payload, sourceKey, startAt);
    }
  }

  private parsePage(payload: unknown, sourceKey: string, startAt: number): IssueSearchPage {
    const result = SearchResponseSchema.safeParse(payload);
    if (!result.success) {
      const fields = result.error.issues.map((issue) => issue.path.join(".") || "(root)").join(", ");
      throw new FetchError("malformed_response", `Issue search response is missing or has invalid: ${fields}`, {
        sourceKey,
        offset: startAt,
        cause: result.error,
      });
    }
    return result.data;
  }

  private throwIfAborted(signal: AbortSignal | undefined) {
    if (signal?.aborted) {
      throw new FetchInterruptedError();
    }
  }
}
