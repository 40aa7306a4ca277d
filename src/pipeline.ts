import type pino from "pino";
import { wait } from "./http.js";
import { FetchError } from "./errors.js";
import type { PaginatedFetcher } from "./scrape/fetcher.js";
import type { DatasetTransformer } from "./transform/transformer.js";

export type Stage = "scrape" | "transform";

export interface SourceSuccess {
  sourceKey: string;
  count: number;
}

export interface SourceFailure {
  sourceKey: string;
  error: string;
}

export interface StageSummary {
  stage: Stage;
  ranAt: string;
  sourceCount: number;
  successCount: number;
  failureCount: number;
  successes: SourceSuccess[];
  failures: SourceFailure[];
  emptySourceKeys: string[];
  interrupted: boolean;
}

export interface ScrapeStageOptions {
  signal?: AbortSignal;
  sourceDelayMs?: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface TransformStageOptions {
  signal?: AbortSignal;
}

function renderBody(body: unknown): string {
  return typeof body === "string" ? body : JSON.stringify(body);
}

export function describeError(error: unknown): string {
  if (error instanceof FetchError) {
    const description = `${error.kind} at offset ${error.offset}: ${error.message}`;
    return error.responseBody === undefined
      ? description
      : `${description} (response: ${renderBody(error.responseBody)})`;
  }
  return error instanceof Error ? error.message : String(error);
}

function emptySummary(stage: Stage, sourceCount: number): StageSummary {
  return {
    stage,
    ranAt: new Date().toISOString(),
    sourceCount,
    successCount: 0,
    failureCount: 0,
    successes: [],
    failures: [],
    emptySourceKeys: [],
    interrupted: false,
  };
}

/** Scrapes each source key in turn; one key's failure does not stop the next. */
export async function runScrapeStage(
  sourceKeys: string[],
  fetcher: Pick<PaginatedFetcher, "fetchAll">,
  logger: pino.Logger,
  options: ScrapeStageOptions = {},
): Promise<StageSummary> {
  const sleep = options.sleep ?? wait;
  const summary = emptySummary("scrape", sourceKeys.length);

  for (const [index, sourceKey] of sourceKeys.entries()) {
    if (options.signal?.aborted) {
      summary.interrupted = true;
      break;
    }

    logger.info({ sourceKey, position: index + 1, of: sourceKeys.length }, "Scraping source");
    try {
      const count = await fetcher.fetchAll(sourceKey, options.signal);
      summary.successes.push({ sourceKey, count });
    } catch (error) {
      logger.error({ sourceKey, err: error }, "Scrape failed for source");
      summary.failures.push({ sourceKey, error: describeError(error) });
    }

    if (options.signal?.aborted) {
      summary.interrupted = true;
      break;
    }

    if (index < sourceKeys.length - 1 && options.sourceDelayMs) {
      await sleep(options.sourceDelayMs, options.signal);
    }
  }

  summary.successCount = summary.successes.length;
  summary.failureCount = summary.failures.length;
  return summary;
}

export async function runTransformStage(
  sourceKeys: string[],
  transformer: Pick<DatasetTransformer, "transformAll">,
  logger: pino.Logger,
  options: TransformStageOptions = {},
): Promise<StageSummary> {
  const summary = emptySummary("transform", sourceKeys.length);

  for (const sourceKey of sourceKeys) {
    if (options.signal?.aborted) {
      summary.interrupted = true;
      break;
    }

    try {
      const count = await transformer.transformAll(sourceKey);
      if (count === 0) {
        summary.emptySourceKeys.push(sourceKey);
      }
      summary.successes.push({ sourceKey, count });
    } catch (error) {
      logger.error({ sourceKey, err: error }, "Transform failed for source");
      summary.failures.push({ sourceKey, error: describeError(error) });
    }
  }

  summary.successCount = summary.successes.length;
  summary.failureCount = summary.failures.length;
  return summary;
}
