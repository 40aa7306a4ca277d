import type pino from "pino";
import type { CheckpointStore } from "../checkpoint/store.js";
import type { IssueSearchClient, IssueSearchPage } from "../clients/issue-tracker.js";
import { wait } from "../http.js";
import type { BatchStore } from "./batch-store.js";

export interface FetcherOptions {
  pageSize: number;
  /** Politeness delay between consecutive page requests. */
  pageDelayMs: number;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  pageSize: 100,
  pageDelayMs: 1_000,
};

export interface FetcherDependencies {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => Date;
}

export class PaginatedFetcher {
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly now: () => Date;

  constructor(
    private readonly client: IssueSearchClient,
    private readonly checkpoints: CheckpointStore,
    private readonly batches: Pick<BatchStore, "writeBatch">,
    private readonly logger: pino.Logger,
    private readonly options: FetcherOptions = DEFAULT_FETCHER_OPTIONS,
    dependencies: FetcherDependencies = {},
  ) {
    this.sleep = dependencies.sleep ?? wait;
    this.now = dependencies.now ?? (() => new Date());
  }

  /**
   * Fetches every remaining page for `sourceKey`, resuming from its
   * checkpoint. Resolves with the cumulative number of records fetched,
   * including earlier runs. An aborted `signal` ends the run early and
   * resolves with the count reached so far.
   *
   * Batch numbers resume at `ceil(offset / pageSize)`. When the stored offset
   * is not a multiple of the page size (the last run ended on a short page),
   * this is one past `offset / pageSize`, so the short batch is kept and the
   * resumed pages go to new files.
   */
  async fetchAll(sourceKey: string, signal?: AbortSignal): Promise<number> {
    const log = this.logger.child({ sourceKey });
    const pageSize = this.options.pageSize;

    const startOffset = await this.checkpoints.lastOffset(sourceKey);
    let currentOffset = startOffset;
    let totalFetched = startOffset;
    let batchNumber = Math.ceil(startOffset / pageSize);

    if (startOffset > 0) {
      log.info({ startOffset, batchNumber }, "Resuming from checkpoint");
    }

    try {
      const discovery = await this.client.searchPage(sourceKey, startOffset, signal);
      let totalKnown = discovery.total;
      log.info(
        { totalKnown, startOffset, remaining: Math.max(0, totalKnown - startOffset) },
        "Discovered collection size",
      );

      // The discovery response is the page at startOffset, so it doubles as the first page.
      let pending: IssueSearchPage | undefined = discovery;

      while (currentOffset < totalKnown) {
        if (signal?.aborted) {
          break;
        }

        const page = pending ?? (await this.client.searchPage(sourceKey, currentOffset, signal));
        pending = undefined;
        totalKnown = page.total;

        if (page.issues.length === 0) {
          log.info({ currentOffset, totalKnown }, "Empty page returned, stopping");
          break;
        }

        await this.batches.writeBatch(sourceKey, batchNumber, page.issues);

        currentOffset += page.issues.length;
        totalFetched += page.issues.length;

        await this.checkpoints.save(sourceKey, {
          sourceKey,
          lastOffset: currentOffset,
          totalFetched,
          totalKnown,
          updatedAt: this.now().toISOString(),
        });

        log.info(
          {
            batchNumber,
            fetched: page.issues.length,
            totalFetched,
            totalKnown,
            progress: totalKnown > 0 ? Number(((totalFetched / totalKnown) * 100).toFixed(1)) : 100,
          },
          "Page persisted",
        );
        batchNumber += 1;

        if (currentOffset < totalKnown) {
          await this.sleep(this.options.pageDelayMs, signal);
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        log.warn({ totalFetched, currentOffset }, "Fetch interrupted, progress saved");
        return totalFetched;
      }
      log.error({ err: error, currentOffset, totalFetched }, "Fetch aborted, last checkpoint kept");
      throw error;
    }

    if (signal?.aborted) {
      log.warn({ totalFetched, currentOffset }, "Fetch interrupted, progress saved");
      return totalFetched;
    }

    log.info({ totalFetched }, "Fetch complete");
    return totalFetched;
  }
}
