#!/usr/bin/env node

import { Command } from "commander";
import type pino from "pino";
import { ZodError } from "zod";
import { CheckpointStore } from "./checkpoint/store.js";
import { IssueTrackerClient } from "./clients/issue-tracker.js";
import { loadConfig, parseSourceKeyList, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { runScrapeStage, runTransformStage, type StageSummary } from "./pipeline.js";
import { BatchStore } from "./scrape/batch-store.js";
import { PaginatedFetcher } from "./scrape/fetcher.js";
import { DatasetTransformer } from "./transform/transformer.js";

interface Runtime {
  config: AppConfig;
  logger: pino.Logger;
  checkpoints: CheckpointStore;
  fetcher: PaginatedFetcher;
  transformer: DatasetTransformer;
}

function createRuntime(): Runtime {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const checkpoints = new CheckpointStore({ directory: config.checkpointDir }, logger);
  const batches = new BatchStore(config.rawDir);

  const client = new IssueTrackerClient(
    {
      baseUrl: config.trackerBaseUrl,
      pageSize: config.pageSize,
      filterField: config.searchFilterField,
      fields: config.searchFields,
      expand: config.searchExpand,
      requestTimeoutMs: config.requestTimeoutMs,
      rateLimitCooldownMs: config.rateLimitCooldownMs,
      retry: {
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.retryBaseMs,
        minDelayMs: config.retryMinWaitMs,
        maxDelayMs: config.retryMaxWaitMs,
        jitterMs: config.retryJitterMs,
      },
    },
    logger,
  );

  const fetcher = new PaginatedFetcher(client, checkpoints, batches, logger, {
    pageSize: config.pageSize,
    pageDelayMs: config.pageDelayMs,
  });
  const transformer = new DatasetTransformer(
    batches,
    { outputDirectory: config.processedDir },
    logger,
  );

  return { config, logger, checkpoints, fetcher, transformer };
}

function resolveSourceKeys(config: AppConfig, requested: string[] | undefined): string[] {
  const keys = parseSourceKeyList(requested ?? []);
  return keys.length > 0 ? keys : config.sourceKeys;
}

/** Aborts the returned signal on the first SIGINT/SIGTERM so the run can unwind cleanly. */
function interruptSignal(logger: pino.Logger): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      return;
    }
    logger.warn({ signal: name }, "Interrupt received, finishing current step");
    controller.abort();
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

function printSummary(summary: StageSummary) {
  console.log(JSON.stringify(summary, null, 2));
}

const program = new Command();
program
  .name("issue-corpus")
  .description("Scrape paged issue-tracker records and turn them into training examples")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Scrape configured sources, then transform the raw batches into JSONL")
  .option("--scrape-only", "only run the scraping stage", false)
  .option("--transform-only", "only run the transformation stage", false)
  .option("-s, --source <keys...>", "source key(s) to process; defaults to SOURCE_KEYS")
  .action(async (options: { scrapeOnly: boolean; transformOnly: boolean; source?: string[] }) => {
    if (options.scrapeOnly && options.transformOnly) {
      throw new Error("Cannot use both --scrape-only and --transform-only.");
    }

    const runtime = createRuntime();
    const sourceKeys = resolveSourceKeys(runtime.config, options.source);
    const interrupt = interruptSignal(runtime.logger);

    try {
      const summaries: StageSummary[] = [];

      if (!options.transformOnly) {
        const scrape = await runScrapeStage(sourceKeys, runtime.fetcher, runtime.logger, {
          signal: interrupt.signal,
          sourceDelayMs: runtime.config.sourceDelayMs,
        });
        printSummary(scrape);
        summaries.push(scrape);
      }

      if (!options.scrapeOnly && !interrupt.signal.aborted) {
        const transform = await runTransformStage(sourceKeys, runtime.transformer, runtime.logger, {
          signal: interrupt.signal,
        });
        printSummary(transform);
        summaries.push(transform);
      }

      if (interrupt.signal.aborted) {
        runtime.logger.warn("Pipeline interrupted; progress is checkpointed, run again to resume");
        return;
      }

      const failureCount = summaries.reduce((sum, summary) => sum + summary.failureCount, 0);
      if (failureCount > 0) {
        throw new Error(`Pipeline failed for ${failureCount} source step(s).`);
      }
    } finally {
      interrupt.dispose();
    }
  });

program
  .command("status")
  .description("Show the stored checkpoint for each source key")
  .option("-s, --source <keys...>", "source key(s) to show; defaults to SOURCE_KEYS")
  .action(async (options: { source?: string[] }) => {
    const { config, checkpoints } = createRuntime();
    const sourceKeys = resolveSourceKeys(config, options.source);

    const statuses: Record<string, unknown> = {};
    for (const sourceKey of sourceKeys) {
      statuses[sourceKey] = (await checkpoints.load(sourceKey)) ?? null;
    }

    console.log(JSON.stringify(statuses, null, 2));
  });

program
  .command("reset")
  .description("Delete checkpoints so the next run starts from offset 0")
  .argument("[keys...]", "source key(s) to reset; defaults to SOURCE_KEYS")
  .option("--dry-run", "show which checkpoints would be deleted", false)
  .option("--yes", "confirm checkpoint deletion", false)
  .action(async (keys: string[], options: { dryRun: boolean; yes: boolean }) => {
    const { config, checkpoints } = createRuntime();
    const sourceKeys = resolveSourceKeys(config, keys);

    if (options.dryRun) {
      console.log(
        JSON.stringify(
          {
            dryRun: true,
            checkpoints: sourceKeys.map((sourceKey) => checkpoints.pathFor(sourceKey)),
          },
          null,
          2,
        ),
      );
      return;
    }

    if (!options.yes) {
      throw new Error("Refusing to delete checkpoints without --yes. Re-run with --dry-run to preview.");
    }

    const deleted: Record<string, boolean> = {};
    for (const sourceKey of sourceKeys) {
      deleted[sourceKey] = await checkpoints.delete(sourceKey);
    }

    console.log(JSON.stringify({ dryRun: false, deleted }, null, 2));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ZodError) {
    console.error("Invalid configuration:");
    for (const issue of error.issues) {
      console.error(`- ${issue.path.join(".")}: ${issue.message}`);
    }
    process.exitCode = 1;
    return;
  }

  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
