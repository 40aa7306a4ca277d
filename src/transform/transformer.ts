import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import type { RawIssue } from "../clients/issue-tracker.js";
import type { BatchStore } from "../scrape/batch-store.js";
import { cleanText, extractComments, fieldValue, issueFields, issueKey } from "./text.js";
import type { ExampleMetadata, TrainingExample } from "./types.js";

const QA_QUESTION = "What is this issue about and what problem does it address?";

export interface TransformerOptions {
  outputDirectory: string;
  /** Number of leading examples copied to the pretty-printed sample file. */
  sampleSize?: number;
}

function isRawIssue(value: unknown): value is RawIssue {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class DatasetTransformer {
  private readonly outputDirectory: string;
  private readonly sampleSize: number;

  constructor(
    private readonly batches: Pick<BatchStore, "listBatches" | "readBatch">,
    options: TransformerOptions,
    private readonly logger: pino.Logger,
  ) {
    this.outputDirectory = options.outputDirectory;
    this.sampleSize = options.sampleSize ?? 10;
  }

  outputPaths(sourceKey: string): { jsonl: string; sample: string } {
    return {
      jsonl: path.join(this.outputDirectory, `${sourceKey}_training_data.jsonl`),
      sample: path.join(this.outputDirectory, `${sourceKey}_training_data_pretty.json`),
    };
  }

  transformIssue(issue: RawIssue, sourceKey: string): TrainingExample[] {
    const fields = issueFields(issue);
    if (!fields.description && !fields.summary) {
      return [];
    }

    const summary = cleanText(fields.summary);
    const description = cleanText(fields.description);
    const metadata: ExampleMetadata = {
      issue_key: issueKey(issue),
      project: sourceKey,
      status: fieldValue(issue, "status", "name"),
      priority: fieldValue(issue, "priority", "name"),
    };
    const titled = `Title: ${summary}\n\nDescription: ${description}`;

    const comments = extractComments(issue);
    const summarizationInput = comments ? `${description}\n\nComments:\n${comments}` : description;

    return [
      {
        instruction: "Summarize the following issue",
        input: summarizationInput,
        output: summary,
        task_type: "summarization",
        metadata,
      },
      {
        instruction: "Classify the status of this issue (e.g., Open, In Progress, Resolved, Closed)",
        input: titled,
        output: metadata.status,
        task_type: "classification_status",
        metadata,
      },
      {
        instruction: "Classify the priority of this issue (e.g., Critical, Major, Minor, Trivial)",
        input: titled,
        output: metadata.priority,
        task_type: "classification_priority",
        metadata,
      },
      {
        instruction: "Answer the following question about this issue",
        input: `${titled}\n\nQuestion: ${QA_QUESTION}`,
        output: description || summary,
        task_type: "qa",
        metadata,
      },
    ];
  }

  /** A batch that cannot be read is logged and contributes nothing. */
  async processBatchFile(file: string, sourceKey: string): Promise<TrainingExample[]> {
    let records: unknown[];
    try {
      records = await this.batches.readBatch(file);
    } catch (error) {
      this.logger.error({ sourceKey, path: file, err: error }, "Failed to read batch file, skipping");
      return [];
    }

    const examples: TrainingExample[] = [];
    let skipped = 0;
    for (const record of records) {
      if (!isRawIssue(record)) {
        skipped += 1;
        continue;
      }
      examples.push(...this.transformIssue(record, sourceKey));
    }

    this.logger.debug(
      { sourceKey, path: file, issues: records.length, skipped, examples: examples.length },
      "Batch transformed",
    );
    return examples;
  }

  async transformAll(sourceKey: string): Promise<number> {
    const batchFiles = await this.batches.listBatches(sourceKey);
    if (batchFiles.length === 0) {
      this.logger.warn({ sourceKey }, "No batch files found");
      return 0;
    }

    this.logger.info({ sourceKey, batchCount: batchFiles.length }, "Transforming batches");

    const examples: TrainingExample[] = [];
    for (const batchFile of batchFiles) {
      examples.push(...(await this.processBatchFile(batchFile.path, sourceKey)));
    }

    const outputs = this.outputPaths(sourceKey);
    await mkdir(this.outputDirectory, { recursive: true });
    await writeFile(
      outputs.jsonl,
      examples.map((example) => `${JSON.stringify(example)}\n`).join(""),
      "utf8",
    );
    await writeFile(
      outputs.sample,
      `${JSON.stringify(examples.slice(0, this.sampleSize), null, 2)}\n`,
      "utf8",
    );

    this.logger.info(
      { sourceKey, examples: examples.length, output: outputs.jsonl },
      "Training examples written",
    );
    return examples.length;
  }
}
