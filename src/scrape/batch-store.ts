import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import type { RawIssue } from "../clients/issue-tracker.js";

export interface BatchFile {
  batchNumber: number;
  path: string;
}

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Raw page batches: `<sourceKey>_batch_<n>.json`, one JSON array each. */
export class BatchStore {
  constructor(private readonly directory: string) {}

  pathFor(sourceKey: string, batchNumber: number): string {
    return path.join(this.directory, `${sourceKey}_batch_${batchNumber}.json`);
  }

  async writeBatch(sourceKey: string, batchNumber: number, issues: RawIssue[]): Promise<string> {
    const target = this.pathFor(sourceKey, batchNumber);
    const tempFile = `${target}.${process.pid}.tmp`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(tempFile, `${JSON.stringify(issues, null, 2)}\n`, "utf8");
    await rename(tempFile, target);
    return target;
  }

  async listBatches(sourceKey: string): Promise<BatchFile[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const pattern = new RegExp(`^${escapeRegExp(sourceKey)}_batch_(\\d+)\\.json$`);
    const batches: BatchFile[] = [];
    for (const entry of entries) {
      const match = pattern.exec(entry);
      if (!match) {
        continue;
      }
      batches.push({
        batchNumber: Number(match[1]),
        path: path.join(this.directory, entry),
      });
    }

    return batches.sort((left, right) => left.batchNumber - right.batchNumber);
  }

  async readBatch(file: string): Promise<unknown[]> {
    const parsed: unknown = JSON.parse(await readFile(file, "utf8"));
    if (!Array.isArray(parsed)) {
      throw new Error(`Batch file ${file} does not contain a JSON array`);
    }
    return parsed;
  }
}
