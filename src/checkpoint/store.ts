import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import type pino from "pino";
import { z } from "zod";

export interface Checkpoint {
  sourceKey: string;
  /** Index of the next record to fetch. */
  lastOffset: number;
  totalFetched: number;
  /** Collection size as reported by the most recent page response. */
  totalKnown: number;
  updatedAt: string;
}

const CheckpointSchema = z
  .object({
    sourceKey: z.string().min(1),
    lastOffset: z.number().int().nonnegative(),
    totalFetched: z.number().int().nonnegative(),
    totalKnown: z.number().int().nonnegative(),
    updatedAt: z.string().datetime({ offset: true }),
  })
  .refine((value) => value.lastOffset === value.totalFetched, {
    message: "lastOffset must equal totalFetched",
  });

export interface CheckpointStoreOptions {
  directory: string;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One JSON file per source key. Saves go through a temp file and a rename so
 * a reader never observes a half-written checkpoint.
 */
export class CheckpointStore {
  private readonly directory: string;

  constructor(
    options: CheckpointStoreOptions,
    private readonly logger: pino.Logger,
  ) {
    this.directory = options.directory;
  }

  pathFor(sourceKey: string): string {
    return path.join(this.directory, `${sourceKey}_checkpoint.json`);
  }

  /** Never rejects: a lost write only costs resumability, not the running fetch. */
  async save(sourceKey: string, checkpoint: Checkpoint): Promise<void> {
    const target = this.pathFor(sourceKey);
    const tempFile = `${target}.${process.pid}.tmp`;

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(tempFile, `${JSON.stringify(checkpoint, null, 2)}\n`, "utf8");
      await rename(tempFile, target);
      this.logger.debug(
        { sourceKey, lastOffset: checkpoint.lastOffset, totalKnown: checkpoint.totalKnown },
        "Checkpoint saved",
      );
    } catch (error) {
      this.logger.error({ sourceKey, path: target, err: error }, "Failed to save checkpoint");
      await rm(tempFile, { force: true }).catch((cleanupError: unknown) => {
        this.logger.debug({ path: tempFile, err: cleanupError }, "Failed to remove temp checkpoint");
      });
    }
  }

  async load(sourceKey: string): Promise<Checkpoint | undefined> {
    const file = this.pathFor(sourceKey);

    let rawContent: string;
    try {
      rawContent = await readFile(file, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.debug({ sourceKey }, "No checkpoint found, starting fresh");
        return undefined;
      }
      this.logger.warn({ sourceKey, path: file, err: error }, "Unreadable checkpoint, starting fresh");
      return undefined;
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(rawContent);
    } catch (error) {
      this.logger.warn({ sourceKey, path: file, err: error }, "Corrupt checkpoint JSON, starting fresh");
      return undefined;
    }

    const result = CheckpointSchema.safeParse(parsedJson);
    if (!result.success) {
      this.logger.warn(
        { sourceKey, path: file, issues: result.error.issues },
        "Invalid checkpoint contents, starting fresh",
      );
      return undefined;
    }

    if (result.data.sourceKey !== sourceKey) {
      this.logger.warn(
        { sourceKey, path: file, storedSourceKey: result.data.sourceKey },
        "Checkpoint belongs to another source key, starting fresh",
      );
      return undefined;
    }

    return result.data;
  }

  /** Returns false when there was nothing to delete. */
  async delete(sourceKey: string): Promise<boolean> {
    const file = this.pathFor(sourceKey);
    try {
      await rm(file);
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.info({ sourceKey }, "No checkpoint to delete");
        return false;
      }
      throw error;
    }

    this.logger.info({ sourceKey }, "Checkpoint deleted");
    return true;
  }

  async lastOffset(sourceKey: string): Promise<number> {
    const checkpoint = await this.load(sourceKey);
    return checkpoint?.lastOffset ?? 0;
  }
}
