import { describe, expect, it, vi } from "vitest";
import { FetchError } from "../src/errors.js";
import { describeError, runScrapeStage, runTransformStage } from "../src/pipeline.js";
import { fakeSleep, silentLogger } from "./support.js";

describe("describeError", () => {
  it("names the failure kind and offset for fetch errors", () => {
    const error = new FetchError("http_status", "Issue search failed with status 400", {
      sourceKey: "KAFKA",
      offset: 0,
      status: 400,
    });

    expect(describeError(error)).toBe("http_status at offset 0: Issue search failed with status 400");
  });

  it("appends the tracker's response body to status failures", () => {
    const error = new FetchError("http_status", "Issue search failed with status 400", {
      sourceKey: "KAFKA",
      offset: 100,
      status: 400,
      responseBody: { errorMessages: ["bad jql"] },
    });

    expect(describeError(error)).toBe(
      'http_status at offset 100: Issue search failed with status 400 (response: {"errorMessages":["bad jql"]})',
    );
    expect(describeError(new Error("disk full"))).toBe("disk full");
    expect(describeError("plain")).toBe("plain");
  });
});

describe("runScrapeStage", () => {
  it("keeps going after one source fails", async () => {
    const fetchAll = vi.fn(async (sourceKey: string, _signal?: AbortSignal) => {
      if (sourceKey === "SPARK") {
        throw new FetchError("retry_exhausted", "issue_search failed after 5 attempt(s)", {
          sourceKey,
          offset: 300,
        });
      }
      return sourceKey.length;
    });
    const sleep = fakeSleep();

    const summary = await runScrapeStage(["KAFKA", "SPARK", "HADOOP"], { fetchAll }, silentLogger, {
      sourceDelayMs: 5_000,
      sleep,
    });

    expect(fetchAll.mock.calls.map(([sourceKey]) => sourceKey)).toEqual(["KAFKA", "SPARK", "HADOOP"]);
    expect(summary).toMatchObject({
      stage: "scrape",
      sourceCount: 3,
      successCount: 2,
      failureCount: 1,
      successes: [
        { sourceKey: "KAFKA", count: 5 },
        { sourceKey: "HADOOP", count: 6 },
      ],
      failures: [
        {
          sourceKey: "SPARK",
          error: "retry_exhausted at offset 300: issue_search failed after 5 attempt(s)",
        },
      ],
      interrupted: false,
    });
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([5_000, 5_000]);
  });

  it("stops before the next source once interrupted", async () => {
    const controller = new AbortController();
    const fetchAll = vi.fn(async (_sourceKey: string, _signal?: AbortSignal) => {
      controller.abort();
      return 2;
    });

    const summary = await runScrapeStage(["KAFKA", "SPARK"], { fetchAll }, silentLogger, {
      signal: controller.signal,
      sleep: fakeSleep(),
    });

    expect(fetchAll).toHaveBeenCalledTimes(1);
    expect(summary.interrupted).toBe(true);
    expect(summary.successes).toEqual([{ sourceKey: "KAFKA", count: 2 }]);
  });
});

describe("runTransformStage", () => {
  it("records empty sources and failures separately", async () => {
    const transformAll = vi.fn(async (sourceKey: string) => {
      if (sourceKey === "HADOOP") {
        throw new Error("disk full");
      }
      return sourceKey === "SPARK" ? 0 : 12;
    });

    const summary = await runTransformStage(["KAFKA", "SPARK", "HADOOP"], { transformAll }, silentLogger);

    expect(summary).toMatchObject({
      stage: "transform",
      successCount: 2,
      failureCount: 1,
      successes: [
        { sourceKey: "KAFKA", count: 12 },
        { sourceKey: "SPARK", count: 0 },
      ],
      failures: [{ sourceKey: "HADOOP", error: "disk full" }],
      emptySourceKeys: ["SPARK"],
    });
  });
});
