import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CheckpointStore, type Checkpoint } from "../src/checkpoint/store.js";
import { makeTempDir, removeDir, silentLogger } from "./support.js";

const checkpoint: Checkpoint = {
  sourceKey: "KAFKA",
  lastOffset: 150,
  totalFetched: 150,
  totalKnown: 420,
  updatedAt: "2026-03-01T10:00:00.000Z",
};

describe("CheckpointStore", () => {
  let dir: string;
  let store: CheckpointStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = new CheckpointStore({ directory: path.join(dir, "checkpoints") }, silentLogger);
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("treats a missing checkpoint as a cold start", async () => {
    await expect(store.load("KAFKA")).resolves.toBeUndefined();
    await expect(store.lastOffset("KAFKA")).resolves.toBe(0);
  });

  it("round-trips a saved checkpoint as pretty-printed JSON", async () => {
    await store.save("KAFKA", checkpoint);

    await expect(store.load("KAFKA")).resolves.toEqual(checkpoint);
    await expect(store.lastOffset("KAFKA")).resolves.toBe(150);
    await expect(readFile(store.pathFor("KAFKA"), "utf8")).resolves.toBe(
      `${JSON.stringify(checkpoint, null, 2)}\n`,
    );
  });

  it("overwrites rather than appends and leaves no temp files behind", async () => {
    await store.save("KAFKA", checkpoint);
    const first = await store.load("KAFKA");
    await store.save("KAFKA", checkpoint);
    const second = await store.load("KAFKA");

    expect(first).toEqual(checkpoint);
    expect(second).toEqual(first);
    await expect(readdir(path.join(dir, "checkpoints"))).resolves.toEqual(["KAFKA_checkpoint.json"]);
  });

  it("keeps source keys in separate files", async () => {
    await store.save("KAFKA", checkpoint);
    await store.save("SPARK", { ...checkpoint, sourceKey: "SPARK", lastOffset: 7, totalFetched: 7 });

    await expect(store.lastOffset("KAFKA")).resolves.toBe(150);
    await expect(store.lastOffset("SPARK")).resolves.toBe(7);
  });

  it("treats unparsable JSON as a cold start", async () => {
    await store.save("KAFKA", checkpoint);
    await writeFile(store.pathFor("KAFKA"), "{ not json", "utf8");

    await expect(store.load("KAFKA")).resolves.toBeUndefined();
    await expect(store.lastOffset("KAFKA")).resolves.toBe(0);
  });

  it("rejects checkpoints whose offset and fetched count disagree", async () => {
    await store.save("KAFKA", { ...checkpoint, totalFetched: 149 });

    await expect(store.load("KAFKA")).resolves.toBeUndefined();
  });

  it("rejects a checkpoint recorded for another source key", async () => {
    await store.save("KAFKA", { ...checkpoint, sourceKey: "SPARK" });

    await expect(store.load("KAFKA")).resolves.toBeUndefined();
  });

  it("swallows write failures instead of rejecting", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "not a directory", "utf8");
    const broken = new CheckpointStore({ directory: path.join(blocker, "checkpoints") }, silentLogger);

    await expect(broken.save("KAFKA", checkpoint)).resolves.toBeUndefined();
    await expect(broken.load("KAFKA")).resolves.toBeUndefined();
  });

  it("deletes a checkpoint and treats a missing one as a no-op", async () => {
    await store.save("KAFKA", checkpoint);

    await expect(store.delete("KAFKA")).resolves.toBe(true);
    await expect(store.load("KAFKA")).resolves.toBeUndefined();
    await expect(store.delete("KAFKA")).resolves.toBe(false);
  });
});
