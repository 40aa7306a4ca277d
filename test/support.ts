import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import { vi } from "vitest";

export const silentLogger = pino({ level: "silent" });

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), "issue-corpus-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function makeIssues(count: number, prefix = "X"): Array<Record<string, unknown>> {
  return Array.from({ length: count }, (_, index) => ({
    key: `${prefix}-${index}`,
    fields: { summary: `Issue ${index}` },
  }));
}

export function fakeSleep() {
  return vi.fn(async (_ms: number, _signal?: AbortSignal): Promise<void> => undefined);
}
