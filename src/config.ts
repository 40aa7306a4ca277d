import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const SOURCE_KEY_REGEX = /^[A-Za-z0-9._-]+$/;

const DEFAULT_SEARCH_FIELDS = [
  "summary",
  "description",
  "status",
  "priority",
  "assignee",
  "reporter",
  "created",
  "updated",
  "resolutiondate",
  "labels",
  "comment",
];

function csv(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

const ConfigSchema = z.object({
  TRACKER_BASE_URL: z.string().url().default("https://issues.apache.org/jira/rest/api/2"),
  SOURCE_KEYS: z
    .string()
    .default("KAFKA,SPARK,HADOOP")
    .transform(csv)
    .pipe(z.array(z.string().regex(SOURCE_KEY_REGEX)).min(1)),
  SEARCH_FILTER_FIELD: z.string().min(1).default("project"),
  SEARCH_FIELDS: z
    .string()
    .default(DEFAULT_SEARCH_FIELDS.join(","))
    .transform(csv)
    .pipe(z.array(z.string()).min(1)),
  SEARCH_EXPAND: z.string().default("comments"),

  PAGE_SIZE: z.coerce.number().int().positive().default(100),
  MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  RETRY_BASE_MS: z.coerce.number().int().nonnegative().default(1_000),
  RETRY_MIN_WAIT_MS: z.coerce.number().int().nonnegative().default(2_000),
  RETRY_MAX_WAIT_MS: z.coerce.number().int().nonnegative().default(60_000),
  RETRY_JITTER_MS: z.coerce.number().int().nonnegative().default(0),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PAGE_DELAY_MS: z.coerce.number().int().nonnegative().default(1_000),
  RATE_LIMIT_COOLDOWN_MS: z.coerce.number().int().nonnegative().default(60_000),
  SOURCE_DELAY_MS: z.coerce.number().int().nonnegative().default(5_000),

  DATA_DIR: z.string().min(1).default("./data"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface AppConfig {
  trackerBaseUrl: string;
  sourceKeys: string[];
  searchFilterField: string;
  searchFields: string[];
  searchExpand: string;

  pageSize: number;
  maxAttempts: number;
  retryBaseMs: number;
  retryMinWaitMs: number;
  retryMaxWaitMs: number;
  retryJitterMs: number;
  requestTimeoutMs: number;
  pageDelayMs: number;
  rateLimitCooldownMs: number;
  sourceDelayMs: number;

  rawDir: string;
  processedDir: string;
  checkpointDir: string;
  logLevel: string;
}

type ParsedRawConfig = z.infer<typeof ConfigSchema>;

function ensureUniqueSourceKeys(sourceKeys: string[]) {
  const seen = new Set<string>();
  for (const sourceKey of sourceKeys) {
    if (seen.has(sourceKey)) {
      throw new Error(`Duplicate source key '${sourceKey}' in SOURCE_KEYS.`);
    }
    seen.add(sourceKey);
  }
}

function toAppConfig(parsed: ParsedRawConfig): AppConfig {
  if (parsed.RETRY_MIN_WAIT_MS > parsed.RETRY_MAX_WAIT_MS) {
    throw new Error(
      `RETRY_MIN_WAIT_MS (${parsed.RETRY_MIN_WAIT_MS}) must not exceed RETRY_MAX_WAIT_MS (${parsed.RETRY_MAX_WAIT_MS}).`,
    );
  }
  ensureUniqueSourceKeys(parsed.SOURCE_KEYS);

  const dataDir = path.resolve(parsed.DATA_DIR);

  return {
    trackerBaseUrl: parsed.TRACKER_BASE_URL.replace(/\/+$/, ""),
    sourceKeys: parsed.SOURCE_KEYS,
    searchFilterField: parsed.SEARCH_FILTER_FIELD,
    searchFields: parsed.SEARCH_FIELDS,
    searchExpand: parsed.SEARCH_EXPAND,

    pageSize: parsed.PAGE_SIZE,
    maxAttempts: parsed.MAX_ATTEMPTS,
    retryBaseMs: parsed.RETRY_BASE_MS,
    retryMinWaitMs: parsed.RETRY_MIN_WAIT_MS,
    retryMaxWaitMs: parsed.RETRY_MAX_WAIT_MS,
    retryJitterMs: parsed.RETRY_JITTER_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    pageDelayMs: parsed.PAGE_DELAY_MS,
    rateLimitCooldownMs: parsed.RATE_LIMIT_COOLDOWN_MS,
    sourceDelayMs: parsed.SOURCE_DELAY_MS,

    rawDir: path.join(dataDir, "raw"),
    processedDir: path.join(dataDir, "processed"),
    checkpointDir: path.join(dataDir, "checkpoints"),
    logLevel: parsed.LOG_LEVEL,
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse({
    TRACKER_BASE_URL: env.TRACKER_BASE_URL,
    SOURCE_KEYS: env.SOURCE_KEYS,
    SEARCH_FILTER_FIELD: env.SEARCH_FILTER_FIELD,
    SEARCH_FIELDS: env.SEARCH_FIELDS,
    SEARCH_EXPAND: env.SEARCH_EXPAND,

    PAGE_SIZE: env.PAGE_SIZE,
    MAX_ATTEMPTS: env.MAX_ATTEMPTS,
    RETRY_BASE_MS: env.RETRY_BASE_MS,
    RETRY_MIN_WAIT_MS: env.RETRY_MIN_WAIT_MS,
    RETRY_MAX_WAIT_MS: env.RETRY_MAX_WAIT_MS,
    RETRY_JITTER_MS: env.RETRY_JITTER_MS,
    REQUEST_TIMEOUT_MS: env.REQUEST_TIMEOUT_MS,
    PAGE_DELAY_MS: env.PAGE_DELAY_MS,
    RATE_LIMIT_COOLDOWN_MS: env.RATE_LIMIT_COOLDOWN_MS,
    SOURCE_DELAY_MS: env.SOURCE_DELAY_MS,

    DATA_DIR: env.DATA_DIR,
    LOG_LEVEL: env.LOG_LEVEL,
  });

  return toAppConfig(parsed);
}

export function parseSourceKeyList(values: string[]): string[] {
  const keys = values.flatMap((value) => csv(value));
  for (const key of keys) {
    if (!SOURCE_KEY_REGEX.test(key)) {
      throw new Error(`Invalid source key '${key}'. Use letters, digits, '.', '_' or '-'.`);
    }
  }
  return Array.from(new Set(keys));
}
