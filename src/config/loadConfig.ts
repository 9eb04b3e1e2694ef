import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import { DEFAULT_USER_AGENTS } from "../core/fetcher";
import type { AppConfig, SinkType, StorageBackend } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  requestTimeoutMs: 15_000,
  fetchRetries: 3,
  fetchBackoffMs: 300,
  ignoreHttpsErrors: false,
  userAgents: [...DEFAULT_USER_AGENTS],
  candidateConcurrency: 1,
  workDir: path.join(os.tmpdir(), "doc-ingest"),
  storePath: "data/state.sqlite",
  storage: {
    backend: "s3",
    localRoot: "data/objects",
    s3ForcePathStyle: false,
  },
  sink: {
    type: "local_jsonl",
    outputDir: "data/outcomes",
  },
  stepRetries: {
    fetch: { retries: 2, delayMs: 3_000 },
    download: { retries: 2, delayMs: 5_000 },
  },
};

const STORAGE_BACKENDS = ["s3", "local", "memory"] as const satisfies readonly StorageBackend[];
const SINK_TYPES = ["local_jsonl", "http", "sqs", "none"] as const satisfies readonly SinkType[];

const retryPolicySchema = z.object({
  retries: z.number().int().min(0),
  delayMs: z.number().int().min(0),
});

const configFileSchema = z
  .object({
    requestTimeoutMs: z.number().int().positive(),
    fetchRetries: z.number().int().min(0),
    fetchBackoffMs: z.number().int().min(0),
    ignoreHttpsErrors: z.boolean(),
    userAgents: z.array(z.string().min(1)),
    candidateConcurrency: z.number().int().positive(),
    workDir: z.string().min(1),
    storePath: z.string().min(1),
    storage: z
      .object({
        backend: z.enum(STORAGE_BACKENDS),
        localRoot: z.string().min(1),
        s3Region: z.string(),
        s3Endpoint: z.string(),
        s3ForcePathStyle: z.boolean(),
      })
      .partial(),
    sink: z
      .object({
        type: z.enum(SINK_TYPES),
        outputDir: z.string().min(1),
        httpEndpoint: z.string(),
        httpToken: z.string(),
        sqsQueueUrl: z.string(),
      })
      .partial(),
    stepRetries: z
      .object({
        fetch: retryPolicySchema,
        download: retryPolicySchema,
      })
      .partial(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configFileSchema>;

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid JSON: ${absolutePath}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }
  const items = value
    .split("|")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : fallback;
}

function toChoice<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  const normalized = value?.trim().toLowerCase();
  return choices.find((choice) => choice === normalized) ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    storage: { ...DEFAULT_CONFIG.storage, ...fileConfig.storage },
    sink: { ...DEFAULT_CONFIG.sink, ...fileConfig.sink },
    stepRetries: { ...DEFAULT_CONFIG.stepRetries, ...fileConfig.stepRetries },
  };

  return {
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    fetchRetries: toInt(env.FETCH_RETRIES, merged.fetchRetries),
    fetchBackoffMs: toInt(env.FETCH_BACKOFF_MS, merged.fetchBackoffMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    userAgents: toList(env.USER_AGENTS, merged.userAgents),
    candidateConcurrency: Math.max(1, toInt(env.CANDIDATE_CONCURRENCY, merged.candidateConcurrency)),
    workDir: env.WORK_DIR ?? merged.workDir,
    storePath: env.STORE_PATH ?? merged.storePath,
    storage: {
      backend: toChoice(env.STORAGE_BACKEND, STORAGE_BACKENDS, merged.storage.backend),
      localRoot: env.STORAGE_LOCAL_ROOT ?? merged.storage.localRoot,
      s3Region: env.S3_REGION ?? merged.storage.s3Region,
      s3Endpoint: env.S3_ENDPOINT ?? merged.storage.s3Endpoint,
      s3ForcePathStyle: toBool(env.S3_FORCE_PATH_STYLE, merged.storage.s3ForcePathStyle),
    },
    sink: {
      type: toChoice(env.SINK_TYPE, SINK_TYPES, merged.sink.type),
      outputDir: env.OUTPUT_OUTCOMES_DIR ?? merged.sink.outputDir,
      httpEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.sink.httpEndpoint,
      httpToken: env.HTTP_SINK_TOKEN ?? merged.sink.httpToken,
      sqsQueueUrl: env.SQS_QUEUE_URL ?? merged.sink.sqsQueueUrl,
    },
    stepRetries: {
      fetch: {
        retries: toInt(env.STEP_FETCH_RETRIES, merged.stepRetries.fetch.retries),
        delayMs: toInt(env.STEP_FETCH_DELAY_MS, merged.stepRetries.fetch.delayMs),
      },
      download: {
        retries: toInt(env.STEP_DOWNLOAD_RETRIES, merged.stepRetries.download.retries),
        delayMs: toInt(env.STEP_DOWNLOAD_DELAY_MS, merged.stepRetries.download.delayMs),
      },
    },
  };
}

export { DEFAULT_CONFIG };
