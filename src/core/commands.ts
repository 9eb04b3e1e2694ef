import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import type { TableExtractor } from "../extract";
import { safeValidateJob } from "../job";
import type { Logger, MetricsRegistry } from "../observability";
import { runIngestion, type IngestionResult } from "../pipeline";
import type { Sink } from "../sink";
import { createObjectStore, type ObjectStore } from "../storage";
import type { PipelineStore } from "../store";
import { ConfigurationError } from "./errors";
import { Fetcher } from "./fetcher";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: PipelineStore;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  objectStore?: ObjectStore;
  fetcher?: Fetcher;
  extractor?: TableExtractor;
}

export function readJobFile(jobPath: string): unknown {
  const absolutePath = path.resolve(jobPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Job file not found: ${absolutePath}`);
  }

  try {
    return JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(`Job file is not valid JSON: ${absolutePath}`, { cause: error });
  }
}

export async function runIngest(ctx: CommandContext, jobPath: string, signal?: AbortSignal): Promise<IngestionResult> {
  const job = readJobFile(jobPath);
  const fetcher =
    ctx.fetcher ??
    new Fetcher({
      timeoutMs: ctx.config.requestTimeoutMs,
      retries: ctx.config.fetchRetries,
      backoffMs: ctx.config.fetchBackoffMs,
      userAgents: ctx.config.userAgents,
      ignoreHttpsErrors: ctx.config.ignoreHttpsErrors,
    });

  ctx.logger.info("ingest_start", { jobPath, storage: ctx.config.storage.backend });
  try {
    const result = await runIngestion(job, {
      fetcher,
      objectStore: ctx.objectStore ?? createObjectStore(ctx.config.storage),
      settings: {
        candidateConcurrency: ctx.config.candidateConcurrency,
        workDir: ctx.config.workDir,
        stepRetries: ctx.config.stepRetries,
      },
      extractor: ctx.extractor,
      store: ctx.store,
      sink: ctx.sink,
      logger: ctx.logger,
      metrics: ctx.metrics,
      runId: ctx.runId,
      signal,
    });

    ctx.logger.info("ingest_complete", {
      datasetName: result.datasetName,
      files: result.manifest.files.length,
      failed: result.outcomes.filter((outcome) => outcome.status === "failed").length,
      manifestLocation: result.manifestLocation,
    });
    return result;
  } finally {
    if (!ctx.fetcher) {
      await fetcher.close();
    }
  }
}

export async function runValidate(ctx: CommandContext, jobPath: string): Promise<boolean> {
  const result = safeValidateJob(readJobFile(jobPath));
  if (!result.ok) {
    ctx.logger.error("validate_failed", { jobPath, issues: result.error.issues });
    return false;
  }

  ctx.logger.info("validate_ok", {
    jobPath,
    jobName: result.job.jobName,
    sourceType: result.job.sourceType,
    executionDate: result.job.executionDate,
  });
  return true;
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
}
