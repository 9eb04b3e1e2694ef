import os from "node:os";
import path from "node:path";
import type { StepRetryConfig } from "../config";
import { CancelledError, throwIfCancelled } from "../core/errors";
import type { Fetcher } from "../core/fetcher";
import { Downloader } from "../download/downloader";
import { ParquetColumnarWriter, PdfParseTableExtractor, type ColumnarWriter, type TableExtractor } from "../extract";
import { validateJob, type ValidatedJob } from "../job";
import { Logger, MetricsRegistry, createRunId, errorMessage } from "../observability";
import type { Sink } from "../sink";
import { StorageLayout, type ObjectStore } from "../storage";
import type { PipelineStore } from "../store";
import type { CandidateOutcome, Link, Manifest, RunState } from "../types";
import { processCandidate, type CandidateContext } from "./candidate";
import { processWithConcurrency } from "./concurrency";
import { buildManifest, serializeManifest } from "./manifest";
import { discoverLinks, resolveDatasetName, resolveSource, selectCandidates, type Discovery } from "./sources";

export interface IngestionSettings {
  candidateConcurrency: number;
  workDir: string;
  stepRetries: StepRetryConfig;
}

export interface IngestionDeps {
  fetcher: Fetcher;
  objectStore: ObjectStore;
  settings?: Partial<IngestionSettings>;
  store?: PipelineStore;
  sink?: Sink;
  logger?: Logger;
  metrics?: MetricsRegistry;
  downloader?: Downloader;
  extractor?: TableExtractor;
  writer?: ColumnarWriter;
  signal?: AbortSignal;
  now?: () => Date;
  runId?: string;
}

export interface IngestionResult {
  runId: string;
  datasetName: string;
  manifest: Manifest;
  manifestLocation?: string;
  outcomes: CandidateOutcome[];
}

export const DEFAULT_INGESTION_SETTINGS: IngestionSettings = {
  candidateConcurrency: 1,
  workDir: path.join(os.tmpdir(), "doc-ingest"),
  stepRetries: {
    fetch: { retries: 2, delayMs: 3_000 },
    download: { retries: 2, delayMs: 5_000 },
  },
};

class RunTracker {
  state: RunState = "validating";
  private started = false;
  private readonly runId: string;
  private readonly logger: Logger;
  private readonly store?: PipelineStore;

  constructor(runId: string, logger: Logger, store?: PipelineStore) {
    this.runId = runId;
    this.logger = logger;
    this.store = store;
  }

  async start(jobName: string, startedAt: Date): Promise<void> {
    await this.store?.startRun(this.runId, jobName, startedAt.toISOString());
    this.started = true;
  }

  async enter(state: RunState): Promise<void> {
    this.state = state;
    this.logger.info("run_state", { state });
    if (this.started) {
      await this.store?.updateRunState(this.runId, state);
    }
  }

  async finish(
    status: "completed" | "failed" | "cancelled",
    state: RunState,
    finishedAt: Date,
    extra: { datasetName?: string; manifestLocation?: string; error?: string } = {},
  ): Promise<void> {
    this.state = state;
    if (this.started) {
      await this.store?.finishRun(this.runId, { status, state, finishedAt: finishedAt.toISOString(), ...extra });
    }
  }
}

async function publishToSink(
  sink: Sink | undefined,
  logger: Logger,
  action: string,
  publish: (sink: Sink) => Promise<void>,
): Promise<void> {
  if (!sink) {
    return;
  }
  try {
    await publish(sink);
  } catch (error) {
    logger.warn("sink_publish_failed", { action, error: errorMessage(error) });
  }
}

async function discover(
  job: ValidatedJob,
  deps: IngestionDeps,
  settings: IngestionSettings,
  logger: Logger,
  metrics: MetricsRegistry,
): Promise<Discovery> {
  try {
    return await discoverLinks(resolveSource(job), {
      fetcher: deps.fetcher,
      logger: logger.child("discover"),
      metrics,
      fetchPolicy: settings.stepRetries.fetch,
      signal: deps.signal,
    });
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }
    logger.error("discovery_failed", { url: job.sourceUrl, error: errorMessage(error) });
    return { links: [], strategy: { kind: "passthrough" } };
  }
}

/**
 * Runs one ingestion job end to end. Invalid jobs and missing dataset names
 * are rejected before any network access; a failing candidate is recorded in
 * the outcomes and never stops the others. The manifest is uploaded only when
 * at least one candidate succeeded.
 */
export async function runIngestion(rawJob: unknown, deps: IngestionDeps): Promise<IngestionResult> {
  const now = deps.now ?? (() => new Date());
  const settings: IngestionSettings = { ...DEFAULT_INGESTION_SETTINGS, ...deps.settings };
  const metrics = deps.metrics ?? new MetricsRegistry();

  const job = validateJob(rawJob);
  const runId = deps.runId ?? createRunId(job.jobName, now());
  const logger = (deps.logger ?? new Logger({ component: "ingest", runId })).child("ingest");
  const datasetName = resolveDatasetName(job);
  const tracker = new RunTracker(runId, logger, deps.store);

  await tracker.start(job.jobName, now());
  logger.info("run_started", { jobName: job.jobName, sourceType: job.sourceType, url: job.sourceUrl, datasetName });

  try {
    throwIfCancelled(deps.signal);
    await tracker.enter("discovering");
    const discovery = await discover(job, deps, settings, logger, metrics);

    await tracker.enter("filtering");
    const selection = selectCandidates(discovery, job);
    metrics.incrementCounter("candidates_selected", selection.candidates.length);
    logger.info("candidates_selected", { count: selection.candidates.length, tier: selection.tier });

    await tracker.enter("processing");
    const context: CandidateContext = {
      bucket: job.destinationBucket,
      layout: new StorageLayout(job.destinationPath, datasetName, job.executionDate),
      downloader: deps.downloader ?? new Downloader(deps.fetcher),
      extractor: deps.extractor ?? new PdfParseTableExtractor({ logger: logger.child("extract") }),
      writer: deps.writer ?? new ParquetColumnarWriter(),
      objectStore: deps.objectStore,
      logger: logger.child("candidate"),
      metrics,
      workDir: settings.workDir,
      downloadPolicy: settings.stepRetries.download,
      signal: deps.signal,
    };

    const outcomes = await processSelection(selection.candidates, context, settings, deps.store, runId);
    throwIfCancelled(deps.signal);

    await tracker.enter("finalizing");
    const manifest = buildManifest(job.jobName, now(), outcomes);
    const manifestLocation = await uploadManifest(manifest, context, logger);

    await publishToSink(deps.sink, logger, "outcomes", (sink) => sink.publishOutcomes(runId, outcomes));
    if (manifestLocation) {
      await publishToSink(deps.sink, logger, "manifest", (sink) =>
        sink.publishManifest(runId, { manifest, location: manifestLocation, datasetName }),
      );
    }

    await tracker.enter("done");
    await tracker.finish("completed", "done", now(), { datasetName, manifestLocation });
    logger.info("run_completed", {
      succeeded: outcomes.filter((outcome) => outcome.status === "succeeded").length,
      failed: outcomes.filter((outcome) => outcome.status === "failed").length,
      manifestLocation,
    });

    return { runId, datasetName, manifest, manifestLocation, outcomes };
  } catch (error) {
    if (error instanceof CancelledError) {
      logger.warn("run_cancelled", { state: tracker.state });
      await tracker.finish("cancelled", "cancelled", now(), { datasetName, error: error.message });
    } else {
      logger.error("run_failed", { state: tracker.state, error: errorMessage(error) });
      await tracker.finish("failed", "failed", now(), { datasetName, error: errorMessage(error) });
    }
    throw error;
  }
}

async function processSelection(
  candidates: readonly Link[],
  context: CandidateContext,
  settings: IngestionSettings,
  store: PipelineStore | undefined,
  runId: string,
): Promise<CandidateOutcome[]> {
  const outcomes = new Array<CandidateOutcome | undefined>(candidates.length).fill(undefined);

  await processWithConcurrency(
    candidates,
    settings.candidateConcurrency,
    async (candidate, index) => {
      const outcome = await processCandidate(candidate, context);
      outcomes[index] = outcome;
      await store?.recordOutcome(runId, outcome);
    },
    context.signal,
  );

  return outcomes.filter((outcome): outcome is CandidateOutcome => outcome !== undefined);
}

async function uploadManifest(manifest: Manifest, context: CandidateContext, logger: Logger): Promise<string | undefined> {
  if (manifest.files.length === 0) {
    logger.warn("manifest_skipped", { reason: "no successful files" });
    return undefined;
  }

  const key = context.layout.manifestKey();
  try {
    const location = await context.objectStore.putBytes(
      context.bucket,
      serializeManifest(manifest),
      key,
      "application/json",
    );
    logger.info("manifest_uploaded", { location, files: manifest.files.length });
    return location;
  } catch (error) {
    logger.error("manifest_upload_failed", { key, error: errorMessage(error) });
    return undefined;
  }
}
