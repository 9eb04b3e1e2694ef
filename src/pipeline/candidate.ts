import fs from "node:fs";
import path from "node:path";
import { CancelledError, ExtractionError, type PipelineStep } from "../core/errors";
import { runStep, type StepRetryPolicy } from "../core/retry";
import { parseFileMetadata } from "../crawl/fileMetadata";
import { contentTypeFor, detectResourceType } from "../crawl/resourceType";
import type { Downloader } from "../download/downloader";
import type { ColumnarWriter, ExtractedTable, TableExtractor } from "../extract";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { ObjectStore } from "../storage";
import type { StorageLayout } from "../storage/layout";
import type { CandidateOutcome, DownloadRecord, Link } from "../types";

const PARQUET_CONTENT_TYPE = "application/vnd.apache.parquet";

export interface CandidateContext {
  bucket: string;
  layout: StorageLayout;
  downloader: Downloader;
  extractor: TableExtractor;
  writer: ColumnarWriter;
  objectStore: ObjectStore;
  logger: Logger;
  metrics: MetricsRegistry;
  workDir: string;
  downloadPolicy: StepRetryPolicy;
  signal?: AbortSignal;
}

interface RawUploads {
  locations: string[];
  tableCount: number;
  usedFallback: boolean;
}

class StepFailure extends Error {
  readonly step: PipelineStep;

  constructor(step: PipelineStep, cause: unknown) {
    super(errorMessage(cause), { cause });
    this.step = step;
  }
}

async function inStep<T>(step: PipelineStep, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof CancelledError) {
      throw error;
    }
    throw new StepFailure(step, error);
  }
}

function isPdf(record: DownloadRecord, filename: string): boolean {
  return detectResourceType(record.sourceUrl, record.contentType) === "pdf" || filename.toLowerCase().endsWith(".pdf");
}

async function removeWorkDir(dir: string, logger: Logger, url: string): Promise<void> {
  try {
    await fs.promises.rm(dir, { recursive: true, force: true });
  } catch (error) {
    logger.warn("candidate_cleanup_failed", { url, path: dir, error: errorMessage(error) });
  }
}

async function extractTables(localPath: string, context: CandidateContext, url: string): Promise<ExtractedTable[]> {
  const stopTimer = context.metrics.startTimer("extract_ms");
  try {
    const tables = await context.extractor.extract(localPath);
    context.metrics.incrementCounter("tables_extracted", tables.length);
    return tables;
  } catch (error) {
    if (!(error instanceof ExtractionError)) {
      throw error;
    }
    context.logger.warn("extract_failed_fallback", { url, error: error.message });
    return [];
  } finally {
    stopTimer();
  }
}

async function upload(context: CandidateContext, localPath: string, key: string, contentType: string): Promise<string> {
  const stopTimer = context.metrics.startTimer("upload_ms");
  try {
    const uri = await context.objectStore.putFile(context.bucket, localPath, key, contentType);
    context.metrics.incrementCounter("uploads_ok");
    return uri;
  } catch (error) {
    context.metrics.incrementCounter("uploads_failed");
    throw error;
  } finally {
    stopTimer();
  }
}

async function uploadPdfOutputs(
  record: DownloadRecord,
  filename: string,
  tempDir: string,
  context: CandidateContext,
): Promise<RawUploads> {
  const tables = await inStep("extract", () => extractTables(record.localPath, context, record.sourceUrl));

  if (tables.length > 0) {
    const baseName = path.parse(filename).name;
    const parquetPaths = await inStep("extract", () =>
      context.writer.write(tables, path.join(tempDir, "parquet"), baseName),
    );
    const locations = await inStep("upload", async () => {
      const uris: string[] = [];
      for (const parquetPath of parquetPaths) {
        const key = context.layout.rawKey(filename, path.basename(parquetPath), true);
        uris.push(await upload(context, parquetPath, key, PARQUET_CONTENT_TYPE));
      }
      return uris;
    });
    return { locations, tableCount: tables.length, usedFallback: false };
  }

  const location = await inStep("upload", () =>
    upload(context, record.localPath, context.layout.rawKey(filename, filename, false), contentTypeFor("pdf")),
  );
  return { locations: [location], tableCount: 0, usedFallback: true };
}

/**
 * Downloads one candidate into its own temporary directory and publishes it:
 * the original goes to staging first, then either its tables as Parquet or
 * the original itself goes to raw. Failures become a `failed` outcome tagged
 * with the step that broke; cancellation propagates.
 */
export async function processCandidate(candidate: Link, context: CandidateContext): Promise<CandidateOutcome> {
  const startedAt = new Date().toISOString();
  const metadata = parseFileMetadata(candidate.url, candidate.text);
  const logger = context.logger;

  let tempDir: string | undefined;

  try {
    const candidateDir = await inStep("download", async () => {
      await fs.promises.mkdir(context.workDir, { recursive: true });
      return fs.promises.mkdtemp(path.join(context.workDir, "candidate-"));
    });
    tempDir = candidateDir;

    const record = await inStep("download", async () => {
      const stopTimer = context.metrics.startTimer("download_ms");
      try {
        const downloaded = await runStep(
          "download",
          context.downloadPolicy,
          () => context.downloader.download(candidate.url, candidateDir, context.signal),
          logger,
          context.signal,
        );
        context.metrics.incrementCounter("downloads_ok");
        return downloaded;
      } catch (error) {
        context.metrics.incrementCounter("downloads_failed");
        throw error;
      } finally {
        stopTimer();
      }
    });
    logger.info("candidate_downloaded", { url: candidate.url, bytes: record.byteCount, sha256: record.sha256 });

    const filename = path.basename(record.localPath);
    const pdf = isPdf(record, filename);
    const contentType = pdf ? contentTypeFor("pdf") : (record.contentType ?? "application/octet-stream");

    const stagingUri = await inStep("upload", () =>
      upload(context, record.localPath, context.layout.stagingKey(filename), contentType),
    );

    const raw = pdf
      ? await uploadPdfOutputs(record, filename, candidateDir, context)
      : {
          locations: [
            await inStep("upload", () =>
              upload(context, record.localPath, context.layout.rawKey(filename, filename, false), contentType),
            ),
          ],
          tableCount: 0,
          usedFallback: false,
        };

    logger.info("candidate_succeeded", {
      url: candidate.url,
      tables: raw.tableCount,
      usedFallback: raw.usedFallback,
      uploads: raw.locations.length + 1,
    });

    return {
      status: "succeeded",
      url: candidate.url,
      metadata,
      startedAt,
      finishedAt: new Date().toISOString(),
      locations: [stagingUri, ...raw.locations],
      sha256: record.sha256,
      byteCount: record.byteCount,
      tableCount: raw.tableCount,
      usedFallback: raw.usedFallback,
    };
  } catch (error) {
    if (!(error instanceof StepFailure)) {
      throw error;
    }
    context.metrics.incrementCounter("candidates_failed");
    logger.error("candidate_failed", { url: candidate.url, step: error.step, error: error.message });
    return {
      status: "failed",
      url: candidate.url,
      metadata,
      startedAt,
      finishedAt: new Date().toISOString(),
      step: error.step,
      error: error.message,
    };
  } finally {
    if (tempDir) {
      await removeWorkDir(tempDir, logger, candidate.url);
    }
  }
}
