import type { PipelineStep } from "../core/errors";
import type { FileMetadata } from "../crawl/fileMetadata";

export interface Link {
  url: string;
  text: string;
}

export interface DownloadRecord {
  localPath: string;
  sourceUrl: string;
  sha256: string;
  byteCount: number;
  httpStatus: number;
  contentType?: string;
}

export interface Manifest {
  job: string;
  downloaded_at: string;
  files: string[];
}

interface CandidateOutcomeBase {
  url: string;
  metadata: FileMetadata;
  startedAt: string;
  finishedAt: string;
}

export interface CandidateSucceeded extends CandidateOutcomeBase {
  status: "succeeded";
  locations: string[];
  sha256: string;
  byteCount: number;
  tableCount: number;
  usedFallback: boolean;
}

export interface CandidateFailed extends CandidateOutcomeBase {
  status: "failed";
  step: PipelineStep;
  error: string;
}

export type CandidateOutcome = CandidateSucceeded | CandidateFailed;

export type RunState =
  | "validating"
  | "discovering"
  | "filtering"
  | "processing"
  | "finalizing"
  | "done"
  | "failed"
  | "cancelled";
