import type { PipelineStep } from "../core/errors";
import type { CandidateOutcome, RunState } from "../types";

export type RunStatus = "running" | "completed" | "failed" | "cancelled";

export interface RunRecord {
  runId: string;
  jobName: string;
  status: RunStatus;
  state: RunState;
  startedAt: string;
  finishedAt?: string;
  datasetName?: string;
  manifestLocation?: string;
  error?: string;
}

export interface RunCompletion {
  status: Exclude<RunStatus, "running">;
  state: RunState;
  finishedAt: string;
  datasetName?: string;
  manifestLocation?: string;
  error?: string;
}

export interface CandidateRecord {
  runId: string;
  url: string;
  status: CandidateOutcome["status"];
  step?: PipelineStep;
  error?: string;
  locations: string[];
  sha256?: string;
  byteCount?: number;
  tableCount?: number;
  startedAt: string;
  finishedAt: string;
}

export interface StoreStats {
  totalRuns: number;
  runsCompleted: number;
  runsFailed: number;
  runsCancelled: number;
  candidatesSucceeded: number;
  candidatesFailed: number;
  lastRun?: RunRecord;
}

export interface PipelineStore {
  startRun(runId: string, jobName: string, startedAt: string): Promise<void>;
  updateRunState(runId: string, state: RunState): Promise<void>;
  recordOutcome(runId: string, outcome: CandidateOutcome): Promise<void>;
  finishRun(runId: string, completion: RunCompletion): Promise<void>;
  getRun(runId: string): Promise<RunRecord | undefined>;
  listOutcomes(runId: string): Promise<CandidateRecord[]>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}

export function toCandidateRecord(runId: string, outcome: CandidateOutcome): CandidateRecord {
  const base = { runId, url: outcome.url, startedAt: outcome.startedAt, finishedAt: outcome.finishedAt };
  if (outcome.status === "failed") {
    return { ...base, status: "failed", step: outcome.step, error: outcome.error, locations: [] };
  }
  return {
    ...base,
    status: "succeeded",
    locations: [...outcome.locations],
    sha256: outcome.sha256,
    byteCount: outcome.byteCount,
    tableCount: outcome.tableCount,
  };
}
