import type { CandidateOutcome, RunState } from "../types";
import {
  toCandidateRecord,
  type CandidateRecord,
  type PipelineStore,
  type RunCompletion,
  type RunRecord,
  type StoreStats,
} from "./types";

export class InMemoryStore implements PipelineStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly outcomes: CandidateRecord[] = [];

  async startRun(runId: string, jobName: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { runId, jobName, status: "running", state: "validating", startedAt });
  }

  async updateRunState(runId: string, state: RunState): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, state });
    }
  }

  async recordOutcome(runId: string, outcome: CandidateOutcome): Promise<void> {
    const record = toCandidateRecord(runId, outcome);
    const existing = this.outcomes.findIndex((item) => item.runId === runId && item.url === record.url);
    if (existing >= 0) {
      this.outcomes[existing] = record;
    } else {
      this.outcomes.push(record);
    }
  }

  async finishRun(runId: string, completion: RunCompletion): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, ...completion });
    }
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    const run = this.runs.get(runId);
    return run ? { ...run } : undefined;
  }

  async listOutcomes(runId: string): Promise<CandidateRecord[]> {
    return this.outcomes.filter((outcome) => outcome.runId === runId).map((outcome) => ({ ...outcome }));
  }

  async getStats(): Promise<StoreStats> {
    const runs = [...this.runs.values()];
    const lastRun = runs.reduce<RunRecord | undefined>(
      (latest, run) => (!latest || run.startedAt >= latest.startedAt ? run : latest),
      undefined,
    );

    return {
      totalRuns: runs.length,
      runsCompleted: runs.filter((run) => run.status === "completed").length,
      runsFailed: runs.filter((run) => run.status === "failed").length,
      runsCancelled: runs.filter((run) => run.status === "cancelled").length,
      candidatesSucceeded: this.outcomes.filter((outcome) => outcome.status === "succeeded").length,
      candidatesFailed: this.outcomes.filter((outcome) => outcome.status === "failed").length,
      lastRun: lastRun ? { ...lastRun } : undefined,
    };
  }

  async close(): Promise<void> {
    return;
  }
}
