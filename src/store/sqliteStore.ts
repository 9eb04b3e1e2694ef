import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import type { PipelineStep } from "../core/errors";
import type { CandidateOutcome, RunState } from "../types";
import {
  toCandidateRecord,
  type CandidateRecord,
  type PipelineStore,
  type RunCompletion,
  type RunRecord,
  type RunStatus,
  type StoreStats,
} from "./types";

type RunRow = {
  runId: string;
  jobName: string;
  status: RunStatus;
  state: RunState;
  startedAt: string;
  finishedAt: string | null;
  datasetName: string | null;
  manifestLocation: string | null;
  error: string | null;
};

type CandidateRow = {
  runId: string;
  url: string;
  status: CandidateRecord["status"];
  step: PipelineStep | null;
  error: string | null;
  locations: string;
  sha256: string | null;
  byteCount: number | null;
  tableCount: number | null;
  startedAt: string;
  finishedAt: string;
};

type CountRow = { count: number };

const IN_MEMORY = ":memory:";

function toRunRecord(row: RunRow): RunRecord {
  return {
    runId: row.runId,
    jobName: row.jobName,
    status: row.status,
    state: row.state,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? undefined,
    datasetName: row.datasetName ?? undefined,
    manifestLocation: row.manifestLocation ?? undefined,
    error: row.error ?? undefined,
  };
}

function parseLocations(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
}

export class SqliteStore implements PipelineStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath === IN_MEMORY) {
      this.db = new Database(IN_MEMORY);
    } else {
      const absolutePath = path.resolve(dbPath);
      fs.mkdirSync(path.dirname(absolutePath), { recursive: true });
      this.db = new Database(absolutePath);
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async startRun(runId: string, jobName: string, startedAt: string): Promise<void> {
    this.db
      .prepare(
        `
        INSERT INTO runs (runId, jobName, status, state, startedAt)
        VALUES (@runId, @jobName, 'running', 'validating', @startedAt)
        ON CONFLICT(runId) DO UPDATE SET
          jobName = excluded.jobName,
          startedAt = excluded.startedAt,
          finishedAt = NULL,
          status = 'running',
          state = 'validating'
      `,
      )
      .run({
        runId,
        jobName,
        startedAt,
      });
  }

  async updateRunState(runId: string, state: RunState): Promise<void> {
    this.db.prepare("UPDATE runs SET state = @state WHERE runId = @runId").run({ runId, state });
  }

  async recordOutcome(runId: string, outcome: CandidateOutcome): Promise<void> {
    const record = toCandidateRecord(runId, outcome);
    this.db
      .prepare(
        `
        INSERT INTO candidates (
          runId, url, status, step, error, locations,
          sha256, byteCount, tableCount, startedAt, finishedAt
        )
        VALUES (
          @runId, @url, @status, @step, @error, @locations,
          @sha256, @byteCount, @tableCount, @startedAt, @finishedAt
        )
        ON CONFLICT(runId, url) DO UPDATE SET
          status = excluded.status,
          step = excluded.step,
          error = excluded.error,
          locations = excluded.locations,
          sha256 = excluded.sha256,
          byteCount = excluded.byteCount,
          tableCount = excluded.tableCount,
          startedAt = excluded.startedAt,
          finishedAt = excluded.finishedAt
      `,
      )
      .run({
        runId: record.runId,
        url: record.url,
        status: record.status,
        step: record.step ?? null,
        error: record.error ?? null,
        locations: JSON.stringify(record.locations),
        sha256: record.sha256 ?? null,
        byteCount: record.byteCount ?? null,
        tableCount: record.tableCount ?? null,
        startedAt: record.startedAt,
        finishedAt: record.finishedAt,
      });
  }

  async finishRun(runId: string, completion: RunCompletion): Promise<void> {
    this.db
      .prepare(
        `
        UPDATE runs
        SET
          status = @status,
          state = @state,
          finishedAt = @finishedAt,
          datasetName = @datasetName,
          manifestLocation = @manifestLocation,
          error = @error
        WHERE runId = @runId
      `,
      )
      .run({
        runId,
        status: completion.status,
        state: completion.state,
        finishedAt: completion.finishedAt,
        datasetName: completion.datasetName ?? null,
        manifestLocation: completion.manifestLocation ?? null,
        error: completion.error ?? null,
      });
  }

  async getRun(runId: string): Promise<RunRecord | undefined> {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE runId = ?").get(runId);
    return row ? toRunRecord(row) : undefined;
  }

  async listOutcomes(runId: string): Promise<CandidateRecord[]> {
    const rows = this.db
      .prepare<[string], CandidateRow>("SELECT * FROM candidates WHERE runId = ? ORDER BY rowid ASC")
      .all(runId);

    return rows.map((row) => ({
      runId: row.runId,
      url: row.url,
      status: row.status,
      step: row.step ?? undefined,
      error: row.error ?? undefined,
      locations: parseLocations(row.locations),
      sha256: row.sha256 ?? undefined,
      byteCount: row.byteCount ?? undefined,
      tableCount: row.tableCount ?? undefined,
      startedAt: row.startedAt,
      finishedAt: row.finishedAt,
    }));
  }

  async getStats(): Promise<StoreStats> {
    const lastRun = this.db.prepare<[], RunRow>("SELECT * FROM runs ORDER BY startedAt DESC LIMIT 1").get();

    return {
      totalRuns: this.countWhere("runs", "1 = 1"),
      runsCompleted: this.countWhere("runs", "status = 'completed'"),
      runsFailed: this.countWhere("runs", "status = 'failed'"),
      runsCancelled: this.countWhere("runs", "status = 'cancelled'"),
      candidatesSucceeded: this.countWhere("candidates", "status = 'succeeded'"),
      candidatesFailed: this.countWhere("candidates", "status = 'failed'"),
      lastRun: lastRun ? toRunRecord(lastRun) : undefined,
    };
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private countWhere(table: "runs" | "candidates", whereClause: string): number {
    const row = this.db.prepare<[], CountRow>(`SELECT COUNT(*) as count FROM ${table} WHERE ${whereClause}`).get();
    return row?.count ?? 0;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        runId TEXT PRIMARY KEY,
        jobName TEXT NOT NULL,
        status TEXT NOT NULL,
        state TEXT NOT NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NULL,
        datasetName TEXT NULL,
        manifestLocation TEXT NULL,
        error TEXT NULL
      );

      CREATE TABLE IF NOT EXISTS candidates (
        runId TEXT NOT NULL,
        url TEXT NOT NULL,
        status TEXT NOT NULL,
        step TEXT NULL,
        error TEXT NULL,
        locations TEXT NOT NULL DEFAULT '[]',
        sha256 TEXT NULL,
        byteCount INTEGER NULL,
        tableCount INTEGER NULL,
        startedAt TEXT NOT NULL,
        finishedAt TEXT NOT NULL,
        PRIMARY KEY (runId, url)
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started_at ON runs(startedAt);
      CREATE INDEX IF NOT EXISTS idx_candidates_status ON candidates(status);
    `);
  }
}
