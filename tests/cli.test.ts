import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { getHelpText, parseCliArgs, runCli } from "../src/cli";
import { loadConfig } from "../src/config";
import { runIngest, runValidate, type CommandContext } from "../src/core/commands";
import { Fetcher } from "../src/core/fetcher";
import { MetricsRegistry, silentLogger } from "../src/observability";
import { NoopSink } from "../src/sink";
import { MemoryObjectStore } from "../src/storage";
import { InMemoryStore } from "../src/store";
import { fakeResponse, makeTempDir, routedFetch } from "./helpers";

const validJob = {
  job_name: "salario_educacao_2025",
  source_type: "pdf",
  source_url: "https://files.example.org/distribuicao_2025.pdf",
  destination_bucket: "lake-bucket",
  destination_path: "datalake/raw",
  execution_date: "2025-03-07",
  source_params: { dataset_name: "salario_educacao" },
};

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.promises.rm(dir, { recursive: true, force: true });
});

async function writeJson(name: string, value: unknown): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.promises.writeFile(filePath, JSON.stringify(value));
  return filePath;
}

async function quietConfig(): Promise<string> {
  return writeJson("config.json", { storePath: "memory", sink: { type: "none" }, storage: { backend: "memory" } });
}

describe("parseCliArgs", () => {
  it("parses commands and options", () => {
    expect(parseCliArgs(["ingest", "--job", "jobs/a.json", "--config", "cfg.json", "--ignore-https-errors"])).toEqual({
      command: "ingest",
      jobPath: "jobs/a.json",
      configPath: "cfg.json",
      ignoreHttpsErrors: true,
    });
    expect(parseCliArgs(["status"])).toEqual({
      command: "status",
      jobPath: undefined,
      configPath: undefined,
      ignoreHttpsErrors: false,
    });
  });

  it("falls back to help for unknown commands or a missing job", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["ingest"])).toBe("help");
    expect(parseCliArgs(["validate", "--job", "--config"])).toBe("help");
    expect(parseCliArgs(["status", "--help"])).toBe("help");
  });

  it("documents every command", () => {
    expect(getHelpText()).toContain("ingest --job <path>");
    expect(getHelpText()).toContain("validate --job <path>");
  });
});

describe("runCli", () => {
  it("returns 0 for a valid job and 1 for an invalid one", async () => {
    const configPath = await quietConfig();
    const good = await writeJson("good.json", validJob);
    const bad = await writeJson("bad.json", { ...validJob, source_type: "ftp" });

    await expect(runCli(["validate", "--job", good, "--config", configPath])).resolves.toBe(0);
    await expect(runCli(["validate", "--job", bad, "--config", configPath])).resolves.toBe(1);
  });

  it("returns 1 when the job file is missing", async () => {
    const configPath = await quietConfig();

    await expect(runCli(["validate", "--job", path.join(dir, "missing.json"), "--config", configPath])).resolves.toBe(1);
  });

  it("returns 1 for a broken config file", async () => {
    const configPath = await writeJson("config.json", { storage: { backend: "ftp" } });

    await expect(runCli(["status", "--config", configPath])).resolves.toBe(1);
  });

  it("reports status from the store", async () => {
    await expect(runCli(["status", "--config", await quietConfig()])).resolves.toBe(0);
  });

  it("prints help", async () => {
    await expect(runCli(["--help"])).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(getHelpText());
  });
});

describe("commands", () => {
  function context(extra: Partial<CommandContext> = {}): CommandContext {
    const config = loadConfig(undefined, {});
    return {
      runId: "run_cli",
      config: {
        ...config,
        workDir: dir,
        stepRetries: { fetch: { retries: 0, delayMs: 0 }, download: { retries: 0, delayMs: 0 } },
      },
      store: new InMemoryStore(),
      logger: silentLogger(),
      metrics: new MetricsRegistry(),
      sink: new NoopSink(),
      ...extra,
    };
  }

  it("validates a job file", async () => {
    expect(await runValidate(context(), await writeJson("job.json", validJob))).toBe(true);
    expect(await runValidate(context(), await writeJson("job.json", { job_name: "x" }))).toBe(false);
  });

  it("runs an ingestion from a job file", async () => {
    const objectStore = new MemoryObjectStore();
    const store = new InMemoryStore();
    const fetcher = new Fetcher({
      fetchFn: routedFetch({
        "https://files.example.org/distribuicao_2025.pdf": () =>
          fakeResponse(Buffer.from("%PDF-1.4"), { contentType: "application/pdf" }),
      }),
      retries: 0,
    });
    const extractor = { extract: vi.fn(async () => []) };
    const ctx = context({ objectStore, store, fetcher, extractor });

    const result = await runIngest(ctx, await writeJson("job.json", validJob));

    expect(result.runId).toBe("run_cli");
    expect(result.manifestLocation).toBe(
      "memory://lake-bucket/datalake/raw/salario_educacao/data_captura=20250307/metadata.json",
    );
    expect(await store.getRun("run_cli")).toMatchObject({ status: "completed" });
  });
});
