import { describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../src/core/errors";
import { validateJob } from "../src/job";
import {
  buildManifest,
  collectIndexUrls,
  processWithConcurrency,
  resolveDatasetName,
  resolveSource,
  selectCandidates,
  serializeManifest,
} from "../src/pipeline";
import type { CandidateOutcome, Link } from "../src/types";

function job(sourceType: string, sourceUrl: string, sourceParams: Record<string, unknown> = {}) {
  return validateJob({
    job_name: "test_job",
    source_type: sourceType,
    source_url: sourceUrl,
    destination_bucket: "lake-bucket",
    destination_path: "datalake/raw",
    execution_date: "2025-03-07",
    source_params: sourceParams,
  });
}

describe("resolveSource", () => {
  it("treats a generic pdf url as a direct download", () => {
    expect(resolveSource(job("generic", "https://a.example.org/relatorio.pdf"))).toEqual({
      kind: "direct",
      urls: ["https://a.example.org/relatorio.pdf"],
    });
  });

  it("crawls a viewer page whose path only contains .pdf", () => {
    const viewer = "https://a.example.org/arquivos/relatorio.pdf/view";
    expect(resolveSource(job("generic", viewer))).toEqual({
      kind: "html",
      pageUrl: viewer,
      strategy: { kind: "passthrough" },
    });
  });

  it("picks a strategy for generic pages from the host registry", () => {
    expect(resolveSource(job("generic", "https://www.gov.br/fnde/salario-educacao"))).toEqual({
      kind: "html",
      pageUrl: "https://www.gov.br/fnde/salario-educacao",
      strategy: { kind: "salario_educacao", hints: ["DistribuioMensalporUF"], expectedType: "pdf" },
    });
  });

  it("uses the named strategy for dedicated source types", () => {
    expect(resolveSource(job("fundeb_vaat", "https://a.example.org/page", { hints: "lista" }))).toEqual({
      kind: "html",
      pageUrl: "https://a.example.org/page",
      strategy: { kind: "fundeb_vaat", hints: ["lista"], expectedType: "pdf" },
    });
  });

  it("reads the url fields of a json index", () => {
    expect(resolveSource(job("json_index", "https://a.example.org/index.json", { url_fields: ["arquivo"] }))).toEqual({
      kind: "json_index",
      indexUrl: "https://a.example.org/index.json",
      fields: ["arquivo"],
    });
  });
});

describe("resolveDatasetName", () => {
  it("prefers the explicit dataset name", () => {
    expect(resolveDatasetName(job("pdf", "https://a.example.org/x.pdf", { dataset_name: "Meu_Dataset" }))).toBe(
      "meu_dataset",
    );
  });

  it("infers the name for generic sources", () => {
    expect(resolveDatasetName(job("generic", "https://www.gov.br/fnde/fundeb/vaat"))).toBe("fundeb_vaat");
  });

  it("requires it for every other source type", () => {
    expect(() => resolveDatasetName(job("salario_educacao", "https://a.example.org/page"))).toThrow(ConfigurationError);
  });
});

describe("collectIndexUrls", () => {
  it("unwraps common containers and keeps only http urls", () => {
    const payload = {
      data: [{ url: " https://a.example.org/1.csv " }, { url: 42 }, { link: "mailto:x@example.org" }, null],
    };
    expect(collectIndexUrls(payload, ["url", "link"])).toEqual(["https://a.example.org/1.csv"]);
  });

  it("accepts a bare array or a single record", () => {
    expect(collectIndexUrls([{ origem: "https://a.example.org/2.pdf" }], ["origem"])).toEqual([
      "https://a.example.org/2.pdf",
    ]);
    expect(collectIndexUrls({ url: "https://a.example.org/3.pdf" }, ["url"])).toEqual(["https://a.example.org/3.pdf"]);
  });
});

describe("selectCandidates", () => {
  const links: Link[] = [
    { url: "https://a.example.org/vaat/lista_1.pdf", text: "Lista 1" },
    { url: "https://a.example.org/vaat/lista_2.pdf", text: "Lista 2" },
    { url: "https://a.example.org/vaat/lista_3.pdf", text: "Lista 3" },
    { url: "https://a.example.org/sobre.html", text: "Sobre" },
  ];
  const strategy = { kind: "fundeb_vaat" as const, hints: ["vaat"], expectedType: "pdf" as const };

  it("caps the selection at max_files", () => {
    const selection = selectCandidates({ links, strategy }, job("fundeb_vaat", "https://a.example.org/", { max_files: 2 }));

    expect(selection).toEqual({
      candidates: [
        { url: "https://a.example.org/vaat/lista_1.pdf", text: "Lista 1" },
        { url: "https://a.example.org/vaat/lista_2.pdf", text: "Lista 2" },
      ],
      tier: "hints",
    });
  });

  it("applies the link text post-filter", () => {
    const selection = selectCandidates(
      { links, strategy },
      job("fundeb_vaat", "https://a.example.org/", { link_text_contains: "lista 3" }),
    );

    expect(selection.candidates.map((candidate) => candidate.url)).toEqual(["https://a.example.org/vaat/lista_3.pdf"]);
  });
});

describe("buildManifest", () => {
  it("lists the locations of successful candidates in order", () => {
    const metadata = { filename: "x.pdf", isPdf: true, linkText: "" };
    const outcomes: CandidateOutcome[] = [
      {
        status: "succeeded",
        url: "https://a.example.org/1.pdf",
        metadata,
        startedAt: "t0",
        finishedAt: "t1",
        locations: ["memory://b/s/1.pdf", "memory://b/r/1.pdf"],
        sha256: "a",
        byteCount: 1,
        tableCount: 0,
        usedFallback: true,
      },
      {
        status: "failed",
        url: "https://a.example.org/2.pdf",
        metadata,
        startedAt: "t0",
        finishedAt: "t1",
        step: "download",
        error: "HTTP 404",
      },
    ];

    const manifest = buildManifest("test_job", new Date("2025-03-07T12:00:00.000Z"), outcomes);

    expect(manifest).toEqual({
      job: "test_job",
      downloaded_at: "2025-03-07T12:00:00.000Z",
      files: ["memory://b/s/1.pdf", "memory://b/r/1.pdf"],
    });
    expect(JSON.parse(serializeManifest(manifest).toString("utf-8"))).toEqual(manifest);
  });
});

describe("processWithConcurrency", () => {
  it("never runs more than the limit at once", async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await processWithConcurrency([1, 2, 3, 4, 5], 2, async (item) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      seen.push(item);
      active -= 1;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it("stops taking work after a failure and rethrows it", async () => {
    const worker = vi.fn(async (item: number) => {
      if (item === 1) {
        throw new Error("boom");
      }
    });

    await expect(processWithConcurrency([1, 2, 3], 1, worker)).rejects.toThrow("boom");
    expect(worker).toHaveBeenCalledTimes(1);
  });
});
