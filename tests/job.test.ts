import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/core/errors";
import { safeValidateJob, validateJob } from "../src/job";

const baseJob = {
  job_name: "Fundeb_Vaat_2025",
  source_type: "fundeb_vaat",
  source_url: "https://www.gov.br/fnde/fundeb/vaat",
  destination_bucket: "lake-bucket",
  destination_path: "/datalake/raw/",
  execution_date: "2025-03-07",
};

function issuesOf(raw: unknown): string[] {
  const result = safeValidateJob(raw);
  return result.ok ? [] : result.error.issues;
}

describe("validateJob", () => {
  it("normalizes a valid job", () => {
    const job = validateJob({
      ...baseJob,
      source_params: { dataset_name: "FUNDEB_VAAT", hints: "vaat, definitiva ,", max_files: 3 },
    });

    expect(job).toEqual({
      jobName: "fundeb_vaat_2025",
      environment: "dev",
      sourceType: "fundeb_vaat",
      sourceUrl: "https://www.gov.br/fnde/fundeb/vaat",
      destinationBucket: "lake-bucket",
      destinationPath: "datalake/raw",
      sourceParams: {
        datasetName: "fundeb_vaat",
        maxFiles: 3,
        hints: ["vaat", "definitiva"],
        filenameContains: undefined,
        linkTextContains: undefined,
        urls: [],
        urlFields: [],
      },
      executionDate: "2025-03-07",
    });
    expect(Object.isFrozen(job)).toBe(true);
    expect(Object.isFrozen(job.sourceParams.hints)).toBe(true);
  });

  it("defaults the execution date to today in UTC", () => {
    const { execution_date: _omitted, ...withoutDate } = baseJob;

    expect(validateJob(withoutDate).executionDate).toBe(new Date().toISOString().slice(0, 10));
  });

  it("throws a ValidationError naming every problem", () => {
    const error = (() => {
      try {
        validateJob({ ...baseJob, job_name: "has space", source_url: "ftp://example.org/x" });
        return undefined;
      } catch (caught) {
        return caught;
      }
    })();

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({ issues: ["job_name: must not contain whitespace", "source_url: must be an http(s) URL"] });
  });

  it("rejects missing required fields", () => {
    expect(issuesOf({ ...baseJob, destination_bucket: undefined })).toEqual(["destination_bucket: Required"]);
    expect(issuesOf(null)).toHaveLength(1);
  });

  it("rejects unknown source types and environments", () => {
    expect(issuesOf({ ...baseJob, source_type: "ftp" })[0]).toMatch(/^source_type: /);
    expect(issuesOf({ ...baseJob, environment: "qa" })[0]).toMatch(/^environment: /);
  });

  it("rejects impossible dates", () => {
    expect(issuesOf({ ...baseJob, execution_date: "2025-02-30" })).toEqual(["execution_date: must be a calendar date"]);
    expect(issuesOf({ ...baseJob, execution_date: "07/03/2025" })).toContain("execution_date: must be YYYY-MM-DD");
  });

  it("requires urls for file lists", () => {
    expect(issuesOf({ ...baseJob, source_type: "file_list" })).toEqual([
      "source_params.urls: file_list sources need at least one URL",
    ]);
    expect(
      validateJob({
        ...baseJob,
        source_type: "file_list",
        source_params: { urls: ["https://files.example.org/a.pdf"] },
      }).sourceParams.urls,
    ).toEqual(["https://files.example.org/a.pdf"]);
  });

  it("accepts unknown source parameters", () => {
    expect(safeValidateJob({ ...baseJob, source_params: { page_size: 50 } }).ok).toBe(true);
  });
});
