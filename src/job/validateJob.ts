import type { ZodIssue } from "zod";
import { ValidationError } from "../core/errors";
import { jobSchema, type Environment, type SourceType } from "./schema";

export interface JobSourceParams {
  readonly datasetName?: string;
  readonly maxFiles?: number;
  readonly hints: readonly string[];
  readonly filenameContains?: string;
  readonly linkTextContains?: string;
  readonly urls: readonly string[];
  readonly urlFields: readonly string[];
}

export interface ValidatedJob {
  readonly jobName: string;
  readonly environment: Environment;
  readonly sourceType: SourceType;
  readonly sourceUrl: string;
  readonly destinationBucket: string;
  readonly destinationPath: string;
  readonly sourceParams: JobSourceParams;
  /** `YYYY-MM-DD`, UTC. */
  readonly executionDate: string;
}

export type SafeValidateResult = { ok: true; job: ValidatedJob } | { ok: false; error: ValidationError };

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}

export function safeValidateJob(raw: unknown): SafeValidateResult {
  const parsed = jobSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    return { ok: false, error: new ValidationError(`Invalid job: ${issues.join("; ")}`, issues) };
  }

  const { source_params: params } = parsed.data;
  const job: ValidatedJob = Object.freeze({
    jobName: parsed.data.job_name,
    environment: parsed.data.environment,
    sourceType: parsed.data.source_type,
    sourceUrl: parsed.data.source_url,
    destinationBucket: parsed.data.destination_bucket,
    destinationPath: parsed.data.destination_path,
    sourceParams: Object.freeze({
      ...params,
      hints: Object.freeze([...params.hints]),
      urls: Object.freeze([...params.urls]),
      urlFields: Object.freeze([...params.urlFields]),
    }),
    executionDate: parsed.data.execution_date,
  });

  return { ok: true, job };
}

export function validateJob(raw: unknown): ValidatedJob {
  const result = safeValidateJob(raw);
  if (!result.ok) {
    throw result.error;
  }
  return result.job;
}
