import { z } from "zod";

export const SOURCE_TYPES = ["generic", "pdf", "fundeb_vaat", "salario_educacao", "file_list", "json_index"] as const;
export const ENVIRONMENTS = ["dev", "staging", "prod"] as const;

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function splitHints(value: string | string[] | undefined): string[] {
  const items = typeof value === "string" ? value.split(",") : (value ?? []);
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL");

export const sourceParamsSchema = z
  .object({
    dataset_name: z
      .string()
      .trim()
      .regex(/^[a-z0-9][a-z0-9_-]*$/i, "must contain only letters, digits, '_' or '-'")
      .optional(),
    max_files: z.number().int().positive().optional(),
    hints: z.union([z.array(z.string()), z.string()]).optional(),
    filename_contains: z.string().trim().min(1).optional(),
    link_text_contains: z.string().trim().min(1).optional(),
    urls: z.array(httpUrl).optional(),
    url_fields: z.array(z.string().trim().min(1)).optional(),
  })
  .passthrough()
  .transform((params) => ({
    datasetName: params.dataset_name?.toLowerCase(),
    maxFiles: params.max_files,
    hints: splitHints(params.hints),
    filenameContains: params.filename_contains,
    linkTextContains: params.link_text_contains,
    urls: params.urls ?? [],
    urlFields: params.url_fields ?? [],
  }));

export const jobSchema = z
  .object({
    job_name: z
      .string()
      .trim()
      .min(1)
      .regex(/^\S+$/, "must not contain whitespace")
      .transform((value) => value.toLowerCase()),
    environment: z.enum(ENVIRONMENTS).default("dev"),
    source_type: z.enum(SOURCE_TYPES),
    source_url: httpUrl,
    destination_bucket: z.string().trim().min(1),
    destination_path: z
      .string()
      .trim()
      .min(1)
      .transform((value) => value.replace(/^\/+|\/+$/g, "")),
    source_params: sourceParamsSchema.default({}),
    execution_date: z
      .string()
      .regex(ISO_DATE, "must be YYYY-MM-DD")
      .refine(isCalendarDate, "must be a calendar date")
      .default(() => new Date().toISOString().slice(0, 10)),
  })
  .superRefine((job, ctx) => {
    if (job.source_type === "file_list" && job.source_params.urls.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["source_params", "urls"],
        message: "file_list sources need at least one URL",
      });
    }
  });

export type JobInput = z.input<typeof jobSchema>;
export type SourceType = (typeof SOURCE_TYPES)[number];
export type Environment = (typeof ENVIRONMENTS)[number];
export type SourceParams = z.output<typeof sourceParamsSchema>;
