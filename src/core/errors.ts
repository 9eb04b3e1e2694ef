export type PipelineStep = "validate" | "discover" | "filter" | "download" | "extract" | "upload" | "finalize";

export class IngestionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends IngestionError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class ConfigurationError extends IngestionError {}

export class NetworkError extends IngestionError {
  readonly url: string;
  readonly attempts: number;

  constructor(message: string, url: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.url = url;
    this.attempts = attempts;
  }
}

export class HttpStatusError extends NetworkError {
  readonly status: number;

  constructor(url: string, status: number, attempts = 1) {
    super(`HTTP ${status} while fetching ${url}`, url, attempts);
    this.status = status;
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

export class ExtractionError extends IngestionError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to extract tables from ${path}${detail}`, options);
    this.path = path;
  }
}

export class UploadError extends IngestionError {
  readonly key: string;

  constructor(uri: string, key: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Failed to upload ${uri}${detail}`, options);
    this.key = key;
  }
}

export class CancelledError extends IngestionError {
  constructor(message = "Ingestion cancelled") {
    super(message);
  }
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
