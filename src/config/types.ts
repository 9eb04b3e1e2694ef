import type { StepRetryPolicy } from "../core/retry";

export type StorageBackend = "s3" | "local" | "memory";
export type SinkType = "local_jsonl" | "http" | "sqs" | "none";

export interface StorageConfig {
  backend: StorageBackend;
  localRoot: string;
  s3Region?: string;
  s3Endpoint?: string;
  s3ForcePathStyle: boolean;
}

export interface SinkConfig {
  type: SinkType;
  outputDir: string;
  httpEndpoint?: string;
  httpToken?: string;
  sqsQueueUrl?: string;
}

export interface StepRetryConfig {
  fetch: StepRetryPolicy;
  download: StepRetryPolicy;
}

export interface AppConfig {
  requestTimeoutMs: number;
  fetchRetries: number;
  fetchBackoffMs: number;
  ignoreHttpsErrors: boolean;
  userAgents: string[];
  candidateConcurrency: number;
  workDir: string;
  storePath: string;
  storage: StorageConfig;
  sink: SinkConfig;
  stepRetries: StepRetryConfig;
}
