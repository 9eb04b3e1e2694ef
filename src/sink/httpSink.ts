import { sleep } from "../core/retry";
import type { CandidateOutcome } from "../types";
import { BaseSink } from "./baseSink";
import type { ManifestPublication } from "./types";

type StageName = "outcomes" | "manifest";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSinkOptions {
  endpoint?: string;
  token?: string;
  fetchFn?: FetchLike;
  timeoutMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

class PermanentHttpSinkError extends Error {}

export class HttpSink extends BaseSink {
  private readonly endpoint?: string;
  private readonly token?: string;
  private readonly fetchFn: FetchLike;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: HttpSinkOptions = {}) {
    super();
    this.endpoint = options.endpoint;
    this.token = options.token;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
  }

  async publishOutcomes(runId: string, outcomes: CandidateOutcome[]): Promise<void> {
    if (outcomes.length === 0) {
      return;
    }
    await this.post("outcomes", runId, outcomes, `outcomes:${runId}:${outcomes.length}`);
  }

  async publishManifest(runId: string, publication: ManifestPublication): Promise<void> {
    await this.post("manifest", runId, publication, `manifest:${runId}`);
  }

  private async post(stage: StageName, runId: string, payload: unknown, idempotencyKey: string): Promise<void> {
    const endpoint = this.ensureConfigured("HTTP", this.endpoint);

    const body = JSON.stringify({
      stage,
      runId,
      sentAt: new Date().toISOString(),
      payload,
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      "Idempotency-Key": idempotencyKey,
    };

    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    let attempt = 0;
    while (true) {
      attempt += 1;
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        const response = await this.fetchFn(endpoint, {
          method: "POST",
          headers,
          body,
          signal: controller.signal,
        });

        if (response.ok) {
          return;
        }

        const responseText = await response.text();
        if (!isRetriableStatus(response.status)) {
          throw new PermanentHttpSinkError(`HTTP sink permanent error ${response.status}: ${responseText}`);
        }

        if (attempt > this.maxRetries) {
          throw new Error(`HTTP sink exhausted retries on status ${response.status}: ${responseText}`);
        }
      } catch (error) {
        if (error instanceof PermanentHttpSinkError) {
          throw error;
        }
        if (attempt > this.maxRetries) {
          throw error;
        }
      } finally {
        clearTimeout(timeout);
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
