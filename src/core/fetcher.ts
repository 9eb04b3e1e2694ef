import { Agent, fetch as undiciFetch } from "undici";
import { CancelledError, HttpStatusError, NetworkError } from "./errors";
import { backoffDelay, sleep } from "./retry";

export const DEFAULT_USER_AGENTS: readonly string[] = [
  "Mozilla/5.0 (compatible; DocIngestBot/1.0; +https://example.org/bot)",
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
  "Mozilla/5.0 (X11; Linux x86_64; rv:125.0) Gecko/20100101 Firefox/125.0",
];

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_RETRY_AFTER_MS = 30_000;

export interface HttpHeadersLike {
  get(name: string): string | null;
}

export interface ResponseBodyLike extends AsyncIterable<Uint8Array> {
  cancel?(): Promise<void>;
}

export interface HttpResponseLike {
  readonly status: number;
  readonly ok: boolean;
  readonly url: string;
  readonly headers: HttpHeadersLike;
  readonly body: ResponseBodyLike | null;
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

export interface FetcherOptions {
  timeoutMs?: number;
  retries?: number;
  backoffMs?: number;
  userAgents?: readonly string[];
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
}

function createAgent(timeoutMs: number, ignoreHttpsErrors: boolean): Agent {
  return new Agent({
    keepAliveTimeout: 10_000,
    headersTimeout: timeoutMs,
    bodyTimeout: timeoutMs,
    connect: ignoreHttpsErrors ? { rejectUnauthorized: false } : undefined,
  });
}

function retryAfterMs(response: HttpResponseLike): number | undefined {
  const raw = response.headers.get("retry-after");
  if (!raw) {
    return undefined;
  }
  const seconds = Number.parseInt(raw, 10);
  if (!Number.isFinite(seconds) || seconds < 0) {
    return undefined;
  }
  return Math.min(seconds * 1000, MAX_RETRY_AFTER_MS);
}

/**
 * Pooled HTTP client for scraping. Only GETs are issued, so every retry is
 * idempotent; retries cover transport failures and the statuses in
 * `RETRY_STATUSES`. Any other status is handed back to the caller.
 */
export class Fetcher {
  readonly timeoutMs: number;
  readonly retries: number;
  private readonly backoffMs: number;
  private readonly userAgents: readonly string[];
  private readonly fetchFn: FetchLike;
  private readonly agent?: Agent;
  private nextUserAgentIndex = 0;

  constructor(options: FetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
    this.retries = options.retries ?? 3;
    this.backoffMs = options.backoffMs ?? 300;
    this.userAgents = options.userAgents && options.userAgents.length > 0 ? options.userAgents : DEFAULT_USER_AGENTS;

    if (options.fetchFn) {
      this.fetchFn = options.fetchFn;
    } else {
      const agent = createAgent(this.timeoutMs, options.ignoreHttpsErrors ?? false);
      this.agent = agent;
      this.fetchFn = (url, init) => undiciFetch(url, { ...init, dispatcher: agent, redirect: "follow" });
    }
  }

  get(url: string, headers?: Record<string, string>, signal?: AbortSignal): Promise<HttpResponseLike> {
    return this.request(url, { accept: "text/html,application/xhtml+xml,*/*;q=0.8", ...headers }, signal);
  }

  streamGet(url: string, headers?: Record<string, string>, signal?: AbortSignal): Promise<HttpResponseLike> {
    return this.request(url, { accept: "*/*", ...headers }, signal);
  }

  async getText(url: string, headers?: Record<string, string>, signal?: AbortSignal): Promise<string> {
    const response = await ensureOk(await this.get(url, headers, signal), url);
    return response.text();
  }

  async close(): Promise<void> {
    await this.agent?.close();
  }

  private nextUserAgent(): string {
    const userAgent = this.userAgents[this.nextUserAgentIndex % this.userAgents.length];
    this.nextUserAgentIndex += 1;
    return userAgent;
  }

  private async request(url: string, headers: Record<string, string>, signal?: AbortSignal): Promise<HttpResponseLike> {
    const maxAttempts = this.retries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener("abort", onAbort, { once: true });

      let response: HttpResponseLike;
      try {
        response = await this.fetchFn(url, {
          method: "GET",
          headers: { "user-agent": this.nextUserAgent(), ...headers },
          signal: controller.signal,
        });
      } catch (error) {
        if (signal?.aborted) {
          throw new CancelledError();
        }
        lastError = error;
        if (attempt < maxAttempts) {
          await sleep(backoffDelay(this.backoffMs, attempt), signal);
        }
        continue;
      } finally {
        clearTimeout(timeout);
        signal?.removeEventListener("abort", onAbort);
      }

      if (!RETRY_STATUSES.has(response.status)) {
        return response;
      }

      lastError = new HttpStatusError(url, response.status, attempt);
      await discardBody(response);
      if (attempt < maxAttempts) {
        await sleep(retryAfterMs(response) ?? backoffDelay(this.backoffMs, attempt), signal);
      }
    }

    if (lastError instanceof HttpStatusError) {
      throw new HttpStatusError(url, lastError.status, maxAttempts);
    }
    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    throw new NetworkError(`Request to ${url} failed after ${maxAttempts} attempts: ${detail}`, url, maxAttempts, {
      cause: lastError,
    });
  }
}

/** Releases the pooled connection behind a body that will not be read. */
export async function discardBody(response: HttpResponseLike): Promise<void> {
  await response.body?.cancel?.();
}

export async function ensureOk(response: HttpResponseLike, url = response.url): Promise<HttpResponseLike> {
  if (response.status < 200 || response.status >= 300) {
    await discardBody(response);
    throw new HttpStatusError(url, response.status);
  }
  return response;
}
