import { runStep, type StepRetryPolicy } from "../core/retry";
import type { Fetcher } from "../core/fetcher";
import { ConfigurationError, IngestionError } from "../core/errors";
import { extractLinks } from "../crawl/htmlParser";
import { normalizeUrl } from "../crawl/normalizer";
import { detectResourceType } from "../crawl/resourceType";
import { applyPostFilter, buildFilterStrategy, filterLinks, selectFilterStrategy } from "../filter";
import type { FilterHints, FilterStrategy, FilterTier } from "../filter";
import type { ValidatedJob } from "../job";
import { inferDatasetName } from "../naming/datasetName";
import type { Logger, MetricsRegistry } from "../observability";
import type { Link } from "../types";

export const DEFAULT_INDEX_URL_FIELDS: readonly string[] = ["origem_url", "origem", "url", "link"];
const INDEX_CONTAINERS = ["results", "data", "items"] as const;

export type SourcePlan =
  | { kind: "html"; pageUrl: string; strategy: FilterStrategy }
  | { kind: "direct"; urls: readonly string[] }
  | { kind: "json_index"; indexUrl: string; fields: readonly string[] };

export interface DiscoveryContext {
  fetcher: Fetcher;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchPolicy: StepRetryPolicy;
  signal?: AbortSignal;
}

export interface Discovery {
  links: Link[];
  strategy: FilterStrategy;
}

export interface CandidateSelection {
  candidates: Link[];
  tier: FilterTier;
}

function filterHints(job: ValidatedJob): FilterHints {
  return {
    hints: job.sourceParams.hints,
    filenameContains: job.sourceParams.filenameContains,
    linkTextContains: job.sourceParams.linkTextContains,
  };
}

export function resolveSource(job: ValidatedJob): SourcePlan {
  switch (job.sourceType) {
    case "generic":
      if (detectResourceType(job.sourceUrl) === "pdf") {
        return { kind: "direct", urls: [job.sourceUrl] };
      }
      return { kind: "html", pageUrl: job.sourceUrl, strategy: selectFilterStrategy(job.sourceUrl, filterHints(job)) };
    case "pdf":
      return { kind: "direct", urls: [job.sourceUrl] };
    case "fundeb_vaat":
    case "salario_educacao":
      return { kind: "html", pageUrl: job.sourceUrl, strategy: buildFilterStrategy(job.sourceType, filterHints(job)) };
    case "file_list":
      return { kind: "direct", urls: job.sourceParams.urls };
    case "json_index":
      return {
        kind: "json_index",
        indexUrl: job.sourceUrl,
        fields: job.sourceParams.urlFields.length > 0 ? job.sourceParams.urlFields : DEFAULT_INDEX_URL_FIELDS,
      };
  }
}

/**
 * Stable dataset name for the run. Only generic HTML discovery may derive one
 * from the source URL; every other kind has to name it explicitly.
 */
export function resolveDatasetName(job: ValidatedJob): string {
  if (job.sourceParams.datasetName) {
    return job.sourceParams.datasetName;
  }
  if (job.sourceType === "generic") {
    return inferDatasetName(job.sourceUrl, job.jobName);
  }
  throw new ConfigurationError(
    `source_params.dataset_name is required for source_type "${job.sourceType}" (job ${job.jobName})`,
  );
}

/** Walks a JSON index payload and collects the string values of `fields`, in document order. */
export function collectIndexUrls(payload: unknown, fields: readonly string[]): string[] {
  let records: unknown = payload;
  if (records && typeof records === "object" && !Array.isArray(records)) {
    for (const container of INDEX_CONTAINERS) {
      const nested: unknown = Reflect.get(records, container);
      if (Array.isArray(nested)) {
        records = nested;
        break;
      }
    }
  }

  const entries: unknown[] = Array.isArray(records) ? records : [records];
  const urls: string[] = [];
  for (const entry of entries) {
    if (!entry || typeof entry !== "object") {
      continue;
    }
    for (const field of fields) {
      const value: unknown = Reflect.get(entry, field);
      if (typeof value === "string" && /^https?:\/\//i.test(value.trim())) {
        urls.push(value.trim());
      }
    }
  }
  return urls;
}

async function fetchText(url: string, accept: string, context: DiscoveryContext): Promise<string> {
  const stopTimer = context.metrics.startTimer("fetch_ms");
  try {
    return await runStep(
      "fetch",
      context.fetchPolicy,
      () => context.fetcher.getText(url, { accept }, context.signal),
      context.logger,
      context.signal,
    );
  } finally {
    stopTimer();
  }
}

export async function discoverLinks(plan: SourcePlan, context: DiscoveryContext): Promise<Discovery> {
  switch (plan.kind) {
    case "direct":
      return {
        links: plan.urls.map((url) => ({ url: normalizeUrl(url), text: "" })),
        strategy: { kind: "passthrough" },
      };
    case "html": {
      const html = await fetchText(plan.pageUrl, "text/html,application/xhtml+xml,*/*;q=0.8", context);
      context.metrics.incrementCounter("pages_fetched");
      const links = extractLinks(html, plan.pageUrl);
      context.metrics.incrementCounter("links_discovered", links.length);
      context.logger.info("discover_page_parsed", { url: plan.pageUrl, links: links.length, strategy: plan.strategy.kind });
      return { links, strategy: plan.strategy };
    }
    case "json_index": {
      const body = await fetchText(plan.indexUrl, "application/json", context);
      context.metrics.incrementCounter("pages_fetched");
      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (error) {
        throw new IngestionError(`Index at ${plan.indexUrl} is not valid JSON`, { cause: error });
      }
      const links = collectIndexUrls(payload, plan.fields).map((url) => ({ url: normalizeUrl(url), text: "" }));
      context.metrics.incrementCounter("links_discovered", links.length);
      context.logger.info("discover_index_parsed", { url: plan.indexUrl, links: links.length });
      return { links, strategy: { kind: "passthrough" } };
    }
  }
}

/** Strategy filter, then the job's post-filter, then dedupe and the `max_files` cap. */
export function selectCandidates(discovery: Discovery, job: ValidatedJob): CandidateSelection {
  const filtered = filterLinks(discovery.strategy, discovery.links);
  const narrowed = applyPostFilter(filtered.urls, discovery.links, filterHints(job));

  const textByUrl = new Map<string, string>();
  for (const link of discovery.links) {
    if (!textByUrl.has(link.url)) {
      textByUrl.set(link.url, link.text);
    }
  }

  const unique = [...new Set(narrowed)];
  const capped = job.sourceParams.maxFiles !== undefined ? unique.slice(0, job.sourceParams.maxFiles) : unique;

  return {
    candidates: capped.map((url) => ({ url, text: textByUrl.get(url) ?? "" })),
    tier: filtered.tier,
  };
}
