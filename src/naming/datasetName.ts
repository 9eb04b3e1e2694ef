import { hostnameOf, pathOf } from "../crawl/urlParts";

export const GENERIC_DATASET_NAME = "generic_dataset";

// Portal boilerplate and language markers that never identify a dataset.
const STOPWORDS: ReadonlySet<string> = new Set([
  "pt",
  "br",
  "www",
  "gov",
  "gov.br",
  "acesso",
  "informacao",
  "acoes",
  "programas",
  "financiamento",
  "conteudo",
  "conteudos",
  "conteudo-static",
  "static",
  "api",
  "search",
  "a",
  "de",
  "do",
  "da",
]);

// Ordered: earlier entries win the first slots of the name.
const PRIORITY_TOKENS: readonly string[] = ["fundeb", "vaat", "salario-educacao", "salario", "fnde", "consultas"];

const LANGUAGE_SEGMENT = /(^|-)pt$|(^|-)br$/;

function underscored(value: string): string {
  return value.replace(/-/g, "_");
}

function priorityRank(token: string): number {
  const normalized = underscored(token);
  return PRIORITY_TOKENS.findIndex((candidate) => underscored(candidate) === normalized);
}

function cleanSegment(segment: string): string {
  return segment
    .replace(/\.[a-z0-9]{1,5}$/i, "")
    .replace(/\d+/g, "")
    .replace(/[^0-9a-zA-Z-]/g, "")
    .replace(/^[-_]+|[-_]+$/g, "")
    .toLowerCase();
}

function tokenFromSegment(segment: string): string | undefined {
  const cleaned = cleanSegment(segment);
  if (!cleaned || LANGUAGE_SEGMENT.test(cleaned)) {
    return undefined;
  }

  const meaningful = cleaned
    .split("-")
    .filter((sub) => sub.length > 1 && !STOPWORDS.has(sub));
  if (meaningful.length === 0) {
    return undefined;
  }

  return meaningful.length > 1 && cleaned.includes("-") ? cleaned : meaningful[0];
}

export function pathTokens(url: string): string[] {
  const tokens: string[] = [];
  for (const segment of pathOf(url).split("/")) {
    if (!segment) {
      continue;
    }
    const token = tokenFromSegment(segment);
    if (token && !tokens.includes(token)) {
      tokens.push(token);
    }
  }
  return tokens;
}

function nameFromTokens(tokens: string[]): string {
  const prioritized = tokens
    .filter((token) => priorityRank(token) >= 0)
    .sort((left, right) => priorityRank(left) - priorityRank(right));
  const rest = tokens.filter((token) => priorityRank(token) < 0);
  return [...prioritized, ...rest].slice(0, 2).map(underscored).join("_");
}

function nameFromHost(url: string): string {
  return hostnameOf(url)
    .replaceAll(".gov.br", "")
    .replaceAll(".gov", "")
    .replaceAll("www.", "")
    .replace(/[^a-z0-9_]+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/**
 * Derives the storage folder name for a dataset from its URL. Downstream
 * paths depend on the output, so the token rules are frozen: changing them
 * moves existing datasets.
 */
export function inferDatasetName(url: string, jobName?: string): string {
  const tokens = pathTokens(url);
  if (tokens.length > 0) {
    return nameFromTokens(tokens);
  }

  const host = nameFromHost(url);
  if (host) {
    return host;
  }

  const fromJob = (jobName ?? "").split("_")[0].toLowerCase();
  return fromJob || GENERIC_DATASET_NAME;
}
