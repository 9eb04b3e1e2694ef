import { detectResourceType, type ResourceType } from "../crawl/resourceType";
import { lastPathSegment, pathOf } from "../crawl/urlParts";
import type { Link } from "../types";
import type {
  FilterHints,
  FilterKind,
  FilterResult,
  FilterStrategy,
  FundebVaatStrategy,
  SalarioEducacaoStrategy,
} from "./types";

export const FUNDEB_VAAT_DEFAULT_HINTS: readonly string[] = ["vaat", "listadefinit"];
export const SALARIO_EDUCACAO_DEFAULT_HINT = "DistribuioMensalporUF";

function lowered(values: readonly string[]): string[] {
  return values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
}

function matchesHint(link: Link, hints: readonly string[]): boolean {
  const filename = lastPathSegment(link.url).toLowerCase();
  const text = link.text.toLowerCase();
  return hints.some((hint) => filename.includes(hint) || text.includes(hint));
}

/** A PDF sitting below a directory named after a hint, e.g. `/vaat/lista.pdf`. */
function isPdfUnderHintPath(link: Link, hints: readonly string[]): boolean {
  const path = pathOf(link.url).toLowerCase();
  if (!lastPathSegment(link.url).toLowerCase().endsWith(".pdf")) {
    return false;
  }
  const directory = path.slice(0, path.lastIndexOf("/") + 1);
  return hints.some((hint) => directory.includes(`/${hint}`));
}

function matchesHintRules(link: Link, hints: readonly string[]): boolean {
  return matchesHint(link, hints) || isPdfUnderHintPath(link, hints);
}

/**
 * Narrows by the strategy's own rules first; when those select nothing, falls
 * back to every link of the expected type, and finally to every link.
 */
function withFallback(primary: Link[], links: readonly Link[], expectedType: ResourceType): FilterResult {
  if (primary.length > 0) {
    return { urls: primary.map((link) => link.url), tier: "hints" };
  }

  const typed = links.filter((link) => detectResourceType(link.url) === expectedType);
  if (typed.length > 0) {
    return { urls: typed.map((link) => link.url), tier: "expected_type" };
  }

  return { urls: links.map((link) => link.url), tier: "all" };
}

function filterByHints(strategy: SalarioEducacaoStrategy | FundebVaatStrategy, links: readonly Link[]): FilterResult {
  const hints = lowered(strategy.hints);
  return withFallback(
    links.filter((link) => matchesHintRules(link, hints)),
    links,
    strategy.expectedType,
  );
}

/** Like `applyFilter`, also reporting which tier of the fallback chain produced the selection. */
export function filterLinks(strategy: FilterStrategy, links: readonly Link[]): FilterResult {
  switch (strategy.kind) {
    case "passthrough":
      return { urls: links.map((link) => link.url), tier: "all" };
    case "salario_educacao":
    case "fundeb_vaat":
      return filterByHints(strategy, links);
  }
}

export function applyFilter(strategy: FilterStrategy, links: readonly Link[]): string[] {
  return filterLinks(strategy, links).urls;
}

export function buildFilterStrategy(kind: FilterKind, hints: FilterHints = {}): FilterStrategy {
  switch (kind) {
    case "passthrough":
      return { kind };
    case "salario_educacao":
      return {
        kind,
        hints: hints.hints?.length ? hints.hints : [hints.filenameContains || SALARIO_EDUCACAO_DEFAULT_HINT],
        expectedType: "pdf",
      };
    case "fundeb_vaat":
      return {
        kind,
        hints: hints.hints?.length ? hints.hints : [...FUNDEB_VAAT_DEFAULT_HINTS],
        expectedType: "pdf",
      };
  }
}

/**
 * Optional narrowing from job parameters, applied after the strategy. A
 * filter that would empty the selection is ignored.
 */
export function applyPostFilter(selected: readonly string[], links: readonly Link[], hints: FilterHints): string[] {
  const filenameContains = hints.filenameContains?.toLowerCase() ?? "";
  const linkTextContains = hints.linkTextContains?.toLowerCase() ?? "";
  if ((!filenameContains && !linkTextContains) || selected.length === 0) {
    return [...selected];
  }

  const textByUrl = new Map(links.map((link) => [link.url, link.text.toLowerCase()]));
  const narrowed = selected.filter((url) => {
    if (filenameContains && url.toLowerCase().includes(filenameContains)) {
      return true;
    }
    return Boolean(linkTextContains) && (textByUrl.get(url) ?? "").includes(linkTextContains);
  });

  return narrowed.length > 0 ? narrowed : [...selected];
}
