import { hostOf, pathOf } from "../crawl/urlParts";
import { buildFilterStrategy } from "./strategies";
import type { FilterHints, FilterKind, FilterStrategy } from "./types";

const HOST_REGISTRY: ReadonlyMap<string, FilterKind> = new Map([["www.gov.br", "salario_educacao"]]);

function pathOverride(path: string): FilterKind | undefined {
  return path.includes("vaat") || path.includes("/fundeb/") ? "fundeb_vaat" : undefined;
}

export function selectFilterKind(sourceUrl: string): FilterKind {
  const host = hostOf(sourceUrl);
  const override = pathOverride(pathOf(sourceUrl).toLowerCase());

  const exact = HOST_REGISTRY.get(host);
  if (exact) {
    return override ?? exact;
  }

  for (const [registered, kind] of HOST_REGISTRY) {
    if (host.endsWith(registered)) {
      return override ?? kind;
    }
  }

  return override ?? "passthrough";
}

export function selectFilterStrategy(sourceUrl: string, hints: FilterHints = {}): FilterStrategy {
  return buildFilterStrategy(selectFilterKind(sourceUrl), hints);
}
