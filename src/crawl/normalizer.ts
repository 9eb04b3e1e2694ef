import { joinUrl, splitUrl } from "./urlParts";

export const DEFAULT_REMOVE_PARAMS: ReadonlySet<string> = new Set([
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "utm_term",
  "utm_content",
  "fbclid",
]);

export interface NormalizeOptions {
  /** Extra parameters to strip on top of `DEFAULT_REMOVE_PARAMS`. */
  removeParams?: Iterable<string>;
  stripFragment?: boolean;
}

/**
 * Removes tracking parameters and, unless disabled, the fragment. Remaining
 * query parameters keep their order and are re-encoded as form data, which
 * makes the result a fixed point: normalizing it again yields the same string.
 */
export function normalizeUrl(url: string, options: NormalizeOptions = {}): string {
  const remove = new Set([...DEFAULT_REMOVE_PARAMS, ...(options.removeParams ?? [])]);
  const stripFragment = options.stripFragment ?? true;
  const parts = splitUrl(url);

  const kept = new URLSearchParams();
  for (const [key, value] of new URLSearchParams(parts.query ?? "")) {
    if (!remove.has(key)) {
      kept.append(key, value);
    }
  }

  return joinUrl({
    ...parts,
    query: kept.toString(),
    fragment: stripFragment ? undefined : parts.fragment,
  });
}
