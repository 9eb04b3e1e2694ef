import { load } from "cheerio";
import type { Link } from "../types";
import { normalizeUrl } from "./normalizer";

function sanitizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

function resolveHref(href: string, baseUrl: string): string | undefined {
  try {
    return new URL(href.trim(), baseUrl).toString();
  } catch {
    return undefined;
  }
}

/**
 * Collects every anchor of the document as an absolute, normalized URL.
 * Duplicates keep the position and text of their first occurrence; anchors
 * whose href cannot be resolved against `baseUrl` are left out.
 */
export function extractLinks(html: string, baseUrl: string): Link[] {
  const $ = load(html);
  const links: Link[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, element) => {
    const href = $(element).attr("href");
    if (!href) {
      return;
    }

    const absolute = resolveHref(href, baseUrl);
    if (!absolute) {
      return;
    }

    const url = normalizeUrl(absolute);
    if (seen.has(url)) {
      return;
    }

    seen.add(url);
    links.push({ url, text: sanitizeText($(element).text()) });
  });

  return links;
}
