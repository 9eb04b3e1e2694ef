import { hostOf, lastPathSegment, pathOf } from "./urlParts";

export type ResourceType = "html" | "pdf" | "csv" | "xlsx" | "json" | "zip" | "api" | "unknown";

const CONTENT_TYPE_RULES: ReadonlyArray<[ResourceType, readonly string[]]> = [
  ["html", ["text/html"]],
  ["pdf", ["application/pdf"]],
  ["csv", ["text/csv", "application/csv"]],
  ["json", ["application/json"]],
  ["zip", ["zip"]],
  ["xlsx", ["spreadsheet", "excel"]],
];

const EXTENSION_RULES: ReadonlyArray<[ResourceType, readonly string[]]> = [
  ["pdf", [".pdf"]],
  ["csv", [".csv"]],
  ["xlsx", [".xlsx", ".xls"]],
  ["zip", [".zip"]],
  ["json", [".json"]],
  ["html", [".html", ".htm"]],
];

function matchRules(value: string, rules: ReadonlyArray<[ResourceType, readonly string[]]>): ResourceType | undefined {
  for (const [type, needles] of rules) {
    if (needles.some((needle) => value.includes(needle))) {
      return type;
    }
  }
  return undefined;
}

// Only the final path segment counts: `/relatorio.pdf/view` is a viewer page.
function matchExtension(url: string): ResourceType | undefined {
  const segment = lastPathSegment(url).toLowerCase();
  for (const [type, extensions] of EXTENSION_RULES) {
    if (extensions.some((extension) => segment.endsWith(extension))) {
      return type;
    }
  }
  return undefined;
}

function looksLikeApi(url: string): boolean {
  if (hostOf(url).startsWith("api.")) {
    return true;
  }
  return pathOf(url)
    .toLowerCase()
    .split("/")
    .some((segment) => segment === "api");
}

export function detectResourceType(url: string, contentType?: string | null): ResourceType {
  if (contentType) {
    const fromHeader = matchRules(contentType.toLowerCase(), CONTENT_TYPE_RULES);
    if (fromHeader) {
      return fromHeader;
    }
  }

  const fromUrl = matchExtension(url);
  if (fromUrl) {
    return fromUrl;
  }

  return looksLikeApi(url) ? "api" : "unknown";
}

export function contentTypeFor(type: ResourceType): string {
  switch (type) {
    case "pdf":
      return "application/pdf";
    case "csv":
      return "text/csv";
    case "xlsx":
      return "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
    case "json":
    case "api":
      return "application/json";
    case "zip":
      return "application/zip";
    case "html":
      return "text/html";
    case "unknown":
      return "application/octet-stream";
  }
}
