export interface UrlParts {
  scheme?: string;
  authority?: string;
  path: string;
  query?: string;
  fragment?: string;
}

// RFC 3986, appendix B. Matches every string, so splitting never fails.
const URI_PATTERN = /^(?:([^:/?#]+):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#(.*))?$/s;

export function splitUrl(url: string): UrlParts {
  const match = URI_PATTERN.exec(url);
  if (!match) {
    return { path: url };
  }
  return {
    scheme: match[1],
    authority: match[2],
    path: match[3] ?? "",
    query: match[4],
    fragment: match[5],
  };
}

export function joinUrl(parts: UrlParts): string {
  let result = "";
  if (parts.scheme !== undefined) {
    result += `${parts.scheme}:`;
  }
  if (parts.authority !== undefined) {
    result += `//${parts.authority}`;
  }
  result += parts.path;
  if (parts.query) {
    result += `?${parts.query}`;
  }
  if (parts.fragment) {
    result += `#${parts.fragment}`;
  }
  return result;
}

export function hostOf(url: string): string {
  const authority = splitUrl(url).authority ?? "";
  const withoutUserInfo = authority.slice(authority.lastIndexOf("@") + 1);
  return withoutUserInfo.toLowerCase();
}

/** Host without its port; IPv6 literals keep their brackets. */
export function hostnameOf(url: string): string {
  return hostOf(url).replace(/:\d*$/, "");
}

export function pathOf(url: string): string {
  return splitUrl(url).path;
}

export function lastPathSegment(url: string): string {
  const segments = pathOf(url).split("/");
  return segments[segments.length - 1] ?? "";
}
