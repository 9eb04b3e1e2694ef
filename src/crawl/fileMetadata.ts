import { lastPathSegment } from "./urlParts";

export interface FileMetadata {
  filename: string;
  year?: number;
  isPdf: boolean;
  linkText: string;
}

const YEAR_PATTERN = /(20\d{2})/;

export function findYear(value: string): number | undefined {
  const match = YEAR_PATTERN.exec(value);
  return match ? Number.parseInt(match[1], 10) : undefined;
}

export function parseFileMetadata(url: string, linkText = ""): FileMetadata {
  const filename = lastPathSegment(url);
  return {
    filename,
    year: findYear(filename),
    isPdf: filename.toLowerCase().endsWith(".pdf"),
    linkText: linkText.trim(),
  };
}
