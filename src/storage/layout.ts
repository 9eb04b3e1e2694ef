import { findYear } from "../crawl/fileMetadata";

export interface CaptureDate {
  /** `YYYYMMDD` */
  compact: string;
  year: string;
  month: string;
}

const EXECUTION_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function captureDate(executionDate: string): CaptureDate {
  const match = EXECUTION_DATE.exec(executionDate);
  if (!match) {
    throw new RangeError(`Invalid execution date: ${executionDate}`);
  }
  const [, year, month, day] = match;
  return { compact: `${year}${month}${day}`, year, month };
}

export function joinKey(...parts: string[]): string {
  return parts
    .flatMap((part) => part.split("/"))
    .filter((segment) => segment.length > 0)
    .join("/");
}

export function datasetPrefix(prefix: string, datasetName: string): string {
  return joinKey(prefix, datasetName);
}

/** `datalake/raw/fnde` becomes `datalake/staging/fnde`; a prefix without a `raw` segment gains a trailing `staging`. */
export function stagingPrefix(prefix: string): string {
  const segments = joinKey(prefix).split("/").filter((segment) => segment.length > 0);
  if (!segments.includes("raw")) {
    return joinKey(...segments, "staging");
  }
  return segments.map((segment) => (segment === "raw" ? "staging" : segment)).join("/");
}

export function partitionYear(filename: string, capture: CaptureDate): string {
  const year = findYear(filename);
  return year === undefined ? capture.year : String(year);
}

export class StorageLayout {
  readonly datasetPrefix: string;
  readonly stagingPrefix: string;
  private readonly capture: CaptureDate;

  constructor(destinationPath: string, datasetName: string, executionDate: string) {
    this.datasetPrefix = datasetPrefix(destinationPath, datasetName);
    this.stagingPrefix = stagingPrefix(this.datasetPrefix);
    this.capture = captureDate(executionDate);
  }

  stagingKey(filename: string): string {
    return joinKey(
      this.stagingPrefix,
      `data_captura=${this.capture.compact}`,
      `year=${partitionYear(filename, this.capture)}`,
      filename,
    );
  }

  /**
   * Raw key for a file derived from `sourceFilename`. Parquet outputs are
   * partitioned by month as well; the original-file fallback is not.
   */
  rawKey(sourceFilename: string, filename: string, withMonth: boolean): string {
    const parts = [
      this.datasetPrefix,
      `data_captura=${this.capture.compact}`,
      `year=${partitionYear(sourceFilename, this.capture)}`,
    ];
    if (withMonth) {
      parts.push(`month=${this.capture.month}`);
    }
    return joinKey(...parts, filename);
  }

  manifestKey(): string {
    return joinKey(this.datasetPrefix, `data_captura=${this.capture.compact}`, "metadata.json");
  }
}
