import fs from "node:fs";
import { PDFParse } from "pdf-parse";
import { ExtractionError } from "../core/errors";
import { errorMessage, type Logger } from "../observability";
import type { Cell, ExtractedTable, TableExtractor } from "./tableExtractor";

interface ParserLike {
  getInfo(): Promise<{ total: number }>;
  getTable(params: { partial: number[] }): Promise<{
    pages: Array<{
      num: number;
      tables: string[][][];
    }>;
  }>;
  destroy(): Promise<void>;
}

interface PdfParseTableExtractorDeps {
  logger: Logger;
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

function toCell(value: string | null | undefined): Cell {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.replace(/\s+/g, " ").trim();
  return trimmed.length > 0 ? trimmed : null;
}

function isEmptyRow(row: readonly Cell[]): boolean {
  return row.every((cell) => cell === null);
}

function widthOf(rows: readonly Cell[][]): number {
  return rows.reduce((max, row) => Math.max(max, row.length), 0);
}

/**
 * Builds the document's tables in page order. Only the first table of the
 * document offers its first row as a header; that row is promoted when its
 * length equals the width of the rows below it and kept as data otherwise.
 * A blank first row means the table has no header.
 */
export function buildTables(pages: ReadonlyArray<{ num: number; tables: string[][][] }>): ExtractedTable[] {
  const tables: ExtractedTable[] = [];

  for (const page of pages) {
    for (const raw of page.tables) {
      const cells = raw.map((row) => row.map(toCell));
      const rows = cells.filter((row) => !isEmptyRow(row));
      if (rows.length === 0) {
        continue;
      }

      const [candidate, ...below] = cells;
      if (tables.length === 0 && !isEmptyRow(candidate)) {
        const data = below.filter((row) => !isEmptyRow(row));
        const width = widthOf(data);
        if (width > 0 && candidate.length === width) {
          tables.push({
            pageNumber: page.num,
            header: candidate.map((cell) => cell ?? ""),
            rows: data,
            width,
          });
          continue;
        }
      }

      tables.push({ pageNumber: page.num, rows, width: widthOf(rows) });
    }
  }

  return tables;
}

export class PdfParseTableExtractor implements TableExtractor {
  private readonly logger: Logger;
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(deps: PdfParseTableExtractorDeps) {
    this.logger = deps.logger;
    this.parserFactory =
      deps.parserFactory ??
      ((data) =>
        new PDFParse({
          data,
        }));
    this.readFile = deps.readFile ?? fs.promises.readFile;
  }

  async extract(pdfPath: string): Promise<ExtractedTable[]> {
    let parser: ParserLike;
    let pageCount: number;
    try {
      parser = this.parserFactory(await this.readFile(pdfPath));
    } catch (error) {
      throw new ExtractionError(pdfPath, { cause: error });
    }

    try {
      try {
        pageCount = (await parser.getInfo()).total;
      } catch (error) {
        throw new ExtractionError(pdfPath, { cause: error });
      }

      const pages: Array<{ num: number; tables: string[][][] }> = [];
      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber += 1) {
        try {
          const result = await parser.getTable({ partial: [pageNumber] });
          pages.push(...result.pages);
        } catch (error) {
          this.logger.warn("extract_page_failed", { path: pdfPath, page: pageNumber, error: errorMessage(error) });
        }
      }

      const tables = buildTables(pages);
      this.logger.debug("extract_document_done", { path: pdfPath, pageCount, tableCount: tables.length });
      return tables;
    } finally {
      await parser.destroy().catch((error: unknown) => {
        this.logger.debug("extract_parser_destroy_failed", { path: pdfPath, error: errorMessage(error) });
      });
    }
  }
}
