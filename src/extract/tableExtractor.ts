export type Cell = string | null;

export interface ExtractedTable {
  pageNumber: number;
  /** Applied only when its length matches `width`. */
  header?: string[];
  rows: Cell[][];
  width: number;
}

export interface TableExtractor {
  extract(pdfPath: string): Promise<ExtractedTable[]>;
}

export interface ColumnarWriter {
  write(tables: readonly ExtractedTable[], outDir: string, baseName: string): Promise<string[]>;
}
