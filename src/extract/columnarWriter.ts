import fs from "node:fs";
import path from "node:path";
import { ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import type { ColumnarWriter, ExtractedTable } from "./tableExtractor";

function columnName(raw: string | undefined): string {
  // Parquet field paths are joined on these characters.
  return (raw ?? "").replace(/[.,]/g, "_").replace(/\s+/g, " ").trim();
}

/**
 * Column names for a table: the header when present, otherwise positional
 * indices. Blank names become their index and repeats get a numeric suffix.
 */
export function planColumns(table: ExtractedTable): string[] {
  const header = table.header && table.header.length === table.width ? table.header : undefined;
  const used = new Set<string>();

  return Array.from({ length: table.width }, (_, index) => {
    const base = columnName(header?.[index]) || String(index);
    let name = base;
    for (let suffix = 1; used.has(name); suffix += 1) {
      name = `${base}_${suffix}`;
    }
    used.add(name);
    return name;
  });
}

export function parquetFilename(baseName: string, index: number, total: number): string {
  return total > 1 ? `${baseName}__table${index}.parquet` : `${baseName}.parquet`;
}

export class ParquetColumnarWriter implements ColumnarWriter {
  async write(tables: readonly ExtractedTable[], outDir: string, baseName: string): Promise<string[]> {
    await fs.promises.mkdir(outDir, { recursive: true });
    const written: string[] = [];

    for (const [index, table] of tables.entries()) {
      const outPath = path.join(outDir, parquetFilename(baseName, index, tables.length));
      await this.writeTable(table, outPath);
      written.push(outPath);
    }

    return written;
  }

  private async writeTable(table: ExtractedTable, outPath: string): Promise<void> {
    const columns = planColumns(table);
    const schema = new ParquetSchema(
      Object.fromEntries(columns.map((name) => [name, { type: "UTF8" as const, optional: true }])),
    );

    const writer = await ParquetWriter.openFile(schema, outPath);
    try {
      for (const row of table.rows) {
        const record: Record<string, string> = {};
        columns.forEach((name, index) => {
          const cell = row[index];
          if (cell !== null && cell !== undefined) {
            record[name] = cell;
          }
        });
        await writer.appendRow(record);
      }
    } finally {
      await writer.close();
    }
  }
}
