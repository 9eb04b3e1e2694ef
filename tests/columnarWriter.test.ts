import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ParquetColumnarWriter, parquetFilename, planColumns } from "../src/extract";
import { makeTempDir, table } from "./helpers";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.promises.rm(dir, { recursive: true, force: true })));
});

describe("planColumns", () => {
  it("uses the header when it matches the width", () => {
    expect(planColumns(table([["AC", "10"]], ["UF", "Valor (R$)"]))).toEqual(["UF", "Valor (R$)"]);
  });

  it("falls back to positional names for a mismatched header", () => {
    expect(planColumns(table([["jan", "10", "x"]], ["Mês", "Valor"]))).toEqual(["0", "1", "2"]);
  });

  it("fills blanks, dedupes repeats and replaces path separators", () => {
    expect(planColumns(table([["a", "b", "c", "d"]], ["Valor", "", "Valor", "Total.Geral, UF"]))).toEqual([
      "Valor",
      "1",
      "Valor_1",
      "Total_Geral_ UF",
    ]);
  });
});

describe("parquetFilename", () => {
  it("suffixes the table index only when there are several tables", () => {
    expect(parquetFilename("lista_2024", 0, 1)).toBe("lista_2024.parquet");
    expect(parquetFilename("lista_2024", 1, 2)).toBe("lista_2024__table1.parquet");
  });
});

describe("ParquetColumnarWriter", () => {
  it("writes one parquet file per table", async () => {
    const outDir = await makeTempDir();
    tempDirs.push(outDir);
    const writer = new ParquetColumnarWriter();

    const written = await writer.write(
      [
        table(
          [
            ["AC", "1.234,56"],
            ["AL", null],
          ],
          ["UF", "Valor"],
        ),
        table([["Total", "99"]]),
      ],
      outDir,
      "lista_2024",
    );

    expect(written).toEqual([
      path.join(outDir, "lista_2024__table0.parquet"),
      path.join(outDir, "lista_2024__table1.parquet"),
    ]);
    for (const file of written) {
      const bytes = await fs.promises.readFile(file);
      expect(bytes.subarray(0, 4).toString("ascii")).toBe("PAR1");
      expect(bytes.subarray(bytes.length - 4).toString("ascii")).toBe("PAR1");
    }
  });
});
