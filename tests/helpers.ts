import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { vi } from "vitest";
import type { FetchInit, HttpResponseLike } from "../src/core/fetcher";
import { parquetFilename } from "../src/extract/columnarWriter";
import type { ColumnarWriter, ExtractedTable } from "../src/extract";

export interface FakeResponseInit {
  status?: number;
  url?: string;
  contentType?: string;
  headers?: Record<string, string>;
}

export function fakeResponse(body: string | Buffer, init: FakeResponseInit = {}): HttpResponseLike {
  const bytes = typeof body === "string" ? Buffer.from(body, "utf-8") : body;
  const status = init.status ?? 200;
  const headers = new Headers(init.headers ?? {});
  if (init.contentType) {
    headers.set("content-type", init.contentType);
  }

  return {
    status,
    ok: status >= 200 && status < 300,
    url: init.url ?? "",
    headers,
    body: Readable.from([bytes]),
    text: async () => bytes.toString("utf-8"),
  };
}

/** Fake response whose body records being released unread. */
export function cancellableResponse(body: string, init: FakeResponseInit = {}) {
  const bytes = Buffer.from(body, "utf-8");
  const cancel = vi.fn(async () => undefined);
  const response: HttpResponseLike = {
    ...fakeResponse(bytes, init),
    body: {
      cancel,
      async *[Symbol.asyncIterator]() {
        yield bytes;
      },
    },
  };
  return { response, cancel };
}

export type Route = () => HttpResponseLike;

/** Fake `fetchFn` answering from a URL table; unknown URLs get a 404. */
export function routedFetch(routes: Record<string, Route>) {
  return vi.fn(async (url: string, _init: FetchInit): Promise<HttpResponseLike> => {
    const route = routes[url];
    return route ? route() : fakeResponse("not found", { status: 404, url });
  });
}

export async function makeTempDir(prefix = "doc-ingest-test-"): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function table(rows: Array<Array<string | null>>, header?: string[]): ExtractedTable {
  const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
  return { pageNumber: 1, header, rows, width };
}

/** Writes placeholder files named the way the Parquet writer names them. */
export class StubColumnarWriter implements ColumnarWriter {
  async write(tables: readonly ExtractedTable[], outDir: string, baseName: string): Promise<string[]> {
    await fs.promises.mkdir(outDir, { recursive: true });
    const written: string[] = [];
    for (const [index] of tables.entries()) {
      const outPath = path.join(outDir, parquetFilename(baseName, index, tables.length));
      await fs.promises.writeFile(outPath, "PAR1");
      written.push(outPath);
    }
    return written;
  }
}
