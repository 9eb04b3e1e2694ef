import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import { CancelledError, NetworkError, throwIfCancelled } from "../core/errors";
import { ensureOk, type Fetcher } from "../core/fetcher";
import { lastPathSegment } from "../crawl/urlParts";
import type { DownloadRecord } from "../types";

const WRITE_CHUNK_BYTES = 8 * 1024;

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Last path segment made filesystem safe, or a timestamped name when the URL has none. */
export function localFilename(url: string, now: () => number = Date.now): string {
  const segment = safeDecode(lastPathSegment(url))
    .replace(/[^\w.\-]+/g, "_")
    .replace(/^\.+/, "");
  return segment.length > 0 ? segment : `download-${now()}`;
}

class HashingCounter extends Transform {
  readonly hash = crypto.createHash("sha256");
  bytes = 0;

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null, data?: Buffer) => void): void {
    this.hash.update(chunk);
    this.bytes += chunk.length;
    callback(null, chunk);
  }
}

async function removeQuietly(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}

export class Downloader {
  private readonly fetcher: Fetcher;

  constructor(fetcher: Fetcher) {
    this.fetcher = fetcher;
  }

  /**
   * Streams `url` into `destDir` without buffering the body. The file only
   * appears under its final name once the whole body has been written; a
   * failed transfer leaves nothing behind.
   */
  async download(url: string, destDir: string, signal?: AbortSignal): Promise<DownloadRecord> {
    throwIfCancelled(signal);
    const response = await ensureOk(await this.fetcher.streamGet(url, undefined, signal), url);
    if (!response.body) {
      throw new NetworkError(`Empty response body from ${url}`, url, 1);
    }

    await fs.promises.mkdir(destDir, { recursive: true });
    const localPath = path.join(destDir, localFilename(url));
    const tempPath = `${localPath}.part`;
    const hasher = new HashingCounter();

    try {
      await pipeline(
        Readable.from(response.body),
        hasher,
        fs.createWriteStream(tempPath, { flags: "w", highWaterMark: WRITE_CHUNK_BYTES }),
        { signal },
      );
      await fs.promises.rename(tempPath, localPath);
    } catch (error) {
      await removeQuietly(tempPath);
      if (signal?.aborted) {
        throw new CancelledError();
      }
      if (error instanceof NetworkError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new NetworkError(`Download of ${url} failed: ${detail}`, url, 1, { cause: error });
    }

    return {
      localPath,
      sourceUrl: url,
      sha256: hasher.hash.digest("hex"),
      byteCount: hasher.bytes,
      httpStatus: response.status,
      contentType: response.headers.get("content-type") ?? undefined,
    };
  }
}
