import fs from "node:fs";
import path from "node:path";
import { PutObjectCommand } from "@aws-sdk/client-s3";
import { afterEach, describe, expect, it } from "vitest";
import { UploadError } from "../src/core/errors";
import {
  LocalObjectStore,
  MemoryObjectStore,
  S3ObjectStore,
  StorageLayout,
  captureDate,
  createObjectStore,
  joinKey,
  stagingPrefix,
} from "../src/storage";
import { makeTempDir } from "./helpers";

const tempDirs: string[] = [];

async function tempDir(): Promise<string> {
  const dir = await makeTempDir();
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.promises.rm(dir, { recursive: true, force: true })));
});

describe("StorageLayout", () => {
  const layout = new StorageLayout("datalake/raw", "fundeb_vaat", "2025-03-07");

  it("builds staging keys partitioned by capture date and file year", () => {
    expect(layout.stagingKey("lista_2024.pdf")).toBe(
      "datalake/staging/fundeb_vaat/data_captura=20250307/year=2024/lista_2024.pdf",
    );
  });

  it("uses the capture year when the filename has none", () => {
    expect(layout.stagingKey("lista.pdf")).toBe("datalake/staging/fundeb_vaat/data_captura=20250307/year=2025/lista.pdf");
  });

  it("partitions parquet outputs by month and fallbacks without it", () => {
    expect(layout.rawKey("lista_2024.pdf", "lista_2024.parquet", true)).toBe(
      "datalake/raw/fundeb_vaat/data_captura=20250307/year=2024/month=03/lista_2024.parquet",
    );
    expect(layout.rawKey("lista_2024.pdf", "lista_2024.pdf", false)).toBe(
      "datalake/raw/fundeb_vaat/data_captura=20250307/year=2024/lista_2024.pdf",
    );
  });

  it("places the manifest beside the capture partition", () => {
    expect(layout.manifestKey()).toBe("datalake/raw/fundeb_vaat/data_captura=20250307/metadata.json");
  });

  it("rejects malformed execution dates", () => {
    expect(() => captureDate("07/03/2025")).toThrow(RangeError);
  });
});

describe("key helpers", () => {
  it("swaps the raw segment for staging", () => {
    expect(stagingPrefix("datalake/raw/fnde")).toBe("datalake/staging/fnde");
    expect(stagingPrefix("lake/fnde")).toBe("lake/fnde/staging");
  });

  it("joins keys without empty segments", () => {
    expect(joinKey("/lake/", "", "raw//x", "file.pdf")).toBe("lake/raw/x/file.pdf");
  });
});

describe("MemoryObjectStore", () => {
  it("keeps uploaded bytes under their uri", async () => {
    const store = new MemoryObjectStore();

    const uri = await store.putBytes("bucket-a", Buffer.from("{}"), "x/metadata.json", "application/json");

    expect(uri).toBe("memory://bucket-a/x/metadata.json");
    expect(store.get(uri)).toEqual({ bytes: Buffer.from("{}"), contentType: "application/json" });
    expect(store.list()).toEqual([uri]);
  });

  it("wraps a missing source file in an UploadError", async () => {
    const store = new MemoryObjectStore();

    const error = await store.putFile("bucket-a", "/nonexistent/file.pdf", "x/file.pdf").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({ key: "x/file.pdf" });
  });
});

describe("LocalObjectStore", () => {
  it("copies files under root/bucket/key", async () => {
    const root = await tempDir();
    const source = path.join(await tempDir(), "lista.pdf");
    await fs.promises.writeFile(source, "pdf-bytes");
    const store = new LocalObjectStore(root);

    const uri = await store.putFile("bucket-a", source, "staging/lista.pdf");

    expect(uri).toBe("local://bucket-a/staging/lista.pdf");
    expect(await fs.promises.readFile(path.join(root, "bucket-a", "staging", "lista.pdf"), "utf-8")).toBe("pdf-bytes");
  });

  it("refuses keys that escape the root", async () => {
    const store = new LocalObjectStore(await tempDir());

    await expect(store.putBytes("bucket-a", Buffer.from("x"), "../../outside.txt")).rejects.toBeInstanceOf(UploadError);
  });
});

describe("S3ObjectStore", () => {
  it("sends a put with the file length and content type", async () => {
    const source = path.join(await tempDir(), "lista.pdf");
    await fs.promises.writeFile(source, "0123456789");
    const sent: PutObjectCommand[] = [];
    const store = new S3ObjectStore({
      client: {
        send: async (command) => {
          sent.push(command);
          return {};
        },
      },
    });

    const uri = await store.putFile("bucket-a", source, "raw/lista.pdf", "application/pdf");

    expect(uri).toBe("s3://bucket-a/raw/lista.pdf");
    expect(sent).toHaveLength(1);
    expect(sent[0].input).toMatchObject({
      Bucket: "bucket-a",
      Key: "raw/lista.pdf",
      ContentLength: 10,
      ContentType: "application/pdf",
    });
  });

  it("reports client failures as UploadError", async () => {
    const store = new S3ObjectStore({
      client: {
        send: async () => {
          throw new Error("AccessDenied");
        },
      },
    });

    const error = await store.putBytes("bucket-a", Buffer.from("{}"), "raw/metadata.json").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UploadError);
    expect(error).toMatchObject({ message: "Failed to upload s3://bucket-a/raw/metadata.json: AccessDenied" });
  });
});

describe("createObjectStore", () => {
  it("builds the configured backend", () => {
    expect(createObjectStore({ backend: "memory", localRoot: "data/objects", s3ForcePathStyle: false }).scheme).toBe("memory");
    expect(createObjectStore({ backend: "local", localRoot: "data/objects", s3ForcePathStyle: false }).scheme).toBe("local");
  });
});
