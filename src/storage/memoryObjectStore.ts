import fs from "node:fs";
import { BaseObjectStore } from "./baseObjectStore";
import { toUri } from "./objectStore";

export interface StoredObject {
  bytes: Buffer;
  contentType?: string;
}

export class MemoryObjectStore extends BaseObjectStore {
  readonly scheme = "memory";
  private readonly objects = new Map<string, StoredObject>();

  protected async writeFile(bucket: string, localPath: string, key: string, contentType?: string): Promise<void> {
    this.objects.set(toUri(this.scheme, bucket, key), { bytes: await fs.promises.readFile(localPath), contentType });
  }

  protected async writeBytes(bucket: string, bytes: Uint8Array, key: string, contentType?: string): Promise<void> {
    this.objects.set(toUri(this.scheme, bucket, key), { bytes: Buffer.from(bytes), contentType });
  }

  get(uri: string): StoredObject | undefined {
    return this.objects.get(uri);
  }

  list(): string[] {
    return [...this.objects.keys()];
  }
}
