import fs from "node:fs";
import path from "node:path";
import { BaseObjectStore } from "./baseObjectStore";

/** Lays buckets out as directories under `root`; useful for dry runs and local development. */
export class LocalObjectStore extends BaseObjectStore {
  readonly scheme = "local";
  private readonly root: string;

  constructor(root: string) {
    super();
    this.root = path.resolve(root);
  }

  resolve(bucket: string, key: string): string {
    const target = path.resolve(this.root, bucket, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new Error(`Key escapes storage root: ${key}`);
    }
    return target;
  }

  protected async writeFile(bucket: string, localPath: string, key: string): Promise<void> {
    const target = this.resolve(bucket, key);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.copyFile(localPath, target);
  }

  protected async writeBytes(bucket: string, bytes: Uint8Array, key: string): Promise<void> {
    const target = this.resolve(bucket, key);
    await fs.promises.mkdir(path.dirname(target), { recursive: true });
    await fs.promises.writeFile(target, bytes);
  }
}
