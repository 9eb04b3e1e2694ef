import type { StorageConfig } from "../config";
import { LocalObjectStore } from "./localObjectStore";
import { MemoryObjectStore } from "./memoryObjectStore";
import type { ObjectStore } from "./objectStore";
import { S3ObjectStore } from "./s3ObjectStore";

export function createObjectStore(config: StorageConfig): ObjectStore {
  switch (config.backend) {
    case "s3":
      return new S3ObjectStore({
        region: config.s3Region,
        endpoint: config.s3Endpoint,
        forcePathStyle: config.s3ForcePathStyle,
      });
    case "local":
      return new LocalObjectStore(config.localRoot);
    case "memory":
      return new MemoryObjectStore();
  }
}

export * from "./baseObjectStore";
export * from "./layout";
export * from "./localObjectStore";
export * from "./memoryObjectStore";
export * from "./objectStore";
export * from "./s3ObjectStore";
