import type { AppConfig } from "../config";
import { InMemoryStore } from "./memoryStore";
import { SqliteStore } from "./sqliteStore";
import type { PipelineStore } from "./types";

export function createStore(config: AppConfig): PipelineStore {
  if (config.storePath === "memory") {
    return new InMemoryStore();
  }
  return new SqliteStore(config.storePath);
}

export * from "./memoryStore";
export * from "./sqliteStore";
export * from "./types";
