export * from "./loadConfig";
export type * from "./types";
