export * from "./registry";
export * from "./strategies";
export type * from "./types";
