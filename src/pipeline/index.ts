export * from "./candidate";
export * from "./concurrency";
export * from "./manifest";
export * from "./runIngestion";
export * from "./sources";
