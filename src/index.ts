export * from "./config";
export * from "./core/errors";
export * from "./core/fetcher";
export * from "./core/retry";
export * from "./crawl";
export * from "./download/downloader";
export * from "./extract";
export * from "./filter";
export * from "./job";
export { GENERIC_DATASET_NAME, inferDatasetName } from "./naming/datasetName";
export * from "./observability";
export * from "./pipeline";
export * from "./sink";
export * from "./storage";
export * from "./store";
export type * from "./types";
