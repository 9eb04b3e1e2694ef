export * from "./fileMetadata";
export * from "./htmlParser";
export * from "./normalizer";
export * from "./resourceType";
export * from "./urlParts";
