export * from "./columnarWriter";
export * from "./pdfParseTableExtractor";
export type * from "./tableExtractor";
