export { ENVIRONMENTS, SOURCE_TYPES } from "./schema";
export type { Environment, JobInput, SourceParams, SourceType } from "./schema";
export * from "./validateJob";
