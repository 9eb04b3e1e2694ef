import type { ResourceType } from "../crawl/resourceType";

export type FilterKind = "passthrough" | "salario_educacao" | "fundeb_vaat";

export interface PassthroughStrategy {
  kind: "passthrough";
}

export interface SalarioEducacaoStrategy {
  kind: "salario_educacao";
  hints: readonly string[];
  expectedType: ResourceType;
}

export interface FundebVaatStrategy {
  kind: "fundeb_vaat";
  hints: readonly string[];
  expectedType: ResourceType;
}

export type FilterStrategy = PassthroughStrategy | SalarioEducacaoStrategy | FundebVaatStrategy;

export interface FilterHints {
  hints?: readonly string[];
  filenameContains?: string;
  linkTextContains?: string;
}

export type FilterTier = "hints" | "expected_type" | "all";

export interface FilterResult {
  urls: string[];
  tier: FilterTier;
}
