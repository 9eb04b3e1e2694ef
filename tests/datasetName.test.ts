import { describe, expect, it } from "vitest";
import { GENERIC_DATASET_NAME, inferDatasetName, pathTokens } from "../src/naming/datasetName";

const FUNDEB_URL =
  "https://www.gov.br/fnde/pt-br/acesso-a-informacao/acoes-e-programas/financiamento/fundeb/vaat/file.pdf";

describe("inferDatasetName", () => {
  it("names the FUNDEB VAAT page deterministically", () => {
    expect(inferDatasetName(FUNDEB_URL, "job1")).toBe("fundeb_vaat");
    expect(inferDatasetName(FUNDEB_URL, "job1")).toBe(inferDatasetName(FUNDEB_URL, "job1"));
  });

  it("drops boilerplate and language segments", () => {
    expect(pathTokens(FUNDEB_URL)).toEqual(["fnde", "fundeb", "vaat", "file"]);
  });

  it("keeps multi-word segments hyphenated and puts priority terms first", () => {
    const url = "https://example.gov.br/dados/salario-educacao/2024/Distribuicao_Mensal.pdf";
    expect(pathTokens(url)).toEqual(["dados", "salario-educacao", "distribuicaomensal"]);
    expect(inferDatasetName(url)).toBe("salario_educacao_dados");
  });

  it("falls back to the cleaned host name", () => {
    expect(inferDatasetName("https://www.fnde.gov.br/")).toBe("fnde");
  });

  it("keeps ports and address punctuation out of host names", () => {
    expect(inferDatasetName("https://localhost:8080/")).toBe("localhost");
    expect(inferDatasetName("https://dados.example.org:8443/")).toBe("dados_example_org");
    expect(inferDatasetName("http://[::1]:9000/")).toBe("1");
  });

  it("falls back to the job name prefix, then to the generic name", () => {
    expect(inferDatasetName("https:///", "salario_mensal")).toBe("salario");
    expect(inferDatasetName("https:///")).toBe(GENERIC_DATASET_NAME);
  });
});
