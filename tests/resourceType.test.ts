import { describe, expect, it } from "vitest";
import { contentTypeFor, detectResourceType } from "../src/crawl/resourceType";

describe("detectResourceType", () => {
  it("prefers the content type over the extension", () => {
    expect(detectResourceType("https://a.example.org/file.pdf", "text/html; charset=utf-8")).toBe("html");
  });

  it("falls back to the url extension", () => {
    expect(detectResourceType("https://a.example.org/DADOS.CSV")).toBe("csv");
    expect(detectResourceType("https://a.example.org/planilha.xls")).toBe("xlsx");
    expect(detectResourceType("https://a.example.org/pacote.zip")).toBe("zip");
    expect(detectResourceType("https://a.example.org/lista.pdf?download=1")).toBe("pdf");
  });

  it("only reads the extension of the last path segment", () => {
    expect(detectResourceType("https://a.example.org/arquivos/relatorio.pdf/view")).toBe("unknown");
    expect(detectResourceType("https://a.example.org/dados.csv/download.pdf")).toBe("pdf");
  });

  it("ignores content types it does not know", () => {
    expect(detectResourceType("https://a.example.org/lista.pdf", "application/octet-stream")).toBe("pdf");
  });

  it("recognises api endpoints", () => {
    expect(detectResourceType("https://api.example.org/v1/items")).toBe("api");
    expect(detectResourceType("https://a.example.org/api/v1/items")).toBe("api");
  });

  it("returns unknown when nothing matches", () => {
    expect(detectResourceType("https://a.example.org/about")).toBe("unknown");
  });
});

describe("contentTypeFor", () => {
  it("maps resource types to upload content types", () => {
    expect(contentTypeFor("pdf")).toBe("application/pdf");
    expect(contentTypeFor("csv")).toBe("text/csv");
  });
});
