import { describe, expect, it } from "vitest";
import { loadCatalog } from "../../infra/catalog/toolCatalog";
import { asciiJsonString, canonicalKeyDocument, resolveRequest } from "./requestKey";

const catalog = loadCatalog();

describe("canonical key", () => {
  it("escapes non-ASCII characters", () => {
    expect(asciiJsonString("Gestión")).toBe('"Gesti\\u00f3n"');
  });

  it("renders keys sorted with spaced separators", () => {
    expect(canonicalKeyDocument("Gestión de Costos", "Google Trends", "es")).toBe(
      '{"language": "es", "sources_text": "Google Trends", "tool_name": "Gesti\\u00f3n de Costos"}',
    );
  });
});

describe("resolveRequest", () => {
  it("canonicalizes tool and sources before hashing", () => {
    const result = resolveRequest(catalog, {
      toolName: "Cost Management",
      sources: ["Bain - Satisfacción", "google_trends", "nope"],
      language: "es",
      forceRefresh: false,
    });

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value).toEqual({
      toolName: "Gestión de Costos",
      toolDisplayName: "Gestión de Costos",
      sources: ["Google Trends", "Bain Satisfaction"],
      sourceIds: [1, 5],
      sourcesText: "Google Trends, Bain Satisfaction",
      language: "es",
      key: "024ca262e327eeec2338724e57bef6dcdaec73fdd5c419cb1a67b8a99ef99170",
    });
  });

  it("produces the same key regardless of input order and naming", () => {
    const first = resolveRequest(catalog, {
      toolName: "Gestión de Costos",
      sources: ["5", "Google Trends"],
      language: "es",
      forceRefresh: false,
    });
    const second = resolveRequest(catalog, {
      toolName: "cost management",
      sources: ["google trends", "Bain Satisfacción"],
      language: "es",
      forceRefresh: true,
    });

    expect(first.isOk() && first.value.key).toBe(second.isOk() && second.value.key);
  });

  it("fails when no source is known", () => {
    const result = resolveRequest(catalog, {
      toolName: "Benchmarking",
      sources: ["Unknown Source"],
      language: "en",
      forceRefresh: false,
    });

    expect(result.isErr() && result.error.code).toBe("source_not_found");
  });
});
