import { describe, expect, it } from "vitest";
import { loadCatalog } from "./toolCatalog";

describe("StaticCatalog", () => {
  const catalog = loadCatalog();

  it("lists sources in reference order", () => {
    expect(catalog.listSources().map((source) => source.id)).toEqual([1, 2, 3, 4, 5]);
  });

  it("resolves sources by any alias", () => {
    expect(catalog.resolveSource("Crossref.org")?.key).toBe("crossref");
    expect(catalog.resolveSource("BAIN USABILIDAD")?.key).toBe("bain_usability");
    expect(catalog.resolveSource("3")?.display).toBe("Bain Usability");
    expect(catalog.resolveSource("Yahoo")).toBeNull();
  });

  it("resolves tools in either language", () => {
    expect(catalog.resolveTool("Balanced Scorecard")?.es).toBe("Cuadro de Mando Integral");
    expect(catalog.resolveTool("cuadro de mando integral")?.en).toBe("Balanced Scorecard");
    expect(catalog.listTools()).toHaveLength(23);
  });
});
