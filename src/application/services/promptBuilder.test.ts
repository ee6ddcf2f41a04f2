import { describe, expect, it } from "vitest";
import type { AnalysisFeatures } from "../../core/entities/features";
import { joinSeries } from "../analysis/dataset";
import { FeatureExtractorService } from "./featureExtractorService";
import { PromptBuilder } from "./promptBuilder";

const extractor = new FeatureExtractorService(
  {
    minTemporalPoints: 12,
    minFourierPoints: 24,
    minPcaRows: 10,
    anomalyZThreshold: 2.5,
  },
  { now: () => new Date(Date.UTC(2021, 0, 1)) },
);

const featuresFor = (sources: string[], length: number): AnalysisFeatures => {
  const dataset = joinSeries(
    sources.map((source, offset) => ({
      source,
      points: Array.from({ length }, (_, index) => ({
        date: new Date(Date.UTC(2020, index, 1)),
        value: 5 + index * (offset + 1) + (index % 3),
      })),
    })),
  );
  const result = extractor.extract(dataset, sources);
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
  return result.value;
};

const builder = new PromptBuilder();

describe("PromptBuilder", () => {
  it("builds a Spanish single-source prompt with the single-source response keys", () => {
    const [system, user] = builder.build({
      toolName: "Benchmarking",
      sources: ["Google Trends"],
      language: "es",
      features: featuresFor(["Google Trends"], 12),
    });

    expect(system?.role).toBe("system");
    expect(system?.content.startsWith("Eres un analista experto")).toBe(true);
    expect(user?.role).toBe("user");
    const lines = user?.content.split("\n") ?? [];
    expect(lines.slice(0, 5)).toEqual([
      "ANÁLISIS TEMPORAL DE FUENTE ÚNICA - HERRAMIENTAS DE GESTIÓN",
      "Herramienta analizada: Benchmarking",
      "Fuentes de datos: Google Trends",
      "Período: 2020-01-01 - 2020-12-01",
      "Puntos de datos: 12",
    ]);
    expect(lines).toContain(
      "  (no disponible: Seasonal analysis needs at least 24 data points (got 12).)",
    );
    expect(lines).toContain('  "temporal_analysis": "...",');
    expect(user?.content).not.toContain('"pca_analysis"');
  });

  it("builds an English cross-source prompt with PCA and heatmap keys", () => {
    const prompt = builder.userPrompt({
      toolName: "Benchmarking",
      sources: ["Google Trends", "Crossref"],
      language: "en",
      features: featuresFor(["Google Trends", "Crossref"], 24),
    });

    const lines = prompt.split("\n");
    expect(lines[0]).toBe("MULTI-SOURCE NARRATIVE ANALYSIS - MANAGEMENT TOOLS");
    expect(lines).toContain("Data points: 24");
    expect(lines).toContain("PCA:");
    expect(lines).toContain("Heatmap:");
    expect(lines).toContain('  "heatmap_analysis": "..."');
    expect(prompt).not.toContain('"fourier_analysis"');
  });

  it("renders per-source descriptive statistics before the trends", () => {
    const base = featuresFor(["Google Trends"], 12);
    const prompt = builder.userPrompt({
      toolName: "Benchmarking",
      sources: ["Google Trends"],
      language: "en",
      features: {
        ...base,
        statistics: {
          "Google Trends": {
            count: 12,
            mean: 10.5,
            median: 10,
            std: 2.25,
            min: 5,
            max: 18,
            q25: 7.5,
            q75: 13.25,
            skewness: 0.1234,
            kurtosis: -1.2,
            missingPercentage: 0,
          },
        },
      },
    });

    const lines = prompt.split("\n");
    const heading = lines.indexOf("Statistics:");
    expect(heading).toBeGreaterThan(0);
    expect(lines[heading + 1]).toBe(
      "  Google Trends: n=12 mean=10.500 median=10.000 std=2.250 min=5.000 max=18.000 q25=7.500 q75=13.250 skew=0.123 kurt=-1.200 missing=0.0%",
    );
    expect(lines.indexOf("Trends:")).toBeGreaterThan(heading);
  });
});
