import { describe, expect, it } from "vitest";
import {
  analyzePrincipalComponents,
  componentPattern,
  contributionLevel,
  covarianceMatrix,
  symmetricEigen,
} from "./pca";

describe("symmetricEigen", () => {
  it("diagonalizes a symmetric matrix with eigenvalues in descending order", () => {
    const [first, second] = symmetricEigen([
      [2, 1],
      [1, 2],
    ]);

    expect(first?.value).toBeCloseTo(3, 10);
    expect(second?.value).toBeCloseTo(1, 10);
    expect(first?.vector[0]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(first?.vector[1]).toBeCloseTo(Math.SQRT1_2, 10);
  });
});

describe("covarianceMatrix", () => {
  it("uses the n - 1 denominator", () => {
    expect(
      covarianceMatrix([
        [1, 2],
        [3, 6],
      ]),
    ).toEqual([
      [2, 4],
      [4, 8],
    ]);
  });
});

describe("analyzePrincipalComponents", () => {
  const rows = Array.from({ length: 12 }, (_, index) => [
    index + 1,
    2 * (index + 1),
  ]);

  it("puts all variance of two aligned sources in the first component", () => {
    const result = analyzePrincipalComponents(["Google Trends", "Crossref"], rows, 10);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    const pca = result.value;
    const [first] = pca.components;
    expect(pca.componentCount).toBe(2);
    expect(pca.rowsUsed).toBe(12);
    expect(pca.varianceRatios[0]).toBeCloseTo(1, 10);
    expect(pca.totalVarianceExplained).toBeCloseTo(100, 10);
    expect(first?.label).toBe("PC1");
    expect(first?.pattern).toBe("alignment");
    expect(first?.loadings["Google Trends"]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(first?.contributions.map((entry) => entry.level)).toEqual([
      "high",
      "high",
    ]);
  });

  it("needs two sources and enough rows", () => {
    const oneSource = analyzePrincipalComponents(["Google Trends"], rows, 10);
    const fewRows = analyzePrincipalComponents(["A", "B"], rows.slice(0, 3), 10);

    expect(oneSource.isErr() && oneSource.error.message).toBe(
      "PCA needs at least 2 sources.",
    );
    expect(fewRows.isErr() && fewRows.error.message).toBe(
      "PCA needs at least 10 data points (got 3).",
    );
  });

  it("keeps variance ratios within one across random source mixes", () => {
    let state = 20240601;
    const next = (): number => {
      state = (state * 1664525 + 1013904223) % 4294967296;
      return state / 4294967296;
    };

    for (let trial = 0; trial < 300; trial += 1) {
      const columns = 3 + (trial % 3);
      const sources = Array.from({ length: columns }, (_, index) => `S${index}`);
      const matrix = Array.from({ length: 30 }, () =>
        Array.from({ length: columns }, () => next() * 100),
      );

      const result = analyzePrincipalComponents(sources, matrix, 10);
      if (result.isErr()) {
        throw new Error(result.error.message);
      }
      const pca = result.value;
      const total = pca.varianceRatios.reduce((acc, ratio) => acc + ratio, 0);

      expect(pca.varianceRatios).toHaveLength(columns);
      expect(total).toBeLessThanOrEqual(1);
      expect(pca.totalVarianceExplained).toBeLessThanOrEqual(100);
      for (const ratio of pca.varianceRatios) {
        expect(ratio).toBeGreaterThanOrEqual(0);
      }
      for (const component of pca.components) {
        expect(component.cumulativeVariance).toBeLessThanOrEqual(100);
      }
    }
  });

  it("fails on all-constant columns", () => {
    const flat = Array.from({ length: 10 }, () => [5, 5]);
    const result = analyzePrincipalComponents(["A", "B"], flat, 10);

    expect(result.isErr() && result.error.code).toBe("computation_failed");
  });
});

describe("loading bands", () => {
  it("maps loading magnitude to contribution level", () => {
    expect(contributionLevel(-0.6)).toEqual({
      level: "high",
      role: "dominant driver",
    });
    expect(contributionLevel(0.3).level).toBe("medium");
    expect(contributionLevel(0.29).level).toBe("low");
  });

  it("names component patterns", () => {
    expect(componentPattern([0.5, 0.4, -0.5, -0.6])).toBe("contrast");
    expect(componentPattern([0.5, 0.4, 0.1])).toBe("alignment");
    expect(componentPattern([-0.5, -0.4])).toBe("inverse");
    expect(componentPattern([0.5, -0.5])).toBe("mixed");
  });
});
