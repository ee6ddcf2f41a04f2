import { describe, expect, it } from "vitest";
import type { CorrelationEntry } from "../../core/entities/features";
import {
  completeRows,
  correlationStrength,
  pairwiseCorrelations,
  summarizeHeatmap,
} from "./crossSource";
import { joinSeries } from "./dataset";

const monthly = (source: string, values: Array<number | null>) => ({
  source,
  points: values.flatMap((value, index) =>
    value === null
      ? []
      : [{ date: new Date(Date.UTC(2019, index, 1)), value }],
  ),
});

const pairs = (entries: CorrelationEntry[]) =>
  entries.map((entry) => `${entry.left}/${entry.right}`);

// r(A, B) = 15.5 / 17.5; C is uncorrelated with A
const alpha = [1, 2, 3, 4, 5, 6];
const beta = [1, 3, 2, 4, 6, 5];
const gamma = [1, 0, 0, 0, 0, 1];

describe("summarizeHeatmap", () => {
  it("puts strongly correlated pairs in dense regions and weak pairs in sparse ones", () => {
    const dataset = joinSeries([
      monthly("A", alpha),
      monthly("B", beta),
      monthly("C", gamma),
    ]);

    const result = summarizeHeatmap(dataset);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    const heatmap = result.value;
    expect(pairs(heatmap.denseRegions)).toEqual(["A/B"]);
    expect(pairs(heatmap.sparseRegions)).toContain("A/C");
    expect(heatmap.denseRegions[0]?.r).toBeCloseTo(15.5 / 17.5, 12);
    expect(heatmap.denseRegions[0]?.strength).toBe("very_strong");
    expect(heatmap.matrixSummary.strongestPositive).toBeCloseTo(15.5 / 17.5, 12);
    expect(heatmap.clusters).toEqual([]);
    expect(heatmap.gradients).toEqual([]);
    expect(heatmap.valueRanges.A).toEqual({
      min: 1,
      max: 6,
      mean: 3.5,
      std: Math.sqrt(17.5 / 5),
      range: 5,
    });
  });

  it("finds clusters, high outliers and the drift of a source that flips at the midpoint", () => {
    const dataset = joinSeries([
      monthly("A", [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]),
      monthly("B", [1, 2, 3, 4, 5, 6, 12, 11, 10, 9, 8, 7]),
      monthly("C", [2, 4, 6, 8, 10, 12, 14, 16, 18, 20, 22, 25]),
      monthly("D", [3, 5, 7, 9, 11, 14, 15, 17, 19, 21, 23, 25]),
    ]);

    const result = summarizeHeatmap(dataset);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    const heatmap = result.value;
    expect(heatmap.clusters).toEqual([
      { source: "A", correlatedWith: ["B", "C", "D"] },
      { source: "B", correlatedWith: ["A", "C", "D"] },
      { source: "C", correlatedWith: ["A", "B", "D"] },
    ]);
    expect(heatmap.outliers).toEqual([
      { source: "A", profile: "high" },
      { source: "B", profile: "high" },
      { source: "C", profile: "high" },
    ]);
    expect(
      heatmap.gradients.map((gradient) => [
        `${gradient.left}/${gradient.right}`,
        gradient.direction,
      ]),
    ).toEqual([
      ["A/B", "decreased"],
      ["B/C", "decreased"],
      ["B/D", "decreased"],
    ]);
    const [flip] = heatmap.gradients;
    expect(flip?.early).toBeCloseTo(1, 12);
    expect(flip?.late).toBeCloseTo(-1, 12);
  });

  it("marks a source uncorrelated with every partner as a low outlier", () => {
    const dataset = joinSeries([
      monthly("A", alpha),
      monthly("B", [2, 4, 6, 8, 10, 12]),
      monthly("C", gamma),
    ]);

    const result = summarizeHeatmap(dataset);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.outliers).toEqual([{ source: "C", profile: "low" }]);
    expect(result.value.clusters).toEqual([]);
  });

  it("needs two sources and enough complete rows", () => {
    const single = summarizeHeatmap(joinSeries([monthly("A", alpha)]));
    const sparse = summarizeHeatmap(
      joinSeries([monthly("A", [1, 2, 3]), monthly("B", [3, 2, 1])]),
    );

    expect(single.isErr() && single.error.message).toBe(
      "Heatmap analysis needs at least 2 sources.",
    );
    expect(sparse.isErr() && sparse.error.message).toBe(
      "Heatmap analysis needs at least 5 data points (got 3).",
    );
  });
});

describe("pairwiseCorrelations", () => {
  it("correlates each pair over the dates both sources share", () => {
    const dataset = joinSeries([
      monthly("A", [1, 2, 3, null, 5]),
      monthly("B", [2, 4, 6, 8, 10]),
    ]);

    expect(completeRows(dataset, ["A", "B"])).toEqual([
      [1, 2],
      [2, 4],
      [3, 6],
      [5, 10],
    ]);
    const [entry] = pairwiseCorrelations(dataset);
    expect(entry?.r).toBe(1);
    expect(entry?.significance).toBe("significant");
  });

  it("skips constant pairs", () => {
    const dataset = joinSeries([
      monthly("A", [1, 2, 3]),
      monthly("B", [7, 7, 7]),
    ]);

    expect(pairwiseCorrelations(dataset)).toEqual([]);
  });
});

describe("correlationStrength", () => {
  it("uses inclusive lower bounds", () => {
    expect(correlationStrength(0.8)).toBe("very_strong");
    expect(correlationStrength(-0.79)).toBe("strong");
    expect(correlationStrength(0.4)).toBe("moderate");
    expect(correlationStrength(0.2)).toBe("weak");
    expect(correlationStrength(0.19)).toBe("very_weak");
  });
});
