import { describe, expect, it } from "vitest";
import {
  incompleteBeta,
  kurtosis,
  lastDefined,
  linearRegression,
  mean,
  median,
  pearson,
  populationStd,
  quantile,
  rollingMean,
  sampleStd,
  skewness,
  tTestPValue,
} from "./statistics";

describe("statistics", () => {
  it("computes moments", () => {
    const values = [2, 4, 4, 4, 5, 5, 7, 9];

    expect(mean(values)).toBe(5);
    expect(populationStd(values)).toBe(2);
    expect(sampleStd(values)).toBeCloseTo(Math.sqrt(32 / 7), 12);
    expect(sampleStd([1])).toBeNaN();
    expect(skewness([1, 2, 3])).toBe(0);
    expect(kurtosis([3, 3, 3])).toBe(0);
  });

  it("interpolates quantiles linearly", () => {
    expect(quantile([4, 1, 3, 2], 0.25)).toBe(1.75);
    expect(median([3, 1, 2])).toBe(2);
    expect(quantile([], 0.5)).toBeNaN();
  });

  it("returns r = 1 and p = 0 for a perfect linear relation", () => {
    expect(pearson([1, 2, 3, 4], [2, 4, 6, 8])).toEqual({ r: 1, pValue: 0 });
  });

  it("returns NaN correlation for a constant side", () => {
    const result = pearson([1, 2, 3], [5, 5, 5]);

    expect(result.r).toBeNaN();
    expect(result.pValue).toBeNaN();
  });

  it("fits ordinary least squares", () => {
    const fit = linearRegression([0, 1, 2, 3], [1, 3, 5, 7]);

    expect(fit.slope).toBe(2);
    expect(fit.intercept).toBe(1);
    expect(fit.r).toBe(1);
    expect(fit.pValue).toBe(0);
  });

  it("evaluates the incomplete beta and t-test p-values", () => {
    expect(incompleteBeta(0.5, 1, 1)).toBeCloseTo(0.5, 8);
    expect(incompleteBeta(0, 2, 3)).toBe(0);
    expect(tTestPValue(0, 10)).toBe(1);
    expect(tTestPValue(Number.POSITIVE_INFINITY, 10)).toBe(0);
  });

  it("keeps only full rolling windows", () => {
    expect(rollingMean([1, 2, 3, 4], 2)).toEqual([null, 1.5, 2.5, 3.5]);
    expect(rollingMean([1, 2, 3, 4], 3, true)).toEqual([null, 2, 3, null]);
    expect(lastDefined([1, null, 3, null])).toBe(3);
    expect(lastDefined([null])).toBeNull();
  });
});
