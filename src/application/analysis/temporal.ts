import { err, ok } from "neverthrow";
import type {
  Direction,
  SourceTrend,
  SubAnalysis,
  TrendClass,
  TrendMetrics,
} from "../../core/entities/features";
import { insufficientData } from "../../core/entities/appError";
import {
  compact,
  lastDefined,
  linearRegression,
  mean,
  rollingMean,
  rollingStd,
} from "./statistics";

const directionOf = (value: number): Direction => {
  if (value > 0) return "increasing";
  if (value < 0) return "decreasing";
  return "stable";
};

const meanRollingStd = (values: number[], window: number): number =>
  mean(compact(rollingStd(values, window)));

/**
 * Linear trend, centered moving averages, recent-vs-historical change and volatility of one series.
 */
export const analyzeTemporalTrend = (
  values: number[],
  minPoints: number,
): SubAnalysis<TrendMetrics> => {
  if (values.length < minPoints) {
    return err(insufficientData("Temporal analysis", minPoints, values.length));
  }

  const positions = values.map((_, index) => index);
  const regression = linearRegression(positions, values);

  const recentPeriod = Math.max(1, Math.min(12, Math.floor(values.length / 4)));
  const recent = values.slice(-recentPeriod);
  const historical =
    values.length > recentPeriod
      ? values.slice(0, values.length - recentPeriod)
      : values.slice(0, recentPeriod);
  const recentMean = mean(recent);
  const historicalMean = mean(historical);
  const changePercentage =
    historicalMean !== 0
      ? ((recentMean - historicalMean) / historicalMean) * 100
      : 0;

  const overallVolatility = meanRollingStd(values, 3);
  const recentVolatility = meanRollingStd(recent, Math.min(3, recent.length));

  return ok({
    linearTrend: {
      slope: regression.slope,
      intercept: regression.intercept,
      rSquared: regression.r ** 2,
      pValue: regression.pValue,
      direction: directionOf(regression.slope),
      significance:
        regression.pValue < 0.05 ? "significant" : "not_significant",
    },
    movingAverages: {
      window3: lastDefined(rollingMean(values, 3, true)),
      window6: lastDefined(rollingMean(values, 6, true)),
      window12: lastDefined(rollingMean(values, 12, true)),
    },
    recentVsHistorical: {
      recentMean,
      historicalMean,
      changePercentage,
      direction: directionOf(changePercentage),
    },
    volatility: {
      overall: overallVolatility,
      recent: recentVolatility,
      trend: directionOf(
        Number.isNaN(recentVolatility - overallVolatility)
          ? 0
          : recentVolatility - overallVolatility,
      ),
    },
  });
};

export const classifyTrend = (
  recentTrend: number,
  longTermTrend: number,
): TrendClass => {
  if (recentTrend > 0.1 && longTermTrend > 0.1) return "strong_upward";
  if (recentTrend > 0.05 && longTermTrend > 0.05) return "moderate_upward";
  if (recentTrend < -0.1 && longTermTrend < -0.1) return "strong_downward";
  if (recentTrend < -0.05 && longTermTrend < -0.05) return "moderate_downward";
  if (Math.abs(recentTrend) < 0.05 && Math.abs(longTermTrend) < 0.05)
    return "stable";
  if (recentTrend * longTermTrend < 0) return "reversing";
  return "mixed";
};

/**
 * Short (3-point) against long (12-point) smoothed movement; null below one year of observations.
 */
export const sourceTrend = (values: number[]): SourceTrend | null => {
  if (values.length < 12) {
    return null;
  }

  const short = compact(rollingMean(values, 3, true));
  const long = compact(rollingMean(values, 12, true));

  const recentTrend =
    short.length >= 6 ? mean(short.slice(-3)) - mean(short.slice(-6, -3)) : 0;
  const longTermTrend =
    long.length >= 13
      ? (long[long.length - 1] ?? 0) - (long[long.length - 13] ?? 0)
      : 0;

  return {
    recentTrend,
    longTermTrend,
    classification: classifyTrend(recentTrend, longTermTrend),
    volatility: meanRollingStd(values, 3),
  };
};
