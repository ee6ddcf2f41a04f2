import { err, ok } from "neverthrow";
import type {
  SeasonalMetrics,
  SeasonalStrengthLevel,
  SubAnalysis,
} from "../../core/entities/features";
import type { SeriesPoint } from "../../core/entities/series";
import { insufficientData } from "../../core/entities/appError";
import { mean, sampleStd } from "./statistics";

const groupBy = (
  points: SeriesPoint[],
  keyOf: (date: Date) => number,
): Map<number, number[]> => {
  const groups = new Map<number, number[]>();
  points.forEach((point) => {
    const key = keyOf(point.date);
    const bucket = groups.get(key) ?? [];
    bucket.push(point.value);
    groups.set(key, bucket);
  });
  return new Map([...groups.entries()].sort(([a], [b]) => a - b));
};

const mapGroups = (
  groups: Map<number, number[]>,
  reduce: (values: number[]) => number,
): Record<number, number> =>
  Object.fromEntries(
    [...groups.entries()].map(([key, values]) => [key, reduce(values)]),
  );

export const seasonalStrengthLevel = (
  strength: number,
): SeasonalStrengthLevel => {
  if (strength > 0.3) return "strong";
  if (strength > 0.1) return "moderate";
  return "weak";
};

/**
 * Calendar-month, quarter and year grouping of a monthly series.
 */
export const analyzeSeasonality = (
  points: SeriesPoint[],
  minPoints: number,
): SubAnalysis<SeasonalMetrics> => {
  if (points.length < minPoints) {
    return err(insufficientData("Seasonal analysis", minPoints, points.length));
  }

  const months = groupBy(points, (date) => date.getUTCMonth() + 1);
  const quarters = groupBy(
    points,
    (date) => Math.floor(date.getUTCMonth() / 3) + 1,
  );
  const years = groupBy(points, (date) => date.getUTCFullYear());

  const monthlyMeans = mapGroups(months, mean);
  const monthlyStds = mapGroups(months, sampleStd);
  const yearlyMeans = mapGroups(years, mean);

  const monthEntries = Object.entries(monthlyMeans).map(
    ([month, value]) => [Number(month), value] as const,
  );
  const [peakMonth, peakValue] = monthEntries.reduce((best, entry) =>
    entry[1] > best[1] ? entry : best,
  );
  const [lowMonth, lowValue] = monthEntries.reduce((best, entry) =>
    entry[1] < best[1] ? entry : best,
  );

  const yearly = Object.values(yearlyMeans);
  const yearlyChanges = yearly
    .slice(1)
    .map((value, index) => {
      const previous = yearly[index] ?? 0;
      return (value - previous) / previous;
    })
    .filter((change) => Number.isFinite(change));
  const yearOverYearGrowth =
    yearlyChanges.length > 0 ? mean(yearlyChanges) * 100 : 0;

  const definedStds = Object.values(monthlyStds).filter(
    (value) => !Number.isNaN(value),
  );
  const meanOfMeans = mean(Object.values(monthlyMeans));
  const dispersion = sampleStd(definedStds);
  const strength =
    meanOfMeans !== 0 && !Number.isNaN(dispersion)
      ? dispersion / meanOfMeans
      : 0;

  return ok({
    monthlyMeans,
    monthlyStds,
    quarterlyMeans: mapGroups(quarters, mean),
    yearlyMeans,
    peakMonth,
    lowMonth,
    peakValue,
    lowValue,
    yearOverYearGrowth,
    strength,
    strengthLevel: seasonalStrengthLevel(strength),
  });
};
