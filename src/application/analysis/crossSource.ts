import { err, ok } from "neverthrow";
import type {
  CorrelationEntry,
  CorrelationGradient,
  CorrelationStrength,
  HeatmapSummary,
  SubAnalysis,
  ValueRange,
} from "../../core/entities/features";
import type { AggregatedDataset } from "../../core/entities/series";
import { insufficientData } from "../../core/entities/appError";
import { compact, mean, pearson, sampleStd } from "./statistics";

const DENSE_THRESHOLD = 0.7;
const SPARSE_THRESHOLD = 0.3;
const CLUSTER_THRESHOLD = 0.6;
const OUTLIER_HIGH = 0.7;
const OUTLIER_LOW = 0.2;
const OUTLIER_SHARE = 0.8;
const GRADIENT_DELTA = 0.4;
const HEATMAP_MIN_ROWS = 5;
const GRADIENT_MIN_ROWS = 12;
const GRADIENT_MIN_HALF = 3;

/**
 * Bands cover [0, 1] in |r| without gaps: each lower bound is inclusive.
 */
export const correlationStrength = (r: number): CorrelationStrength => {
  const magnitude = Math.abs(r);
  if (magnitude >= 0.8) return "very_strong";
  if (magnitude >= 0.6) return "strong";
  if (magnitude >= 0.4) return "moderate";
  if (magnitude >= 0.2) return "weak";
  return "very_weak";
};

const column = (dataset: AggregatedDataset, source: string) =>
  dataset.columns.get(source) ?? [];

/**
 * Rows (by index) where every listed source has a value.
 */
export const completeRows = (
  dataset: AggregatedDataset,
  sources: string[],
  from = 0,
  to = dataset.dates.length,
): number[][] => {
  const rows: number[][] = [];
  for (let index = from; index < to; index += 1) {
    const row = sources.map((source) => column(dataset, source)[index] ?? null);
    if (row.every((value): value is number => value !== null)) {
      rows.push(row);
    }
  }
  return rows;
};

const correlate = (
  left: string,
  right: string,
  xs: number[],
  ys: number[],
): CorrelationEntry | null => {
  if (xs.length < 2) {
    return null;
  }

  const { r, pValue } = pearson(xs, ys);
  if (Number.isNaN(r)) {
    return null;
  }

  return {
    left,
    right,
    r,
    pValue,
    significance: pValue < 0.05 ? "significant" : "not_significant",
    strength: correlationStrength(r),
  };
};

/**
 * Pairwise Pearson correlation, each pair over the dates both sources share.
 */
export const pairwiseCorrelations = (
  dataset: AggregatedDataset,
): CorrelationEntry[] => {
  const entries: CorrelationEntry[] = [];
  dataset.sources.forEach((left, i) => {
    dataset.sources.slice(i + 1).forEach((right) => {
      const rows = completeRows(dataset, [left, right]);
      const entry = correlate(
        left,
        right,
        rows.map((row) => row[0] ?? 0),
        rows.map((row) => row[1] ?? 0),
      );
      if (entry) {
        entries.push(entry);
      }
    });
  });
  return entries;
};

const matrixCorrelations = (
  sources: string[],
  rows: number[][],
): CorrelationEntry[] =>
  sources.flatMap((left, i) =>
    sources.slice(i + 1).flatMap((right, offset) => {
      const j = i + 1 + offset;
      const entry = correlate(
        left,
        right,
        rows.map((row) => row[i] ?? 0),
        rows.map((row) => row[j] ?? 0),
      );
      return entry ? [entry] : [];
    }),
  );

export const valueRange = (values: number[]): ValueRange => {
  const min = Math.min(...values);
  const max = Math.max(...values);
  return { min, max, mean: mean(values), std: sampleStd(values), range: max - min };
};

const partnersOf = (source: string, entries: CorrelationEntry[]) =>
  entries
    .filter((entry) => entry.left === source || entry.right === source)
    .map((entry) => ({
      other: entry.left === source ? entry.right : entry.left,
      r: entry.r,
    }));

const detectGradients = (
  dataset: AggregatedDataset,
): CorrelationGradient[] => {
  const total = dataset.dates.length;
  if (total < GRADIENT_MIN_ROWS) {
    return [];
  }

  const split = Math.floor(total / 2);
  const early = completeRows(dataset, dataset.sources, 0, split);
  const late = completeRows(dataset, dataset.sources, split, total);
  if (early.length < GRADIENT_MIN_HALF || late.length < GRADIENT_MIN_HALF) {
    return [];
  }

  const earlyEntries = matrixCorrelations(dataset.sources, early);
  const lateEntries = matrixCorrelations(dataset.sources, late);

  return earlyEntries.flatMap((before) => {
    const after = lateEntries.find(
      (entry) => entry.left === before.left && entry.right === before.right,
    );
    if (!after) {
      return [];
    }
    const change = after.r - before.r;
    if (Math.abs(change) <= GRADIENT_DELTA) {
      return [];
    }
    return [
      {
        left: before.left,
        right: before.right,
        early: before.r,
        late: after.r,
        direction: change > 0 ? ("increased" as const) : ("decreased" as const),
      },
    ];
  });
};

/**
 * Reads the correlation matrix the way a heatmap viewer would: dense and sparse cells, clusters, outliers and drift.
 */
export const summarizeHeatmap = (
  dataset: AggregatedDataset,
): SubAnalysis<HeatmapSummary> => {
  const sources = dataset.sources;
  if (sources.length < 2) {
    return err({
      code: "insufficient_data",
      message: "Heatmap analysis needs at least 2 sources.",
      required: 2,
      actual: sources.length,
    });
  }

  const rows = completeRows(dataset, sources);
  if (rows.length < HEATMAP_MIN_ROWS) {
    return err(insufficientData("Heatmap analysis", HEATMAP_MIN_ROWS, rows.length));
  }

  const entries = matrixCorrelations(sources, rows);

  const valueRanges: Record<string, ValueRange> = {};
  sources.forEach((source) => {
    const values = compact(column(dataset, source));
    if (values.length > 0) {
      valueRanges[source] = valueRange(values);
    }
  });

  const clusters =
    sources.length >= 3
      ? sources
          .map((source) => ({
            source,
            correlatedWith: partnersOf(source, entries)
              .filter((partner) => Math.abs(partner.r) > CLUSTER_THRESHOLD)
              .map((partner) => partner.other),
          }))
          .filter((cluster) => cluster.correlatedWith.length >= 2)
          .slice(0, 3)
      : [];

  const outliers = sources
    .flatMap<{ source: string; profile: "high" | "low" }>((source) => {
      const partners = partnersOf(source, entries);
      if (partners.length === 0) {
        return [];
      }
      const high = partners.filter((p) => Math.abs(p.r) > OUTLIER_HIGH).length;
      const low = partners.filter((p) => Math.abs(p.r) < OUTLIER_LOW).length;
      if (high >= partners.length * OUTLIER_SHARE) {
        return [{ source, profile: "high" as const }];
      }
      if (low >= partners.length * OUTLIER_SHARE) {
        return [{ source, profile: "low" as const }];
      }
      return [];
    })
    .slice(0, 3);

  const coefficients = entries.map((entry) => entry.r);

  return ok({
    valueRanges,
    denseRegions: entries
      .filter((entry) => Math.abs(entry.r) > DENSE_THRESHOLD)
      .slice(0, 5),
    sparseRegions: entries
      .filter((entry) => Math.abs(entry.r) < SPARSE_THRESHOLD)
      .slice(0, 5),
    clusters,
    outliers,
    gradients: detectGradients(dataset),
    matrixSummary: {
      strongestPositive: coefficients.length > 0 ? Math.max(...coefficients) : 0,
      strongestNegative: coefficients.length > 0 ? Math.min(...coefficients) : 0,
      averageCorrelation: coefficients.length > 0 ? mean(coefficients) : 0,
    },
  });
};
