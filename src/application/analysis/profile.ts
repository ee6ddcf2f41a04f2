import type {
  AnomalyReport,
  DataQuality,
  DataSummary,
  SourceQuality,
  StatisticalSummary,
} from "../../core/entities/features";
import type { AggregatedDataset } from "../../core/entities/series";
import {
  compact,
  kurtosis,
  mean,
  median,
  populationStd,
  quantile,
  sampleStd,
  skewness,
} from "./statistics";

const DAY_MS = 86_400_000;

export const isoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const summarizeValues = (
  values: Array<number | null>,
): StatisticalSummary | null => {
  const present = compact(values);
  if (present.length === 0) {
    return null;
  }

  return {
    count: present.length,
    mean: mean(present),
    median: median(present),
    std: sampleStd(present),
    min: Math.min(...present),
    max: Math.max(...present),
    q25: quantile(present, 0.25),
    q75: quantile(present, 0.75),
    skewness: skewness(present),
    kurtosis: kurtosis(present),
    missingPercentage:
      ((values.length - present.length) / values.length) * 100,
  };
};

/**
 * Z-score outliers against the population standard deviation; null when nothing crosses the threshold.
 */
export const detectAnomalies = (
  dates: Date[],
  values: Array<number | null>,
  threshold: number,
): AnomalyReport | null => {
  const observations = values.flatMap((value, index) => {
    const date = dates[index];
    return value === null || !date ? [] : [{ date, value }];
  });
  const present = observations.map((observation) => observation.value);
  const center = mean(present);
  const scale = populationStd(present);
  if (!(scale > 0)) {
    return null;
  }

  const scored = observations.map((observation) => ({
    ...observation,
    zScore: Math.abs((observation.value - center) / scale),
  }));
  const flagged = scored.filter((item) => item.zScore > threshold);
  if (flagged.length === 0) {
    return null;
  }

  return {
    count: flagged.length,
    percentage: (flagged.length / present.length) * 100,
    maxZScore: Math.max(...scored.map((item) => item.zScore)),
    recent: flagged.slice(-5).map((item) => ({
      date: isoDate(item.date),
      value: item.value,
      zScore: item.zScore,
    })),
  };
};

const iqrOutlierCount = (values: number[]): number => {
  const q1 = quantile(values, 0.25);
  const q3 = quantile(values, 0.75);
  const fence = 1.5 * (q3 - q1);
  return values.filter((value) => value < q1 - fence || value > q3 + fence)
    .length;
};

/**
 * Completeness, IQR consistency and recency of the joined dataset.
 */
export const assessQuality = (
  dataset: AggregatedDataset,
  now: Date,
): DataQuality => {
  const total = dataset.dates.length;
  const sources: Record<string, SourceQuality> = {};

  dataset.sources.forEach((source) => {
    const column = dataset.columns.get(source);
    if (!column || total === 0) {
      return;
    }
    const present = compact(column);
    const outliers = present.length > 0 ? iqrOutlierCount(present) : 0;
    sources[source] = {
      completeness: (present.length / total) * 100,
      missingCount: total - present.length,
      consistency: ((total - outliers) / total) * 100,
      outlierCount: outliers,
    };
  });

  const latest = dataset.dates[dataset.dates.length - 1];
  const daysSinceLatest = latest
    ? Math.floor((now.getTime() - latest.getTime()) / DAY_MS)
    : 0;
  const timeliness = latest
    ? Math.max(0, 100 - (daysSinceLatest / 365) * 100)
    : 0;

  const perSource = Object.values(sources);
  const overallScore =
    perSource.length > 0
      ? mean([
          mean(perSource.map((quality) => quality.completeness)),
          mean(perSource.map((quality) => quality.consistency)),
          timeliness,
        ])
      : 0;

  return {
    sources,
    latestDate: latest ? isoDate(latest) : null,
    daysSinceLatest,
    timeliness,
    overallScore,
  };
};

export const summarizeDataset = (dataset: AggregatedDataset): DataSummary => {
  const first = dataset.dates[0];
  const last = dataset.dates[dataset.dates.length - 1];
  return {
    start: first ? isoDate(first) : null,
    end: last ? isoDate(last) : null,
    totalDays:
      first && last
        ? Math.round((last.getTime() - first.getTime()) / DAY_MS)
        : 0,
    rows: dataset.dates.length,
    sources: [...dataset.sources],
  };
};
