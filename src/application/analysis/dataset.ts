import type {
  AggregatedDataset,
  SeriesPoint,
  SourceSeries,
} from "../../core/entities/series";

const dayKey = (date: Date): string => date.toISOString().slice(0, 10);

/**
 * Sorts by date and keeps the last observation for a repeated date.
 */
export const normalizePoints = (points: SeriesPoint[]): SeriesPoint[] => {
  const byDay = new Map<string, SeriesPoint>();
  points
    .filter((point) => Number.isFinite(point.value))
    .forEach((point) => byDay.set(dayKey(point.date), point));
  return [...byDay.values()].sort(
    (a, b) => a.date.getTime() - b.date.getTime(),
  );
};

/**
 * Outer-joins the given series on calendar day.
 */
export const joinSeries = (series: SourceSeries[]): AggregatedDataset => {
  const normalized = series.map((entry) => ({
    source: entry.source,
    byDay: new Map(
      normalizePoints(entry.points).map((point) => [dayKey(point.date), point]),
    ),
  }));

  const days = new Map<string, Date>();
  normalized.forEach((entry) =>
    entry.byDay.forEach((point, key) => days.set(key, point.date)),
  );
  const orderedDays = [...days.entries()].sort(
    ([, a], [, b]) => a.getTime() - b.getTime(),
  );

  const columns = new Map<string, Array<number | null>>();
  normalized.forEach((entry) => {
    columns.set(
      entry.source,
      orderedDays.map(([key]) => entry.byDay.get(key)?.value ?? null),
    );
  });

  return {
    dates: orderedDays.map(([, date]) => date),
    sources: normalized.map((entry) => entry.source),
    columns,
  };
};

export const seriesPoints = (
  dataset: AggregatedDataset,
  source: string,
): SeriesPoint[] => {
  const column = dataset.columns.get(source) ?? [];
  return dataset.dates.flatMap((date, index) => {
    const value = column[index];
    return value === undefined || value === null ? [] : [{ date, value }];
  });
};
