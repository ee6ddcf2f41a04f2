export type SeriesPoint = {
  date: Date;
  value: number;
};

/**
 * One source's observations for a tool, keyed by the source display name.
 */
export type SourceSeries = {
  source: string;
  points: SeriesPoint[];
};

/**
 * Outer join of the requested sources on observation date.
 * Columns hold `null` where a source has no value for that date.
 */
export type AggregatedDataset = {
  dates: Date[];
  sources: string[];
  columns: ReadonlyMap<string, Array<number | null>>;
};
