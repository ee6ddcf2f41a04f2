import type { Result } from "neverthrow";
import type { AnalysisIssue } from "./appError";

export type SubAnalysis<T> = Result<T, AnalysisIssue>;

export type Direction = "increasing" | "decreasing" | "stable";

export type LinearTrend = {
  slope: number;
  intercept: number;
  rSquared: number;
  pValue: number;
  direction: Direction;
  significance: "significant" | "not_significant";
};

export type TrendMetrics = {
  linearTrend: LinearTrend;
  movingAverages: {
    window3: number | null;
    window6: number | null;
    window12: number | null;
  };
  recentVsHistorical: {
    recentMean: number;
    historicalMean: number;
    changePercentage: number;
    direction: Direction;
  };
  volatility: {
    overall: number;
    recent: number;
    trend: Direction;
  };
};

export type SeasonalStrengthLevel = "strong" | "moderate" | "weak";

export type SeasonalMetrics = {
  monthlyMeans: Record<number, number>;
  monthlyStds: Record<number, number>;
  quarterlyMeans: Record<number, number>;
  yearlyMeans: Record<number, number>;
  peakMonth: number;
  lowMonth: number;
  peakValue: number;
  lowValue: number;
  yearOverYearGrowth: number;
  strength: number;
  strengthLevel: SeasonalStrengthLevel;
};

export type PeriodPattern =
  | "annual"
  | "semi-annual"
  | "quarterly"
  | "monthly"
  | "unknown";

export type DominantFrequency = {
  frequency: number;
  period: number;
  power: number;
  pattern: PeriodPattern;
  relativeStrength: number;
};

export type SignalQualityLevel = "excellent" | "good" | "fair" | "poor";

export type FrequencyMetrics = {
  dominantFrequencies: DominantFrequency[];
  totalPower: number;
  signalPower: number;
  noisePower: number;
  signalToNoise: number;
  quality: SignalQualityLevel;
  pointsAnalyzed: number;
};

export type ContributionLevel = "high" | "medium" | "low";

export type SourceContribution = {
  source: string;
  loading: number;
  level: ContributionLevel;
  role: "dominant driver" | "significant contributor" | "minor contributor";
  direction: "positive" | "negative" | "neutral";
};

export type ComponentPattern = "contrast" | "alignment" | "inverse" | "mixed";

export type PrincipalComponent = {
  label: string;
  varianceExplained: number;
  cumulativeVariance: number;
  loadings: Record<string, number>;
  contributions: SourceContribution[];
  pattern: ComponentPattern;
};

export type PcaResult = {
  componentCount: number;
  varianceRatios: number[];
  totalVarianceExplained: number;
  components: PrincipalComponent[];
  rowsUsed: number;
};

export type CorrelationStrength =
  | "very_strong"
  | "strong"
  | "moderate"
  | "weak"
  | "very_weak";

export type CorrelationEntry = {
  left: string;
  right: string;
  r: number;
  pValue: number;
  significance: "significant" | "not_significant";
  strength: CorrelationStrength;
};

export type ValueRange = {
  min: number;
  max: number;
  mean: number;
  std: number;
  range: number;
};

export type CorrelationGradient = {
  left: string;
  right: string;
  early: number;
  late: number;
  direction: "increased" | "decreased";
};

export type HeatmapSummary = {
  valueRanges: Record<string, ValueRange>;
  denseRegions: CorrelationEntry[];
  sparseRegions: CorrelationEntry[];
  clusters: Array<{ source: string; correlatedWith: string[] }>;
  outliers: Array<{ source: string; profile: "high" | "low" }>;
  gradients: CorrelationGradient[];
  matrixSummary: {
    strongestPositive: number;
    strongestNegative: number;
    averageCorrelation: number;
  };
};

export type AnomalyReport = {
  count: number;
  percentage: number;
  maxZScore: number;
  recent: Array<{ date: string; value: number; zScore: number }>;
};

export type TrendClass =
  | "strong_upward"
  | "moderate_upward"
  | "stable"
  | "moderate_downward"
  | "strong_downward"
  | "reversing"
  | "mixed";

export type SourceTrend = {
  recentTrend: number;
  longTermTrend: number;
  classification: TrendClass;
  volatility: number;
};

export type StatisticalSummary = {
  count: number;
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  q25: number;
  q75: number;
  skewness: number;
  kurtosis: number;
  missingPercentage: number;
};

export type SourceQuality = {
  completeness: number;
  missingCount: number;
  consistency: number;
  outlierCount: number;
};

export type DataQuality = {
  sources: Record<string, SourceQuality>;
  latestDate: string | null;
  daysSinceLatest: number;
  timeliness: number;
  overallScore: number;
};

export type DataSummary = {
  start: string | null;
  end: string | null;
  totalDays: number;
  rows: number;
  sources: string[];
};

export type SingleSourceFeatures = {
  kind: "single";
  source: string;
  pointsUsed: number;
  temporal: SubAnalysis<TrendMetrics>;
  seasonal: SubAnalysis<SeasonalMetrics>;
  frequency: SubAnalysis<FrequencyMetrics>;
};

export type CrossSourceFeatures = {
  kind: "cross";
  pca: SubAnalysis<PcaResult>;
  correlations: CorrelationEntry[];
  heatmap: SubAnalysis<HeatmapSummary>;
};

/**
 * Everything the prompt needs about one request's data; built per request and discarded.
 */
export type AnalysisFeatures = {
  summary: DataSummary;
  dataPoints: number;
  statistics: Record<string, StatisticalSummary>;
  trends: Record<string, SourceTrend>;
  anomalies: Record<string, AnomalyReport>;
  quality: DataQuality;
  detail: SingleSourceFeatures | CrossSourceFeatures;
};
