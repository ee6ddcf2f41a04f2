import { err, ok, Result } from "neverthrow";
import {
  toErrorMessage,
  type AnalysisIssue,
} from "../../core/entities/appError";
import type {
  AnalysisFeatures,
  AnomalyReport,
  CrossSourceFeatures,
  SingleSourceFeatures,
  SourceTrend,
  StatisticalSummary,
  SubAnalysis,
} from "../../core/entities/features";
import type { AggregatedDataset } from "../../core/entities/series";
import type { ClockPort } from "../../core/ports/outboundPorts";
import type { AnalysisConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import {
  completeRows,
  pairwiseCorrelations,
  summarizeHeatmap,
} from "../analysis/crossSource";
import { seriesPoints } from "../analysis/dataset";
import { analyzePrincipalComponents } from "../analysis/pca";
import {
  assessQuality,
  detectAnomalies,
  summarizeDataset,
  summarizeValues,
} from "../analysis/profile";
import { analyzeSeasonality } from "../analysis/seasonal";
import { analyzeFrequencies } from "../analysis/spectral";
import { analyzeTemporalTrend, sourceTrend } from "../analysis/temporal";

export type ExtractionThresholds = Pick<
  AnalysisConfig,
  "minTemporalPoints" | "minFourierPoints" | "minPcaRows" | "anomalyZThreshold"
>;

/**
 * Turns a joined multi-source dataset into the feature payload the prompt is built from.
 */
export class FeatureExtractorService {
  constructor(
    private readonly thresholds: ExtractionThresholds,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Fails only when the single requested source is absent; every other sub-analysis degrades on its own.
   */
  extract(
    dataset: AggregatedDataset,
    requestedSources: string[],
  ): Result<AnalysisFeatures, AnalysisIssue> {
    const present = requestedSources.filter((source) =>
      dataset.columns.has(source),
    );
    const missing = requestedSources.filter(
      (source) => !dataset.columns.has(source),
    );

    if (missing.length > 0) {
      logger.warn({ missing, present }, "Requested sources absent from dataset");
    }

    const scoped: AggregatedDataset = { ...dataset, sources: present };
    const singleSourceRequest = requestedSources.length === 1;

    if (singleSourceRequest && present.length === 0) {
      return err({
        code: "source_not_found",
        message: `Source ${requestedSources[0] ?? ""} not found in data.`,
      });
    }

    const detail = singleSourceRequest
      ? this.singleSource(scoped, present[0] ?? "")
      : this.crossSource(scoped);

    return ok({
      summary: summarizeDataset(scoped),
      dataPoints:
        detail.kind === "single" ? detail.pointsUsed : scoped.dates.length,
      statistics: this.statistics(scoped),
      trends: this.trends(scoped),
      anomalies: this.anomalies(scoped),
      quality: assessQuality(scoped, this.clock.now()),
      detail,
    });
  }

  private singleSource(
    dataset: AggregatedDataset,
    source: string,
  ): SingleSourceFeatures {
    const points = seriesPoints(dataset, source);
    const values = points.map((point) => point.value);

    return {
      kind: "single",
      source,
      pointsUsed: points.length,
      temporal: this.isolate("temporal", () =>
        analyzeTemporalTrend(values, this.thresholds.minTemporalPoints),
      ),
      seasonal: this.isolate("seasonal", () =>
        analyzeSeasonality(points, this.thresholds.minFourierPoints),
      ),
      frequency: this.isolate("frequency", () =>
        analyzeFrequencies(values, this.thresholds.minFourierPoints),
      ),
    };
  }

  private crossSource(dataset: AggregatedDataset): CrossSourceFeatures {
    const rows = completeRows(dataset, dataset.sources);

    return {
      kind: "cross",
      pca: this.isolate("pca", () =>
        analyzePrincipalComponents(
          dataset.sources,
          rows,
          this.thresholds.minPcaRows,
        ),
      ),
      correlations: this.isolate("correlation", () =>
        ok(pairwiseCorrelations(dataset)),
      ).unwrapOr([]),
      heatmap: this.isolate("heatmap", () => summarizeHeatmap(dataset)),
    };
  }

  private statistics(
    dataset: AggregatedDataset,
  ): Record<string, StatisticalSummary> {
    return Object.fromEntries(
      dataset.sources.flatMap((source) => {
        const summary = summarizeValues(dataset.columns.get(source) ?? []);
        return summary ? [[source, summary] as const] : [];
      }),
    );
  }

  private trends(dataset: AggregatedDataset): Record<string, SourceTrend> {
    return Object.fromEntries(
      dataset.sources.flatMap((source) => {
        const values = seriesPoints(dataset, source).map((point) => point.value);
        const trend = sourceTrend(values);
        return trend ? [[source, trend] as const] : [];
      }),
    );
  }

  private anomalies(dataset: AggregatedDataset): Record<string, AnomalyReport> {
    return Object.fromEntries(
      dataset.sources.flatMap((source) => {
        const report = detectAnomalies(
          dataset.dates,
          dataset.columns.get(source) ?? [],
          this.thresholds.anomalyZThreshold,
        );
        return report ? [[source, report] as const] : [];
      }),
    );
  }

  /**
   * Runs one sub-analysis so a thrown error becomes its own typed failure.
   */
  private isolate<T>(
    name: string,
    run: () => SubAnalysis<T>,
  ): SubAnalysis<T> {
    const outcome = Result.fromThrowable(
      run,
      (error): AnalysisIssue => ({
        code: "computation_failed",
        message: `${name} analysis failed: ${toErrorMessage(error)}`,
      }),
    )().andThen((result) => result);

    if (outcome.isErr()) {
      logger.debug(
        { analysis: name, issue: outcome.error },
        "Sub-analysis degraded",
      );
    }

    return outcome;
  }
}
