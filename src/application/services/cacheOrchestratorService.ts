import { err, ok, ResultAsync, type Result } from "neverthrow";
import type {
  AnalysisRequest,
  AnalysisResponse,
  CacheRecord,
  ResolvedRequest,
} from "../../core/entities/analysis";
import {
  toErrorMessage,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type { NormalizedFindings } from "../../core/entities/findings";
import type {
  CatalogPort,
  SeriesProviderPort,
} from "../../core/ports/inboundPorts";
import type { FindingsCacheRepositoryPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { joinSeries } from "../analysis/dataset";
import type { FeatureExtractorService } from "./featureExtractorService";
import type { FindingsNormalizer } from "./findingsNormalizer";
import type { ModelCallChain } from "./modelCallChain";
import type { OutputRecoveryParser } from "./outputRecoveryParser";
import type {
  PerformanceMetrics,
  PerformanceTracker,
} from "./performanceTracker";
import type { PromptBuilder } from "./promptBuilder";
import { resolveRequest } from "./requestKey";

export type GeneratedFindings = {
  request: ResolvedRequest;
  findings: NormalizedFindings;
};

export type CacheOrchestratorDeps = {
  catalog: CatalogPort;
  series: SeriesProviderPort;
  cache: FindingsCacheRepositoryPort;
  extractor: FeatureExtractorService;
  prompts: PromptBuilder;
  models: ModelCallChain;
  parser: OutputRecoveryParser;
  normalizer: FindingsNormalizer;
  tracker: PerformanceTracker;
  singleFlight: boolean;
};

const elapsedSince = (startedAt: number): number =>
  Math.round(performance.now() - startedAt);

const keyPrefix = (key: string): string => key.slice(0, 12);

/**
 * Cache-first entry point: resolve and key the request, serve precomputed findings, or drive one fresh generation.
 */
export class CacheOrchestratorService {
  private readonly inFlight = new Map<
    string,
    Promise<Result<GeneratedFindings, AppBoundaryError>>
  >();

  constructor(private readonly deps: CacheOrchestratorDeps) {}

  /**
   * Never throws; every failure comes back as a `success: false` envelope.
   */
  async analyze(request: AnalysisRequest): Promise<AnalysisResponse> {
    const startedAt = performance.now();
    const resolved = resolveRequest(this.deps.catalog, request);
    if (resolved.isErr()) {
      return this.failure(resolved.error, startedAt);
    }

    const context = {
      tool: resolved.value.toolName,
      sources: resolved.value.sourcesText,
      language: resolved.value.language,
      key: keyPrefix(resolved.value.key),
    };

    if (!request.forceRefresh) {
      const cached = await this.lookup(resolved.value);
      if (cached) {
        const responseTimeMs = elapsedSince(startedAt);
        this.deps.tracker.recordRequest("cache_hit", responseTimeMs);
        logger.info(context, "Serving precomputed findings");
        return {
          success: true,
          data: cached.findings,
          cacheHit: true,
          responseTimeMs,
          source: "precomputed",
          error: null,
        };
      }
    }

    logger.info(
      { ...context, forceRefresh: request.forceRefresh },
      "Generating fresh findings",
    );
    const generated = await this.generateOnce(resolved.value);
    if (generated.isErr()) {
      logger.error({ ...context, error: generated.error }, "Analysis failed");
      return this.failure(generated.error, startedAt);
    }

    const responseTimeMs = elapsedSince(startedAt);
    this.deps.tracker.recordRequest("live_generation", responseTimeMs);
    return {
      success: true,
      data: generated.value.findings,
      cacheHit: false,
      responseTimeMs,
      source: "fresh_generation",
      error: null,
    };
  }

  /**
   * Extract, prompt, call, parse and normalize for an already-resolved request, bypassing the cache.
   */
  async generate(
    request: ResolvedRequest,
  ): Promise<Result<GeneratedFindings, AppBoundaryError>> {
    const startedAt = performance.now();
    const series = await this.deps.series.fetchSeries({
      toolName: request.toolName,
      sources: request.sources,
    });
    if (series.isErr()) {
      return err(series.error);
    }

    const features = this.deps.extractor.extract(
      joinSeries(series.value),
      request.sources,
    );
    if (features.isErr()) {
      return err({
        source: "analysis",
        code: "source_not_found",
        provider: "feature-extractor",
        message: features.error.message,
        retryable: false,
      });
    }

    const messages = this.deps.prompts.build({
      toolName: request.toolDisplayName,
      sources: request.sources,
      language: request.language,
      features: features.value,
    });

    const raw = await this.deps.models.call(messages);
    if (raw.isErr()) {
      return err(raw.error);
    }

    const outcome = this.deps.parser.parse(raw.value.rawText, request.language);
    logger.info(
      {
        key: keyPrefix(request.key),
        model: raw.value.modelUsed,
        strategy: outcome.kind,
      },
      "Parsed model output",
    );

    const findings = this.deps.normalizer.normalize(outcome.findings, {
      modelUsed: raw.value.modelUsed,
      responseTimeMs: elapsedSince(startedAt),
      dataPointsAnalyzed: features.value.dataPoints,
      analysisType:
        request.sources.length === 1 ? "single_source" : "multi_source",
    });

    return ok({ request, findings });
  }

  getPerformanceMetrics(): PerformanceMetrics {
    return this.deps.tracker.snapshot();
  }

  resetPerformanceStats(): void {
    this.deps.tracker.reset();
    logger.info("Performance counters reset");
  }

  /**
   * Lookup failures count as misses.
   */
  private async lookup(request: ResolvedRequest): Promise<CacheRecord | null> {
    const found = await ResultAsync.fromPromise(
      this.deps.cache.findActive(request.key),
      (error): AppBoundaryError => ({
        source: "cache",
        code: "cache_lookup_failed",
        provider: "findings-cache",
        message: toErrorMessage(error),
        retryable: true,
        cause: error,
      }),
    );

    if (found.isErr()) {
      logger.warn(
        { key: keyPrefix(request.key), error: found.error.message },
        "Cache lookup failed, treating as miss",
      );
      return null;
    }

    return found.value;
  }

  /**
   * Shares one in-flight generation per key when single-flight is on.
   */
  private generateOnce(
    request: ResolvedRequest,
  ): Promise<Result<GeneratedFindings, AppBoundaryError>> {
    if (!this.deps.singleFlight) {
      return this.generateSafely(request);
    }

    const pending = this.inFlight.get(request.key);
    if (pending) {
      logger.debug(
        { key: keyPrefix(request.key) },
        "Joining in-flight generation",
      );
      return pending;
    }

    const generation = this.generateSafely(request).finally(() => {
      this.inFlight.delete(request.key);
    });
    this.inFlight.set(request.key, generation);
    return generation;
  }

  private async generateSafely(
    request: ResolvedRequest,
  ): Promise<Result<GeneratedFindings, AppBoundaryError>> {
    const outcome = await ResultAsync.fromPromise(
      this.generate(request),
      (error): AppBoundaryError => ({
        source: "analysis",
        code: "provider_error",
        provider: "pipeline",
        message: toErrorMessage(error),
        retryable: false,
        cause: error,
      }),
    );
    return outcome.andThen((result) => result);
  }

  private failure(error: AppBoundaryError, startedAt: number): AnalysisResponse {
    const responseTimeMs = elapsedSince(startedAt);
    this.deps.tracker.recordRequest("error", responseTimeMs);
    return {
      success: false,
      data: null,
      cacheHit: false,
      responseTimeMs,
      source: null,
      error: error.message,
    };
  }
}
