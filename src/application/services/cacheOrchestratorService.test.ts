import { err, ok, type Result } from "neverthrow";
import { beforeEach, describe, expect, it } from "vitest";
import type { AnalysisRequest, CacheRecord } from "../../core/entities/analysis";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { NormalizedFindings } from "../../core/entities/findings";
import type {
  Completion,
  CompletionRequest,
} from "../../core/entities/modelCall";
import type {
  CacheRecordWrite,
  ChatCompletionPort,
  FindingsCacheRepositoryPort,
} from "../../core/ports/outboundPorts";
import { loadCatalog } from "../../infra/catalog/toolCatalog";
import { MockSeriesProvider } from "../../infra/providers/mocks/mockSeriesProvider";
import { CacheOrchestratorService } from "./cacheOrchestratorService";
import { FeatureExtractorService } from "./featureExtractorService";
import { FindingsNormalizer } from "./findingsNormalizer";
import { ModelCallChain } from "./modelCallChain";
import { OutputRecoveryParser } from "./outputRecoveryParser";
import { PerformanceTracker } from "./performanceTracker";
import { PromptBuilder } from "./promptBuilder";
import { resolveRequest } from "./requestKey";

type Reply = Result<Completion, AppBoundaryError>;

class InMemoryFindingsCache implements FindingsCacheRepositoryPort {
  readonly records = new Map<string, CacheRecord>();
  failLookups = false;

  async findActive(combinationHash: string): Promise<CacheRecord | null> {
    if (this.failLookups) {
      throw new Error("connection refused");
    }
    const record = this.records.get(combinationHash);
    return record?.isActive ? record : null;
  }

  async upsert(record: CacheRecordWrite): Promise<void> {
    this.records.set(record.combinationHash, {
      combinationHash: record.combinationHash,
      toolName: record.toolName,
      sourcesText: record.sourcesText,
      language: record.language,
      findings: record.findings,
      isActive: true,
      computedAt: new Date(Date.UTC(2026, 0, 1)),
    });
  }
}

class QueuedCompletions implements ChatCompletionPort {
  readonly calls: CompletionRequest[] = [];
  readonly replies: Reply[] = [];

  async complete(request: CompletionRequest): Promise<Reply> {
    this.calls.push(request);
    await Promise.resolve();
    return (
      this.replies.shift() ??
      err({
        source: "llm",
        code: "provider_error",
        provider: request.candidate.provider,
        message: "upstream unavailable",
        retryable: true,
      })
    );
  }
}

const modelReply = (body: Record<string, unknown>): Reply =>
  ok({ content: JSON.stringify(body), totalTokens: 100 });

const catalog = loadCatalog();

const multiRequest: AnalysisRequest = {
  toolName: "Benchmarking",
  sources: ["Google Trends", "Crossref"],
  language: "es",
  forceRefresh: false,
};

const singleRequest: AnalysisRequest = {
  toolName: "Benchmarking",
  sources: ["Google Trends"],
  language: "es",
  forceRefresh: false,
};

const storedFindings: NormalizedFindings = {
  executiveSummary: "stored summary",
  principalFindings: [],
  pcaAnalysis: "stored pca",
  heatmapAnalysis: "stored heatmap",
  confidenceScore: 0.9,
  modelUsed: "population-model",
  dataPointsAnalyzed: 240,
  analysisType: "multi_source",
};

const setup = (singleFlight = true) => {
  const cache = new InMemoryFindingsCache();
  const llm = new QueuedCompletions();
  const tracker = new PerformanceTracker();
  const orchestrator = new CacheOrchestratorService({
    catalog,
    series: new MockSeriesProvider(36),
    cache,
    extractor: new FeatureExtractorService(
      {
        minTemporalPoints: 12,
        minFourierPoints: 24,
        minPcaRows: 10,
        anomalyZThreshold: 2.5,
      },
      { now: () => new Date(Date.UTC(2008, 0, 1)) },
    ),
    prompts: new PromptBuilder(),
    models: new ModelCallChain(
      llm,
      {
        retryDelayMs: 1,
        maxRateLimitRetries: 0,
        candidates: [
          {
            provider: "groq",
            model: "model-a",
            maxTokens: 2000,
            temperature: 0.7,
            timeoutMs: 100,
          },
        ],
      },
      tracker,
    ),
    parser: new OutputRecoveryParser(),
    normalizer: new FindingsNormalizer(),
    tracker,
    singleFlight,
  });
  return { cache, llm, tracker, orchestrator };
};

const keyOf = (request: AnalysisRequest): string => {
  const resolved = resolveRequest(catalog, request);
  if (resolved.isErr()) {
    throw new Error(resolved.error.message);
  }
  return resolved.value.key;
};

describe("CacheOrchestratorService", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  it("serves a cached record without calling any model", async () => {
    const key = keyOf(multiRequest);
    ctx.cache.records.set(key, {
      combinationHash: key,
      toolName: "Benchmarking",
      sourcesText: "Google Trends, Crossref",
      language: "es",
      findings: storedFindings,
      isActive: true,
      computedAt: new Date(Date.UTC(2026, 0, 1)),
    });

    const response = await ctx.orchestrator.analyze(multiRequest);

    expect(response.success).toBe(true);
    expect(response.cacheHit).toBe(true);
    expect(response.source).toBe("precomputed");
    expect(response.data).toEqual(storedFindings);
    expect(ctx.llm.calls).toHaveLength(0);

    const metrics = ctx.orchestrator.getPerformanceMetrics();
    expect(metrics.models).toEqual({});
    expect(metrics.cacheHits).toBe(1);
    expect(metrics.cacheHitRate).toBe(100);
  });

  it("generates on a miss and overrides model-reported metadata", async () => {
    ctx.llm.replies.push(
      modelReply({
        executive_summary: "fresh summary",
        principal_findings: ["one", "two"],
        pca_analysis: "pca text",
        heatmap_analysis: "heatmap text",
        model_used: "claimed-model",
        data_points_analyzed: 1,
        response_time_ms: 1,
      }),
    );

    const response = await ctx.orchestrator.analyze(multiRequest);

    if (!response.success) {
      throw new Error(response.error);
    }
    expect(response.cacheHit).toBe(false);
    expect(response.source).toBe("fresh_generation");
    expect(response.data.modelUsed).toBe("model-a");
    expect(response.data.dataPointsAnalyzed).toBe(36);
    expect(response.data.analysisType).toBe("multi_source");
    expect(response.data.heatmapAnalysis).toBe("heatmap text");
    expect(ctx.llm.calls).toHaveLength(1);
    expect(ctx.orchestrator.getPerformanceMetrics().liveGenerations).toBe(1);
  });

  it("empties PCA and heatmap fields for single-source requests", async () => {
    ctx.llm.replies.push(
      modelReply({
        executive_summary: "single summary",
        principal_findings: [],
        pca_analysis: "should not survive",
        heatmap_analysis: "should not survive either",
        temporal_analysis: "trend text",
      }),
    );

    const response = await ctx.orchestrator.analyze(singleRequest);

    if (!response.success) {
      throw new Error(response.error);
    }
    expect(response.data.pcaAnalysis).toBe("");
    expect(response.data.heatmapAnalysis).toBe("");
    expect(response.data.temporalAnalysis).toBe("trend text");
    expect(response.data.analysisType).toBe("single_source");
  });

  it("bypasses the cache on forced refresh", async () => {
    const key = keyOf(multiRequest);
    ctx.cache.records.set(key, {
      combinationHash: key,
      toolName: "Benchmarking",
      sourcesText: "Google Trends, Crossref",
      language: "es",
      findings: storedFindings,
      isActive: true,
      computedAt: new Date(Date.UTC(2026, 0, 1)),
    });
    ctx.llm.replies.push(modelReply({ executive_summary: "regenerated" }));

    const response = await ctx.orchestrator.analyze({
      ...multiRequest,
      forceRefresh: true,
    });

    expect(response.source).toBe("fresh_generation");
    expect(response.data?.executiveSummary).toBe("regenerated");
  });

  it("treats a failing cache lookup as a miss", async () => {
    ctx.cache.failLookups = true;
    ctx.llm.replies.push(modelReply({ executive_summary: "generated anyway" }));

    const response = await ctx.orchestrator.analyze(multiRequest);

    expect(response.success).toBe(true);
    expect(response.source).toBe("fresh_generation");
  });

  it("returns an error envelope when every model fails", async () => {
    const response = await ctx.orchestrator.analyze(multiRequest);

    expect(response.success).toBe(false);
    expect(response.data).toBeNull();
    expect(response.source).toBeNull();
    expect(response.error).toBe(
      "All 1 models failed. Last error: upstream unavailable",
    );
    expect(ctx.orchestrator.getPerformanceMetrics().errorCount).toBe(1);
  });

  it("rejects requests without any known source", async () => {
    const response = await ctx.orchestrator.analyze({
      ...multiRequest,
      sources: ["Altavista"],
    });

    expect(response.success).toBe(false);
    expect(response.error).toBe("No known source among: Altavista.");
  });

  it("shares one generation between concurrent identical misses", async () => {
    ctx.llm.replies.push(modelReply({ executive_summary: "shared" }));

    const [first, second] = await Promise.all([
      ctx.orchestrator.analyze(multiRequest),
      ctx.orchestrator.analyze({ ...multiRequest, sources: ["crossref", "google_trends"] }),
    ]);

    expect(ctx.llm.calls).toHaveLength(1);
    expect(first.data?.executiveSummary).toBe("shared");
    expect(second.data?.executiveSummary).toBe("shared");
  });

  it("generates twice for concurrent misses when single-flight is off", async () => {
    const unguarded = setup(false);
    unguarded.llm.replies.push(
      modelReply({ executive_summary: "first" }),
      modelReply({ executive_summary: "second" }),
    );

    await Promise.all([
      unguarded.orchestrator.analyze(multiRequest),
      unguarded.orchestrator.analyze(multiRequest),
    ]);

    expect(unguarded.llm.calls).toHaveLength(2);
  });

  it("clears counters on explicit reset", async () => {
    await ctx.orchestrator.analyze(multiRequest);
    ctx.orchestrator.resetPerformanceStats();

    expect(ctx.orchestrator.getPerformanceMetrics()).toEqual({
      totalRequests: 0,
      cacheHits: 0,
      liveGenerations: 0,
      errorCount: 0,
      cacheHitRate: 0,
      averageResponseTimeMs: 0,
      models: {},
    });
  });
});
