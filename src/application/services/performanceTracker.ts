export type ModelStats = {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalResponseTimeMs: number;
  totalTokens: number;
  avgResponseTimeMs: number;
  successRate: number;
};

export type PerformanceMetrics = {
  totalRequests: number;
  cacheHits: number;
  liveGenerations: number;
  errorCount: number;
  cacheHitRate: number;
  averageResponseTimeMs: number;
  models: Record<string, ModelStats>;
};

type ModelCounters = Omit<ModelStats, "avgResponseTimeMs" | "successRate">;

const emptyModel = (): ModelCounters => ({
  totalRequests: 0,
  successfulRequests: 0,
  failedRequests: 0,
  totalResponseTimeMs: 0,
  totalTokens: 0,
});

/**
 * Process-lifetime request and per-model counters; only `reset()` clears them.
 */
export class PerformanceTracker {
  private totalRequests = 0;
  private cacheHits = 0;
  private liveGenerations = 0;
  private errorCount = 0;
  private totalResponseTimeMs = 0;
  private readonly models = new Map<string, ModelCounters>();

  recordRequest(
    outcome: "cache_hit" | "live_generation" | "error",
    responseTimeMs: number,
  ): void {
    this.totalRequests += 1;
    this.totalResponseTimeMs += responseTimeMs;
    if (outcome === "cache_hit") this.cacheHits += 1;
    if (outcome === "live_generation") this.liveGenerations += 1;
    if (outcome === "error") this.errorCount += 1;
  }

  recordModelCall(
    model: string,
    outcome: { success: boolean; elapsedMs: number; tokens: number },
  ): void {
    const counters = this.models.get(model) ?? emptyModel();
    counters.totalRequests += 1;
    counters.totalResponseTimeMs += outcome.elapsedMs;
    counters.totalTokens += outcome.tokens;
    if (outcome.success) {
      counters.successfulRequests += 1;
    } else {
      counters.failedRequests += 1;
    }
    this.models.set(model, counters);
  }

  modelStats(model: string): ModelStats | null {
    const counters = this.models.get(model);
    return counters ? withRates(counters) : null;
  }

  snapshot(): PerformanceMetrics {
    return {
      totalRequests: this.totalRequests,
      cacheHits: this.cacheHits,
      liveGenerations: this.liveGenerations,
      errorCount: this.errorCount,
      cacheHitRate:
        this.totalRequests > 0 ? (this.cacheHits / this.totalRequests) * 100 : 0,
      averageResponseTimeMs:
        this.totalRequests > 0 ? this.totalResponseTimeMs / this.totalRequests : 0,
      models: Object.fromEntries(
        [...this.models.entries()].map(([model, counters]) => [
          model,
          withRates(counters),
        ]),
      ),
    };
  }

  reset(): void {
    this.totalRequests = 0;
    this.cacheHits = 0;
    this.liveGenerations = 0;
    this.errorCount = 0;
    this.totalResponseTimeMs = 0;
    this.models.clear();
  }
}

const withRates = (counters: ModelCounters): ModelStats => ({
  ...counters,
  avgResponseTimeMs:
    counters.totalRequests > 0
      ? counters.totalResponseTimeMs / counters.totalRequests
      : 0,
  successRate:
    counters.totalRequests > 0
      ? (counters.successfulRequests / counters.totalRequests) * 100
      : 0,
});
