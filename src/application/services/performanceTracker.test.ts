import { describe, expect, it } from "vitest";
import { PerformanceTracker } from "./performanceTracker";

describe("PerformanceTracker", () => {
  it("aggregates request outcomes and response time", () => {
    const tracker = new PerformanceTracker();
    tracker.recordRequest("cache_hit", 10);
    tracker.recordRequest("live_generation", 50);
    tracker.recordRequest("error", 30);
    tracker.recordRequest("cache_hit", 10);

    expect(tracker.snapshot()).toEqual({
      totalRequests: 4,
      cacheHits: 2,
      liveGenerations: 1,
      errorCount: 1,
      cacheHitRate: 50,
      averageResponseTimeMs: 25,
      models: {},
    });
  });

  it("derives per-model rates", () => {
    const tracker = new PerformanceTracker();
    tracker.recordModelCall("model-a", { success: true, elapsedMs: 100, tokens: 40 });
    tracker.recordModelCall("model-a", { success: false, elapsedMs: 300, tokens: 0 });

    expect(tracker.modelStats("model-a")).toEqual({
      totalRequests: 2,
      successfulRequests: 1,
      failedRequests: 1,
      totalResponseTimeMs: 400,
      totalTokens: 40,
      avgResponseTimeMs: 200,
      successRate: 50,
    });
    expect(tracker.modelStats("model-b")).toBeNull();
  });

  it("clears everything on reset", () => {
    const tracker = new PerformanceTracker();
    tracker.recordRequest("live_generation", 5);
    tracker.recordModelCall("model-a", { success: true, elapsedMs: 5, tokens: 1 });

    tracker.reset();

    expect(tracker.snapshot().totalRequests).toBe(0);
    expect(tracker.snapshot().models).toEqual({});
  });
});
