import { err, ok, type Result } from "neverthrow";
import { describe, expect, it } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  Completion,
  CompletionRequest,
  ModelCandidate,
} from "../../core/entities/modelCall";
import type { ChatCompletionPort } from "../../core/ports/outboundPorts";
import { ModelCallChain } from "./modelCallChain";
import { PerformanceTracker } from "./performanceTracker";

type Reply = Result<Completion, AppBoundaryError>;

const candidate = (model: string): ModelCandidate => ({
  provider: "groq",
  model,
  maxTokens: 2000,
  temperature: 0.7,
  timeoutMs: 100,
});

const failure = (
  code: AppBoundaryError["code"],
  message: string,
): Reply =>
  err({ source: "llm", code, provider: "groq", message, retryable: true });

/**
 * Replays queued replies per model and records every call it receives.
 */
class ScriptedCompletions implements ChatCompletionPort {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, Reply[]>) {}

  async complete(request: CompletionRequest): Promise<Reply> {
    this.calls.push(request.candidate.model);
    const next = this.script[request.candidate.model]?.shift();
    return next ?? failure("provider_error", `no reply scripted for ${request.candidate.model}`);
  }
}

const chainFor = (
  script: Record<string, Reply[]>,
  overrides: { preferredModel?: string; maxRateLimitRetries?: number } = {},
) => {
  const llm = new ScriptedCompletions(script);
  const tracker = new PerformanceTracker();
  const chain = new ModelCallChain(
    llm,
    {
      retryDelayMs: 1,
      maxRateLimitRetries: overrides.maxRateLimitRetries ?? 2,
      candidates: [candidate("model-a"), candidate("model-b"), candidate("model-c")],
      preferredModel: overrides.preferredModel,
    },
    tracker,
  );
  return { llm, tracker, chain };
};

describe("ModelCallChain", () => {
  it("returns the first model's text with measured metadata", async () => {
    const { chain, llm } = chainFor({
      "model-a": [ok({ content: "answer", totalTokens: 42 })],
    });

    const result = await chain.call([{ role: "user", content: "prompt" }]);

    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.rawText).toBe("answer");
    expect(result.value.modelUsed).toBe("model-a");
    expect(result.value.tokenCount).toBe(42);
    expect(llm.calls).toEqual(["model-a"]);
  });

  it("retries the same model on rate limits before succeeding", async () => {
    const { chain, llm, tracker } = chainFor({
      "model-a": [
        failure("rate_limited", "429"),
        ok({ content: "after retry", totalTokens: 5 }),
      ],
    });

    const result = await chain.call([]);

    expect(result.isOk()).toBe(true);
    expect(llm.calls).toEqual(["model-a", "model-a"]);
    expect(tracker.modelStats("model-a")).toMatchObject({
      totalRequests: 2,
      successfulRequests: 1,
      failedRequests: 1,
      totalTokens: 5,
      successRate: 50,
    });
  });

  it("advances after the rate-limit retry cap", async () => {
    const { chain, llm } = chainFor(
      {
        "model-a": [failure("rate_limited", "429"), failure("rate_limited", "429")],
        "model-b": [ok({ content: "b", totalTokens: 1 })],
      },
      { maxRateLimitRetries: 1 },
    );

    const result = await chain.call([]);

    expect(result.isOk() && result.value.modelUsed).toBe("model-b");
    expect(llm.calls).toEqual(["model-a", "model-a", "model-b"]);
  });

  it("advances immediately on timeout", async () => {
    const { chain, llm } = chainFor({
      "model-a": [failure("timeout", "HTTP request timed out after 100ms.")],
      "model-b": [ok({ content: "b", totalTokens: 1 })],
    });

    const result = await chain.call([]);

    expect(result.isOk() && result.value.modelUsed).toBe("model-b");
    expect(llm.calls).toEqual(["model-a", "model-b"]);
  });

  it("tries the requested model first", async () => {
    const { chain, llm } = chainFor(
      { "model-c": [ok({ content: "c", totalTokens: 1 })] },
      { preferredModel: "model-c" },
    );

    await chain.call([]);

    expect(llm.calls).toEqual(["model-c"]);
  });

  it("fails with the last error once every model is exhausted", async () => {
    const { chain } = chainFor({
      "model-a": [failure("provider_error", "a broke")],
      "model-b": [failure("timeout", "b timed out")],
      "model-c": [failure("auth_invalid", "c rejected key")],
    });

    const result = await chain.call([]);

    if (result.isOk()) {
      throw new Error("expected failure");
    }
    expect(result.error.code).toBe("all_models_failed");
    expect(result.error.message).toBe(
      "All 3 models failed. Last error: c rejected key",
    );
  });

  it("probes every candidate without touching counters", async () => {
    const { chain, tracker } = chainFor({
      "model-a": [ok({ content: "OK", totalTokens: 1 })],
      "model-b": [failure("timeout", "slow")],
      "model-c": [ok({ content: "OK", totalTokens: 1 })],
    });

    const probes = await chain.probeModels();

    expect(probes.map((probe) => [probe.model, probe.available, probe.error])).toEqual([
      ["model-a", true, undefined],
      ["model-b", false, "slow"],
      ["model-c", true, undefined],
    ]);
    expect(tracker.snapshot().models).toEqual({});
  });
});
