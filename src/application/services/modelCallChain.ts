import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ChatMessage,
  ModelAttempt,
  ModelCandidate,
  ModelProbe,
  RawOutput,
} from "../../core/entities/modelCall";
import type { ChatCompletionPort } from "../../core/ports/outboundPorts";
import type { ModelCallConfig } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import type { PerformanceTracker } from "./performanceTracker";

const PROBE_MESSAGES: ChatMessage[] = [
  { role: "user", content: "Reply with the single word OK." },
];

const elapsedSince = (startedAt: number): number =>
  Math.round(performance.now() - startedAt);

/**
 * Tries candidate models strictly in order until one returns text.
 * A 429 retries the same model after a fixed delay; any other failure advances to the next one.
 */
export class ModelCallChain {
  constructor(
    private readonly llm: ChatCompletionPort,
    private readonly config: ModelCallConfig,
    private readonly tracker: PerformanceTracker,
  ) {}

  /**
   * Candidate order for one call; the requested model, if configured, goes first.
   */
  candidates(preferredModel = this.config.preferredModel): ModelCandidate[] {
    const preferred = this.config.candidates.filter(
      (candidate) => candidate.model === preferredModel,
    );
    const rest = this.config.candidates.filter(
      (candidate) => candidate.model !== preferredModel,
    );
    return [...preferred, ...rest];
  }

  async call(
    messages: ChatMessage[],
    preferredModel?: string,
  ): Promise<Result<RawOutput, AppBoundaryError>> {
    const candidates = this.candidates(preferredModel);
    if (candidates.length === 0) {
      return err({
        source: "llm",
        code: "config_invalid",
        provider: "chain",
        message: "No model candidates configured; set GROQ_API_KEY or OPENROUTER_API_KEY.",
        retryable: false,
      });
    }

    let lastError: AppBoundaryError | null = null;
    let attemptIndex = 0;

    for (const candidate of candidates) {
      const outcome = await this.tryCandidate(messages, candidate, attemptIndex);
      attemptIndex = outcome.nextAttemptIndex;
      if (outcome.result.isOk()) {
        return ok(outcome.result.value);
      }

      lastError = outcome.result.error;
      logger.warn(
        {
          model: candidate.model,
          provider: candidate.provider,
          code: lastError.code,
          error: lastError.message,
        },
        "Model failed, advancing to next candidate",
      );
    }

    const lastMessage = lastError?.message ?? "unknown error";
    logger.error(
      { candidates: candidates.length, lastError: lastMessage },
      "All model candidates failed",
    );
    return err({
      source: "llm",
      code: "all_models_failed",
      provider: lastError?.provider ?? "chain",
      message: `All ${candidates.length} models failed. Last error: ${lastMessage}`,
      retryable: false,
      httpStatus: lastError?.httpStatus,
      cause: lastError,
    });
  }

  /**
   * One-shot availability check per candidate; leaves the performance counters alone.
   */
  async probeModels(): Promise<ModelProbe[]> {
    const probes: ModelProbe[] = [];
    for (const candidate of this.config.candidates) {
      const startedAt = performance.now();
      const result = await this.llm.complete({
        candidate: { ...candidate, maxTokens: 10, temperature: 0 },
        messages: PROBE_MESSAGES,
      });
      probes.push({
        model: candidate.model,
        provider: candidate.provider,
        available: result.isOk(),
        elapsedMs: elapsedSince(startedAt),
        ...(result.isErr() ? { error: result.error.message } : {}),
      });
    }
    return probes;
  }

  private async tryCandidate(
    messages: ChatMessage[],
    candidate: ModelCandidate,
    firstAttemptIndex: number,
  ): Promise<{
    result: Result<RawOutput, AppBoundaryError>;
    nextAttemptIndex: number;
  }> {
    let attemptIndex = firstAttemptIndex;

    for (let retry = 0; ; retry += 1) {
      const attempt: ModelAttempt = { candidate, attemptIndex };
      attemptIndex += 1;
      const startedAt = performance.now();
      logger.debug(
        { model: candidate.model, attemptIndex: attempt.attemptIndex, retry },
        "Calling model",
      );

      const response = await this.llm.complete({ candidate, messages });
      const elapsedMs = elapsedSince(startedAt);

      if (response.isOk()) {
        this.tracker.recordModelCall(candidate.model, {
          success: true,
          elapsedMs,
          tokens: response.value.totalTokens,
        });
        return {
          result: ok({
            rawText: response.value.content,
            modelUsed: candidate.model,
            provider: candidate.provider,
            tokenCount: response.value.totalTokens,
            elapsedMs,
          }),
          nextAttemptIndex: attemptIndex,
        };
      }

      this.tracker.recordModelCall(candidate.model, {
        success: false,
        elapsedMs,
        tokens: 0,
      });

      const rateLimited = response.error.code === "rate_limited";
      if (!rateLimited || retry >= this.config.maxRateLimitRetries) {
        return { result: err(response.error), nextAttemptIndex: attemptIndex };
      }

      logger.warn(
        {
          model: candidate.model,
          retry: retry + 1,
          delayMs: this.config.retryDelayMs,
        },
        "Model rate limited, retrying after delay",
      );
      await this.delay(this.config.retryDelayMs);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
