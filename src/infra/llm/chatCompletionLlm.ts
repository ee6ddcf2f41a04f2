import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  Completion,
  CompletionRequest,
} from "../../core/entities/modelCall";
import type { ChatCompletionPort } from "../../core/ports/outboundPorts";
import type { ProviderConfig } from "../../shared/config/env";
import { HttpJsonClient, type HttpClientError } from "../http/httpJsonClient";

const TOP_P = 0.9;

const chatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      }),
    )
    .default([]),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

/**
 * OpenAI-compatible chat completions for every configured provider; one attempt per call, retries belong to the caller.
 */
export class ChatCompletionLlm implements ChatCompletionPort {
  private readonly providers: Map<string, ProviderConfig>;

  constructor(
    providers: ReadonlyArray<ProviderConfig>,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    this.providers = new Map(
      providers.map((provider) => [provider.name, provider]),
    );
  }

  async complete(
    request: CompletionRequest,
  ): Promise<Result<Completion, AppBoundaryError>> {
    const { candidate, messages } = request;
    const provider = this.providers.get(candidate.provider);
    if (!provider) {
      return err({
        source: "llm",
        code: "config_invalid",
        provider: candidate.provider,
        message: `No configuration for provider ${candidate.provider}.`,
        retryable: false,
      });
    }

    const response = await this.httpClient.requestJson({
      url: `${provider.baseUrl}/chat/completions`,
      method: "POST",
      headers: this.headers(provider),
      body: {
        model: candidate.model,
        messages,
        max_tokens: candidate.maxTokens,
        temperature: candidate.temperature,
        top_p: TOP_P,
      },
      timeoutMs: candidate.timeoutMs,
    });

    if (response.isErr()) {
      return err(this.toBoundaryError(provider.name, response.error));
    }

    const parsed = chatCompletionSchema.safeParse(response.value.body);
    if (!parsed.success) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: provider.name,
        message: `Chat completion payload did not match the expected shape: ${parsed.error.message}`,
        retryable: false,
      });
    }

    const content = parsed.data.choices
      .map((choice) => choice.message.content?.trim() ?? "")
      .find((text) => text.length > 0);
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: provider.name,
        message: `${candidate.model} returned no message content.`,
        retryable: false,
      });
    }

    return ok({
      content,
      totalTokens: parsed.data.usage?.total_tokens ?? 0,
    });
  }

  private headers(provider: ProviderConfig): Record<string, string> {
    return {
      "content-type": "application/json",
      authorization: `Bearer ${provider.apiKey}`,
      ...(provider.referer ? { "HTTP-Referer": provider.referer } : {}),
      ...(provider.title ? { "X-Title": provider.title } : {}),
    };
  }

  private toBoundaryError(
    provider: string,
    error: HttpClientError,
  ): AppBoundaryError {
    return {
      source: "llm",
      code: this.mapHttpCode(error.httpStatus, error.code),
      provider,
      message: error.message,
      retryable: error.retryable,
      httpStatus: error.httpStatus,
      cause: error.cause,
    };
  }

  private mapHttpCode(
    httpStatus: number | undefined,
    errorCode: HttpClientError["code"],
  ): AppBoundaryError["code"] {
    if (httpStatus === 429) {
      return "rate_limited";
    }

    if (httpStatus === 401 || httpStatus === 403) {
      return "auth_invalid";
    }

    if (errorCode === "timeout") {
      return "timeout";
    }

    if (errorCode === "invalid_json") {
      return "invalid_json";
    }

    if (errorCode === "transport_error") {
      return "transport_error";
    }

    return "provider_error";
  }
}
