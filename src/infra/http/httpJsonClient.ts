import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
};

export type HttpJsonResponse = {
  body: unknown;
  status: number;
  elapsedMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  elapsedMs: number;
  cause?: unknown;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error &&
  (error.name === "AbortError" || error.name === "TimeoutError");

/**
 * Shared JSON-over-HTTP transport: one attempt per request with a single timeout and status policy.
 * Failures carry `retryable` so callers own the retry decision.
 * The body comes back undecoded so each adapter validates its own payload shape.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<HttpJsonResponse, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const startedAt = performance.now();
    const elapsed = () => Math.round(performance.now() - startedAt);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        const detail = await response.text().catch(() => "");

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}${
            detail ? `: ${detail.slice(0, 200)}` : "."
          }`,
          httpStatus: response.status,
          retryable,
          elapsedMs: elapsed(),
        });
      }

      try {
        const body: unknown = await response.json();
        return ok({ body, status: response.status, elapsedMs: elapsed() });
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          elapsedMs: elapsed(),
          cause: jsonError,
        });
      }
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          elapsedMs: elapsed(),
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        elapsedMs: elapsed(),
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
