import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

/**
 * Centralizes HTTP JSON IO so adapters share one timeout and status parsing policy.
 * Performs exactly one attempt; retry scheduling belongs to the caller.
 */
export class HttpJsonClient {
  async requestJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (jsonError) {
        // The timer still runs while the body streams in.
        if (isAbortError(jsonError)) {
          return err({
            code: "timeout",
            message: `HTTP request timed out after ${request.timeoutMs}ms.`,
            retryable: true,
            cause: jsonError,
          });
        }
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
