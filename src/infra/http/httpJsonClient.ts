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
  cause?: unknown;
};

/**
 * Centralizes one-shot HTTP JSON reads so adapters share one timeout and status parsing policy.
 */
export class HttpJsonClient {
  /**
   * Issues a single GET with no retry; the first failure is the result.
   */
  async getJson<T = unknown>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
        });
      }

      try {
        return ok((await response.json()) as T);
      } catch (jsonError) {
        if (controller.signal.aborted) {
          return err(this.timeoutError(request.timeoutMs, jsonError));
        }

        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof Error && error.name === "AbortError";

      if (isTimeoutError) {
        return err(this.timeoutError(request.timeoutMs, error));
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private timeoutError(timeoutMs: number, cause: unknown): HttpClientError {
    return {
      code: "timeout",
      message: `HTTP request timed out after ${timeoutMs}ms.`,
      cause,
    };
  }
}
