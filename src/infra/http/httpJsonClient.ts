import { err, ok, type Result } from "neverthrow";
import type { ZodType, ZodTypeDef } from "zod";

type HttpMethod = "GET" | "POST";

export type HttpJsonRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  /**
   * Caller cancellation, e.g. the stage executor's per-attempt deadline.
   */
  signal?: AbortSignal;
};

export type HttpClientErrorCode =
  | "timeout"
  | "transport_error"
  | "rate_limited"
  | "auth_invalid"
  | "provider_error"
  | "invalid_json"
  | "malformed_response";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const classifyStatus = (
  status: number,
): Pick<HttpClientError, "code" | "retryable"> => {
  if (status === 429) {
    return { code: "rate_limited", retryable: true };
  }
  if (status === 401 || status === 403) {
    return { code: "auth_invalid", retryable: false };
  }
  return { code: "provider_error", retryable: status >= 500 };
};

const isAbortError = (error: unknown): boolean =>
  error instanceof Error && error.name === "AbortError";

/**
 * Single-shot JSON transport shared by the LLM and embedding adapters.
 * Retries are owned by the stage executor, so a failure here is reported once with its retryability.
 */
export class HttpJsonClient {
  async requestJson<T>(
    request: HttpJsonRequest,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const forwardAbort = () => controller.abort();
    request.signal?.addEventListener("abort", forwardAbort, { once: true });

    try {
      if (request.signal?.aborted) {
        controller.abort();
      }

      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        return err({
          ...classifyStatus(response.status),
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
        });
      }

      let payload: unknown;
      try {
        payload = await response.json();
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }

      const parsed = schema.safeParse(payload);
      if (!parsed.success) {
        return err({
          code: "malformed_response",
          message: `HTTP response body had an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}.`,
          retryable: false,
          cause: parsed.error,
        });
      }
      return ok(parsed.data);
    } catch (error) {
      if (isAbortError(error)) {
        return err({
          code: "timeout",
          message: request.signal?.aborted
            ? "HTTP request was cancelled."
            : "HTTP request timed out.",
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
      request.signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
