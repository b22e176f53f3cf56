/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "invalid_input"
  | "validation_error"
  | "dimension_mismatch"
  | "cache_unavailable";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "stage" | "llm" | "embedding" | "cache";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Raised when a durable write or read against the memory store fails.
 * Always fatal to the pipeline run that hit it.
 */
export class PersistenceError extends Error {
  override readonly name = "PersistenceError";

  constructor(
    readonly operation: string,
    override readonly cause?: unknown,
  ) {
    super(
      `Memory store operation '${operation}' failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
    );
  }
}

export const toErrorDetails = (error: unknown) => {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
};

/**
 * Raised by inbound services when a request fails validation or references a missing entity.
 */
export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}
