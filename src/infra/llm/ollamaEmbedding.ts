import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";

const embedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).default([]),
});

/**
 * Text embeddings for recall and insight storage. Vectors must match the pgvector column width.
 */
export class OllamaEmbedding implements EmbeddingPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly expectedDimension: number,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    if (texts.length === 0) {
      return ok([]);
    }

    const response = await this.httpClient.requestJson(
      {
        url: `${this.baseUrl}/api/embed`,
        method: "POST",
        headers: { "content-type": "application/json" },
        body: { model: this.model, input: texts },
        timeoutMs: this.timeoutMs,
      },
      embedResponseSchema,
    );

    if (response.isErr()) {
      return err(
        this.failure(response.error.code, response.error.message, {
          retryable: response.error.retryable,
          httpStatus: response.error.httpStatus,
          cause: response.error.cause,
        }),
      );
    }

    const vectors = response.value.embeddings;
    if (vectors.length !== texts.length) {
      return err(
        this.failure(
          "malformed_response",
          `Ollama embedding response size mismatch. Expected ${texts.length}, got ${vectors.length}.`,
        ),
      );
    }

    const mismatch = vectors.findIndex(
      (vector) => vector.length !== this.expectedDimension,
    );
    if (mismatch >= 0) {
      return err(
        this.failure(
          "dimension_mismatch",
          `Embedding dimension mismatch for index ${mismatch}. Expected ${this.expectedDimension}, got ${vectors[mismatch]?.length ?? 0}.`,
        ),
      );
    }

    if (vectors.some((vector) => vector.some((v) => !Number.isFinite(v)))) {
      return err(
        this.failure(
          "validation_error",
          "Embedding vector contains non-finite values.",
        ),
      );
    }

    return ok(vectors);
  }

  private failure(
    code: AppBoundaryError["code"],
    message: string,
    extra: Partial<Pick<AppBoundaryError, "retryable" | "httpStatus" | "cause">> = {},
  ): AppBoundaryError {
    return {
      source: "embedding",
      code,
      provider: "ollama",
      message,
      retryable: extra.retryable ?? false,
      httpStatus: extra.httpStatus,
      cause: extra.cause,
    };
  }
}
