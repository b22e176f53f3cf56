import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { ChatRequest, LlmPort } from "../../core/ports/outboundPorts";
import { HttpJsonClient } from "../http/httpJsonClient";

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
});

/**
 * Chat-model access for the LLM-backed stage handlers.
 */
export class OllamaLlm implements LlmPort {
  constructor(
    private readonly baseUrl: string,
    private readonly defaultModel: string,
    private readonly timeoutMs = 60_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async chat(request: ChatRequest): Promise<Result<string, AppBoundaryError>> {
    const model = request.model ?? this.defaultModel;
    const response = await this.httpClient.requestJson(
      {
        url: `${this.baseUrl}/api/chat`,
        method: "POST",
        headers: { "content-type": "application/json" },
        body: {
          model,
          stream: false,
          messages: request.messages,
          ...(request.json ? { format: "json" } : {}),
          ...(request.temperature === undefined
            ? {}
            : { options: { temperature: request.temperature } }),
        },
        timeoutMs: this.timeoutMs,
        signal: request.signal,
      },
      chatResponseSchema,
    );

    if (response.isErr()) {
      return err({
        source: "llm",
        code: response.error.code,
        provider: `ollama:${model}`,
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const content = response.value.message?.content.trim();
    if (!content) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: `ollama:${model}`,
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }
}
