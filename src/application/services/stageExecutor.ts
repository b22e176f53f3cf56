import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import { toErrorDetails } from "../../core/entities/appError";
import type { PipelineGraph } from "../../core/pipeline/graph";
import {
  stageSchemas,
  type StageInput,
  type StageName,
  type StageOutput,
} from "../../core/pipeline/stages";
import type { StageHandlers } from "../../core/ports/inboundPorts";
import type { CacheStorePort } from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";
import { delay } from "../../shared/utils/concurrency";
import { stageFingerprint } from "../../shared/utils/fingerprint";

export type StageErrorClassification = "transient" | "permanent";

export type StageError = {
  stage: StageName;
  classification: StageErrorClassification;
  code: string;
  message: string;
  attempts: number;
  cause?: unknown;
};

export type StageExecutorOptions = {
  maxRetries: number;
  baseDelayMs: number;
};

type AttemptFailure = {
  code: string;
  message: string;
  retryable: boolean;
  cause?: unknown;
};

const fromBoundary = (error: AppBoundaryError): AttemptFailure => ({
  code: error.code,
  message: error.message,
  retryable: error.retryable,
  cause: error,
});

const STAGE_TIMEOUT = Symbol("stage-timeout");

/**
 * Runs one opaque stage call: input validation, cache, per-attempt timeout,
 * bounded retries for transient failures and strict decoding of the output.
 * Never touches research state.
 */
export class StageExecutor {
  constructor(
    private readonly handlers: StageHandlers,
    private readonly cache: CacheStorePort,
    private readonly graph: PipelineGraph,
    private readonly options: StageExecutorOptions,
    private readonly logger: Logger,
    private readonly sleep: (ms: number) => Promise<void> = delay,
  ) {}

  async execute<S extends StageName>(
    stage: S,
    input: StageInput<S>,
  ): Promise<Result<StageOutput<S>, StageError>> {
    const schemas = stageSchemas[stage];
    const parsedInput = schemas.input.safeParse(input);
    if (!parsedInput.success) {
      return err({
        stage,
        classification: "permanent",
        code: "invalid_input",
        message: `Input for stage '${stage}' failed validation: ${parsedInput.error.message}`,
        attempts: 0,
        cause: parsedInput.error,
      });
    }

    const key = stageFingerprint(stage, parsedInput.data);
    const cached = await this.readCache(stage, key);
    if (cached !== null) {
      return ok(cached);
    }

    const settings = this.graph.settings[stage];
    const maxAttempts = this.options.maxRetries + 1;
    let lastFailure: AttemptFailure | null = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const outcome = await this.attempt(
        stage,
        parsedInput.data,
        attempt,
        settings.timeoutMs,
      );

      if (outcome.isOk()) {
        await this.writeCache(stage, key, outcome.value, settings.cacheTtlSeconds);
        return ok(outcome.value);
      }

      lastFailure = outcome.error;
      this.logger.warn(
        {
          stage,
          attempt,
          maxAttempts,
          code: lastFailure.code,
          retryable: lastFailure.retryable,
        },
        "Stage attempt failed",
      );

      if (!lastFailure.retryable) {
        return err({
          stage,
          classification: "permanent",
          code: lastFailure.code,
          message: lastFailure.message,
          attempts: attempt,
          cause: lastFailure.cause,
        });
      }

      if (attempt < maxAttempts) {
        await this.sleep(this.options.baseDelayMs * 2 ** (attempt - 1));
      }
    }

    return err({
      stage,
      classification: "transient",
      code: lastFailure?.code ?? "retries_exhausted",
      message: lastFailure?.message ?? `Stage '${stage}' exhausted its retries.`,
      attempts: maxAttempts,
      cause: lastFailure?.cause,
    });
  }

  private async attempt<S extends StageName>(
    stage: S,
    input: StageInput<S>,
    attempt: number,
    timeoutMs: number,
  ): Promise<Result<StageOutput<S>, AttemptFailure>> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<typeof STAGE_TIMEOUT>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(STAGE_TIMEOUT);
      }, timeoutMs);
    });

    let raw: Result<unknown, AppBoundaryError> | typeof STAGE_TIMEOUT;
    try {
      const handler: StageHandlers[S] = this.handlers[stage];
      raw = await Promise.race([
        handler(input, { stage, attempt, signal: controller.signal }),
        deadline,
      ]);
    } catch (error) {
      this.logger.error(
        { stage, attempt, error: toErrorDetails(error) },
        "Stage handler threw",
      );
      return err({
        code: "handler_exception",
        message: error instanceof Error ? error.message : String(error),
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    if (raw === STAGE_TIMEOUT) {
      return err({
        code: "timeout",
        message: `Stage '${stage}' exceeded ${timeoutMs}ms.`,
        retryable: true,
      });
    }

    if (raw.isErr()) {
      return err(fromBoundary(raw.error));
    }

    const decoded = stageSchemas[stage].output.safeParse(raw.value);
    if (!decoded.success) {
      return err({
        code: "validation_error",
        message: `Output of stage '${stage}' failed validation: ${decoded.error.message}`,
        retryable: false,
        cause: decoded.error,
      });
    }

    return ok(decoded.data);
  }

  private async readCache<S extends StageName>(
    stage: S,
    key: string,
  ): Promise<StageOutput<S> | null> {
    const entry = await this.cache.get(key);
    if (entry.isErr()) {
      this.logger.warn(
        { stage, key, code: entry.error.code, message: entry.error.message },
        "Cache unavailable, treating as miss",
      );
      return null;
    }

    if (entry.value === null) {
      return null;
    }

    const decoded = stageSchemas[stage].output.safeParse(entry.value.value);
    if (!decoded.success) {
      this.logger.warn({ stage, key }, "Cached stage output failed to decode");
      return null;
    }

    this.logger.debug({ stage, key }, "Stage served from cache");
    return decoded.data;
  }

  private async writeCache(
    stage: StageName,
    key: string,
    value: unknown,
    ttlSeconds: number,
  ): Promise<void> {
    const stored = await this.cache.put(key, value, ttlSeconds);
    if (stored.isErr()) {
      this.logger.warn(
        { stage, key, code: stored.error.code, message: stored.error.message },
        "Cache write failed",
      );
    }
  }
}
