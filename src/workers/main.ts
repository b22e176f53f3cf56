import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { RunOutcome } from "../application/services/pipelineEngine";
import { toErrorDetails } from "../core/entities/appError";
import type { PipelineJobPayload } from "../core/ports/outboundPorts";
import { createPipelineWorker } from "../infra/queue/bullMqQueue";
import { env, redisConfigFromUrl } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = await createRuntime();
  const shutdown = new AbortController();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      stageProvider: env.STAGE_PROVIDER,
      memoryStore: env.MEMORY_STORE,
      cacheStore: env.CACHE_STORE,
      concurrency: env.QUEUE_CONCURRENCY_PIPELINE,
      scorerVersion: runtime.gate.scorerVersion,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
      ollamaBaseUrl: env.OLLAMA_BASE_URL,
    },
    "Worker runtime configuration",
  );

  const processJob = async (
    payload: PipelineJobPayload,
    signal: AbortSignal,
  ): Promise<void> => {
    // Picks up a model retrained by another process since the last job.
    await runtime.rewardTraining.refreshScorer();

    const outcome: RunOutcome = payload.runId
      ? await runtime.engine.resumeRun(payload.runId, { signal })
      : await runtime.engine.runSignal(payload.signalId, { signal });

    logger.info(
      {
        runId: outcome.runId,
        signalId: outcome.signalId,
        status: outcome.status,
        insightId: outcome.insightId,
        score: outcome.score,
        failure: outcome.failure,
        cancelled: outcome.cancelled,
        resumed: outcome.resumed,
      },
      "Pipeline run finished",
    );

    if (outcome.cancelled) {
      // Failing the job hands it back to BullMQ, whose retry resumes the checkpointed run.
      throw new Error(`Run '${outcome.runId}' was interrupted before finishing.`);
    }
  };

  const worker = createPipelineWorker(
    redisConfigFromUrl(env.REDIS_URL),
    env.QUEUE_CONCURRENCY_PIPELINE,
    processJob,
    shutdown.signal,
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      { jobId: job.id, signalId: job.data.signalId, runId: job.data.runId },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        signalId: job?.data.signalId,
        runId: job?.data.runId,
        attemptsMade: job?.attemptsMade,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        signalId: job.data.signalId,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
      },
      "Worker job completed",
    );
  });

  const stop = async (reason: string): Promise<void> => {
    if (shutdown.signal.aborted) {
      return;
    }

    logger.info({ reason }, "Worker shutting down");
    // Runs in flight stop at their next step boundary and stay resumable.
    shutdown.abort();
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  (["SIGINT", "SIGTERM"] as const).forEach((name) => {
    process.on(name, () => {
      stop(name).catch((error) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  });

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
