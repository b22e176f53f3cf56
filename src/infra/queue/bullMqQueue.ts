import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  PipelineJobPayload,
  QueuePort,
} from "../../core/ports/outboundPorts";
import { PIPELINE_QUEUE_NAME, pipelineJobId } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

// Stage retries happen inside the run; queue retries only cover a worker dying mid-job.
const QUEUE_RETRIES = 2;

export const defaultJobOptions = {
  attempts: QUEUE_RETRIES + 1,
  removeOnComplete: 250,
  backoff: {
    type: "exponential",
    delay: 1_000,
  },
} as const;

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqQueue implements QueuePort {
  private readonly queue: Queue<PipelineJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<PipelineJobPayload>(PIPELINE_QUEUE_NAME, {
      connection,
      defaultJobOptions,
    });
  }

  async enqueue(payload: PipelineJobPayload): Promise<void> {
    const jobId = pipelineJobId(payload);
    await this.queue.add(jobId, payload, { jobId });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createPipelineWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: PipelineJobPayload, signal: AbortSignal) => Promise<void>,
  shutdown: AbortSignal,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<PipelineJobPayload>(
    PIPELINE_QUEUE_NAME,
    async (job) => {
      await processor(job.data, shutdown);
    },
    options,
  );
};
