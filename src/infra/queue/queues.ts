/**
 * Hyphen-only names because BullMQ uses colon as an internal Redis key separator.
 */
export const PIPELINE_QUEUE_NAME = "research-pipeline";

/**
 * Job ids double as dedupe keys. A signal waiting in the queue is not added twice,
 * and a resume request gets its own id so it is not swallowed by the original job.
 */
export const pipelineJobId = (payload: {
  signalId: string;
  runId?: string;
}): string =>
  payload.runId ? `resume-${payload.runId}` : `signal-${payload.signalId}`;
