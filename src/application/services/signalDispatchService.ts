import type {
  ClockPort,
  QueuePort,
  SignalRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

/**
 * Hands unprocessed signals to the pipeline queue, oldest first. The queue dedupes by signal id,
 * so dispatching a signal that is already waiting is harmless.
 */
export class SignalDispatchService {
  constructor(
    private readonly signals: SignalRepositoryPort,
    private readonly queue: QueuePort,
    private readonly clock: ClockPort,
    private readonly logger: Logger,
  ) {}

  async dispatchPending(limit: number): Promise<string[]> {
    const pending = await this.signals.listUnprocessed(limit);
    const requestedAt = this.clock.now().toISOString();

    for (const signal of pending) {
      await this.queue.enqueue({ signalId: signal.id, requestedAt });
    }

    if (pending.length > 0) {
      this.logger.info({ count: pending.length }, "Dispatched pending signals");
    }
    return pending.map((signal) => signal.id);
  }

  async dispatchResume(runId: string, signalId: string): Promise<void> {
    await this.queue.enqueue({
      signalId,
      runId,
      requestedAt: this.clock.now().toISOString(),
    });
  }
}
