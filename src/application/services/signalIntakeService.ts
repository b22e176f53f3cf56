import { z } from "zod";
import { ValidationError } from "../../core/entities/appError";
import type { SignalEntity } from "../../core/entities/signal";
import type { SignalIntakeRequest } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  SignalRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

const intakeSchema = z.object({
  type: z.string().trim().min(1),
  subject: z
    .string()
    .trim()
    .min(1)
    .transform((subject) => subject.toUpperCase()),
  payload: z.record(z.unknown()),
  discoveredAt: z.date().optional(),
});

/**
 * Records raw market events as unprocessed signals.
 */
export class SignalIntakeService {
  constructor(
    private readonly signals: SignalRepositoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly logger: Logger,
  ) {}

  async record(request: SignalIntakeRequest): Promise<SignalEntity> {
    const parsed = intakeSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(
        "Invalid signal",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "signal"}: ${issue.message}`,
        ),
      );
    }

    const signal: SignalEntity = {
      id: this.ids.next(),
      discoveredAt: parsed.data.discoveredAt ?? this.clock.now(),
      type: parsed.data.type,
      subject: parsed.data.subject,
      payload: parsed.data.payload,
      processed: false,
      resultedInInsight: false,
    };

    await this.signals.create(signal);
    this.logger.info(
      { signalId: signal.id, type: signal.type, subject: signal.subject },
      "Signal recorded",
    );
    return signal;
  }
}
