import type {
  ClockPort,
  MemoryStore,
  RewardTrainerPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";
import type { QualityGate } from "./qualityGate";

export type RetrainOutcome =
  | { trained: false; sampleCount: number }
  | { trained: true; sampleCount: number; version: string };

export type RewardTrainingOptions = {
  minSamples: number;
  maxSamples?: number;
};

const DEFAULT_MAX_SAMPLES = 10_000;

/**
 * Fits the persistence scorer on unused feedback samples and swaps it into the gate.
 */
export class RewardTrainingService {
  constructor(
    private readonly memory: Pick<MemoryStore, "rewardSamples" | "rewardModels">,
    private readonly trainer: RewardTrainerPort,
    private readonly gate: Pick<QualityGate, "swapScorer">,
    private readonly clock: ClockPort,
    private readonly options: RewardTrainingOptions,
    private readonly logger: Logger,
  ) {}

  async retrain(): Promise<RetrainOutcome> {
    const samples = await this.memory.rewardSamples.listUnused(
      this.options.maxSamples ?? DEFAULT_MAX_SAMPLES,
    );
    if (samples.length < this.options.minSamples) {
      this.logger.info(
        { sampleCount: samples.length, minSamples: this.options.minSamples },
        "Not enough feedback to retrain",
      );
      return { trained: false, sampleCount: samples.length };
    }

    const previous = await this.memory.rewardModels.latest();
    const parameters = this.trainer.fit(samples, previous);
    const trainedAt = this.clock.now();
    const snapshot = {
      version: `reward-${trainedAt.getTime()}`,
      trainedAt,
      sampleCount: (previous?.sampleCount ?? 0) + samples.length,
      ...parameters,
    };

    await this.memory.rewardModels.save(snapshot);
    await this.memory.rewardSamples.markUsed(samples.map((sample) => sample.id));
    this.gate.swapScorer(this.trainer.load(snapshot));

    this.logger.info(
      { version: snapshot.version, sampleCount: samples.length },
      "Reward model retrained",
    );
    return { trained: true, sampleCount: samples.length, version: snapshot.version };
  }

  /**
   * Loads the newest stored snapshot into the gate. Returns false when none has been trained.
   */
  async refreshScorer(): Promise<boolean> {
    const latest = await this.memory.rewardModels.latest();
    if (!latest) {
      return false;
    }

    this.gate.swapScorer(this.trainer.load(latest));
    return true;
  }
}
