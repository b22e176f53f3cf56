import type {
  InsightFeatures,
  RewardModelSnapshot,
} from "../../core/entities/memory";
import type {
  InsightScorerPort,
  RewardModelParameters,
  RewardTrainerPort,
} from "../../core/ports/outboundPorts";
import { insightFeatureNames } from "../../core/pipeline/insightFeatures";

type Weights = Record<keyof InsightFeatures, number>;

const zeroWeights = (): Weights => ({
  interestingnessScore: 0,
  hasInsiderActivity: 0,
  hasFundamentalConfluence: 0,
  hasHistoricalPrecedent: 0,
  signalPriority: 0,
  factCount: 0,
  analysisLength: 0,
  verified: 0,
});

const sigmoid = (z: number): number => 1 / (1 + Math.exp(-z));

const linear = (weights: Weights, bias: number, x: InsightFeatures): number =>
  insightFeatureNames.reduce(
    (sum, name) => sum + weights[name] * x[name],
    bias,
  );

/**
 * Scorer used before any feedback has been trained on: the synthesis stage's own score.
 */
export class PassthroughScorer implements InsightScorerPort {
  readonly version = "passthrough";

  score(features: InsightFeatures): number {
    return features.interestingnessScore;
  }
}

/**
 * Logistic model of "will be rated 4+ stars", reported as probability * 10.
 */
export class LogisticRewardModel implements InsightScorerPort {
  readonly version: string;

  constructor(private readonly snapshot: RewardModelSnapshot) {
    this.version = snapshot.version;
  }

  probability(features: InsightFeatures): number {
    return sigmoid(linear(this.snapshot.weights, this.snapshot.bias, features));
  }

  score(features: InsightFeatures): number {
    return this.probability(features) * 10;
  }
}

export type TrainingExample = {
  features: InsightFeatures;
  humanRating: number;
};

export type TrainingOptions = {
  previous?: RewardModelParameters | null;
  epochs?: number;
  learningRate?: number;
  l2?: number;
};

export const HIGH_RATING = 4;

/**
 * Batch gradient descent on log-loss. Starts from the previous snapshot's parameters when given.
 */
export const trainLogisticModel = (
  examples: readonly TrainingExample[],
  options: TrainingOptions = {},
): RewardModelParameters => {
  const { epochs = 500, learningRate = 0.05, l2 = 0.001 } = options;
  const weights: Weights = options.previous
    ? { ...options.previous.weights }
    : zeroWeights();
  let bias = options.previous?.bias ?? 0;

  if (examples.length === 0) {
    return { weights, bias };
  }

  for (let epoch = 0; epoch < epochs; epoch += 1) {
    const gradient = zeroWeights();
    let biasGradient = 0;

    for (const example of examples) {
      const label = example.humanRating >= HIGH_RATING ? 1 : 0;
      const residual =
        sigmoid(linear(weights, bias, example.features)) - label;
      insightFeatureNames.forEach((name) => {
        gradient[name] += residual * example.features[name];
      });
      biasGradient += residual;
    }

    insightFeatureNames.forEach((name) => {
      weights[name] -=
        learningRate * (gradient[name] / examples.length + l2 * weights[name]);
    });
    bias -= learningRate * (biasGradient / examples.length);
  }

  return { weights, bias };
};

export class LogisticRewardTrainer implements RewardTrainerPort {
  constructor(private readonly options: Omit<TrainingOptions, "previous"> = {}) {}

  fit(
    samples: readonly TrainingExample[],
    previous: RewardModelParameters | null,
  ): RewardModelParameters {
    return trainLogisticModel(samples, { ...this.options, previous });
  }

  load(snapshot: RewardModelSnapshot): InsightScorerPort {
    return new LogisticRewardModel(snapshot);
  }
}
