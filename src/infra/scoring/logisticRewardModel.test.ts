import { describe, expect, it } from "vitest";
import type {
  InsightFeatures,
  RewardModelSnapshot,
} from "../../core/entities/memory";
import {
  LogisticRewardModel,
  PassthroughScorer,
  trainLogisticModel,
} from "./logisticRewardModel";

const features = (
  interestingnessScore: number,
  verified = 0,
): InsightFeatures => ({
  interestingnessScore,
  hasInsiderActivity: 0,
  hasFundamentalConfluence: 0,
  hasHistoricalPrecedent: 0,
  signalPriority: 5,
  factCount: 2,
  analysisLength: 0.5,
  verified,
});

const snapshot = (
  overrides: Partial<RewardModelSnapshot> = {},
): RewardModelSnapshot => ({
  version: "reward-test",
  trainedAt: new Date("2026-01-01T00:00:00.000Z"),
  sampleCount: 0,
  weights: {
    interestingnessScore: 0,
    hasInsiderActivity: 0,
    hasFundamentalConfluence: 0,
    hasHistoricalPrecedent: 0,
    signalPriority: 0,
    factCount: 0,
    analysisLength: 0,
    verified: 0,
  },
  bias: 0,
  ...overrides,
});

describe("PassthroughScorer", () => {
  it("returns the synthesis interestingness score unchanged", () => {
    expect(new PassthroughScorer().score(features(8.2))).toBe(8.2);
  });
});

describe("LogisticRewardModel", () => {
  it("maps probability onto the 0-10 scale", () => {
    expect(new LogisticRewardModel(snapshot()).score(features(3))).toBe(5);
    expect(
      new LogisticRewardModel(snapshot({ bias: Math.log(4) })).score(
        features(3),
      ),
    ).toBeCloseTo(8, 10);
  });

  it("reports the snapshot version", () => {
    expect(new LogisticRewardModel(snapshot()).version).toBe("reward-test");
  });
});

describe("trainLogisticModel", () => {
  const examples = [
    { features: features(9, 1), humanRating: 5 },
    { features: features(8.5, 1), humanRating: 4 },
    { features: features(2), humanRating: 1 },
    { features: features(3), humanRating: 2 },
  ];

  it("learns to separate highly rated insights from poorly rated ones", () => {
    const trained = trainLogisticModel(examples);
    const model = new LogisticRewardModel(snapshot(trained));

    expect(model.score(features(9, 1))).toBeGreaterThan(7);
    expect(model.score(features(2))).toBeLessThan(7);
  });

  it("warm starts from the previous parameters", () => {
    const previous = trainLogisticModel(examples);
    const resumed = trainLogisticModel(examples, { previous, epochs: 0 });

    expect(resumed).toEqual(previous);
    expect(resumed.weights).not.toBe(previous.weights);
  });

  it("keeps the previous parameters when there is nothing to train on", () => {
    const previous = { weights: snapshot().weights, bias: 1.5 };
    expect(trainLogisticModel([], { previous })).toEqual(previous);
  });
});
