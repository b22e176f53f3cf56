import { z } from "zod";
import type { InsightFeatures } from "../entities/memory";
import type { SignalSnapshot } from "../entities/signal";

export const insightFeatureNames: readonly (keyof InsightFeatures)[] = [
  "interestingnessScore",
  "hasInsiderActivity",
  "hasFundamentalConfluence",
  "hasHistoricalPrecedent",
  "signalPriority",
  "factCount",
  "analysisLength",
  "verified",
];

export const insightFeaturesSchema: z.ZodType<InsightFeatures> = z.object({
  interestingnessScore: z.number(),
  hasInsiderActivity: z.number(),
  hasFundamentalConfluence: z.number(),
  hasHistoricalPrecedent: z.number(),
  signalPriority: z.number(),
  factCount: z.number(),
  analysisLength: z.number(),
  verified: z.number(),
});

const DEFAULT_SIGNAL_PRIORITY = 5;
const historicalMarkers = ["past", "historical", "previously", "track record"];

const flag = (value: boolean): number => (value ? 1 : 0);

export type FeatureSource = {
  signal: Pick<SignalSnapshot, "type" | "payload">;
  interestingnessScore: number;
  analysis: string;
  evidenceCount: number;
  verified: boolean;
};

/**
 * Reduces an insight to the numeric features the persistence scorer is trained on.
 */
export const extractInsightFeatures = (
  source: FeatureSource,
): InsightFeatures => {
  const analysis = source.analysis.toLowerCase();
  const signalType = source.signal.type.toLowerCase();
  const priority = source.signal.payload["priority"];

  return {
    interestingnessScore: source.interestingnessScore,
    hasInsiderActivity: flag(
      signalType.includes("insider") || signalType.includes("promoter"),
    ),
    hasFundamentalConfluence: flag(
      analysis.includes("fundamental") && analysis.includes("signal"),
    ),
    hasHistoricalPrecedent: flag(
      historicalMarkers.some((marker) => analysis.includes(marker)),
    ),
    signalPriority:
      typeof priority === "number" && Number.isFinite(priority)
        ? priority
        : DEFAULT_SIGNAL_PRIORITY,
    factCount: source.evidenceCount,
    analysisLength: source.analysis.length / 1000,
    verified: flag(source.verified),
  };
};
