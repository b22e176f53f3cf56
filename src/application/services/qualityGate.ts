import type { InsightFeatures } from "../../core/entities/memory";
import type {
  InsightDraft,
  ResearchState,
} from "../../core/entities/researchState";
import { extractInsightFeatures } from "../../core/pipeline/insightFeatures";
import type { InsightScorerPort } from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

export type GateDecision = {
  pass: boolean;
  score: number;
};

export const DEFAULT_PERSIST_THRESHOLD = 7;

const clampScore = (score: number): number =>
  Number.isFinite(score) ? Math.min(10, Math.max(0, score)) : 0;

export const featuresOfDraft = (
  draft: InsightDraft,
  state: Pick<ResearchState, "signal" | "verified">,
): InsightFeatures =>
  extractInsightFeatures({
    signal: state.signal,
    interestingnessScore: draft.interestingnessScore,
    analysis: draft.analysis,
    evidenceCount: draft.evidence.length,
    verified: state.verified,
  });

/**
 * Decides whether a run continues past discovery and whether its insight is persisted.
 */
export class QualityGate {
  constructor(
    private scorer: InsightScorerPort,
    private readonly logger: Logger,
    private readonly threshold = DEFAULT_PERSIST_THRESHOLD,
  ) {}

  get scorerVersion(): string {
    return this.scorer.version;
  }

  evaluateDiscovery(state: ResearchState): GateDecision {
    const discovery = state.results.discovery;
    if (!discovery) {
      return { pass: false, score: 0 };
    }

    return {
      pass: discovery.isInteresting,
      score: clampScore(discovery.initialScore),
    };
  }

  /**
   * Scores the draft with the current scorer. A score equal to the threshold passes.
   */
  evaluatePersistence(draft: InsightDraft, state: ResearchState): GateDecision {
    const score = clampScore(this.scorer.score(featuresOfDraft(draft, state)));
    return { pass: score >= this.threshold, score };
  }

  /**
   * Replaces the scoring function. Runs read the scorer once per evaluation, so a swap
   * takes effect from the next persistence decision.
   */
  swapScorer(scorer: InsightScorerPort): void {
    if (scorer.version === this.scorer.version) {
      return;
    }

    this.logger.info(
      { from: this.scorer.version, to: scorer.version },
      "Persistence scorer swapped",
    );
    this.scorer = scorer;
  }
}
