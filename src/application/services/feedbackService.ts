import { z } from "zod";
import { ValidationError } from "../../core/entities/appError";
import type {
  FeedbackEntity,
  InsightEntity,
  InsightFeatures,
} from "../../core/entities/memory";
import {
  extractInsightFeatures,
  insightFeaturesSchema,
} from "../../core/pipeline/insightFeatures";
import type { FeedbackRequest } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  MemoryStore,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

const feedbackSchema = z.object({
  insightId: z.string().trim().min(1),
  starRating: z.number().int().min(1).max(5),
  tags: z.array(z.string()).default([]),
  comment: z.string().default(""),
  invested: z.boolean().default(false),
  outcomeReturn: z.number().finite().optional(),
  outcomeDate: z.date().optional(),
});

const patternNamesSchema = z.array(z.string());

/**
 * Features stored on the insight at persist time; rebuilt from the insight itself for older rows.
 */
const featuresOf = (insight: InsightEntity): InsightFeatures => {
  const stored = insightFeaturesSchema.safeParse(insight.metadata.features);
  if (stored.success) {
    return stored.data;
  }

  return extractInsightFeatures({
    signal: { type: insight.signalType, payload: {} },
    interestingnessScore: insight.interestingnessScore,
    analysis: insight.analysis,
    evidenceCount: insight.evidence.length,
    verified: false,
  });
};

/**
 * Records a user's rating of an insight and turns it into reward-model and pattern signal.
 */
export class FeedbackService {
  constructor(
    private readonly memory: Pick<
      MemoryStore,
      "insights" | "feedback" | "patterns" | "rewardSamples"
    >,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly logger: Logger,
  ) {}

  async submit(request: FeedbackRequest): Promise<FeedbackEntity> {
    const parsed = feedbackSchema.safeParse(request);
    if (!parsed.success) {
      throw new ValidationError(
        "Invalid feedback",
        parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "feedback"}: ${issue.message}`,
        ),
      );
    }

    const insight = await this.memory.insights.findById(parsed.data.insightId);
    if (!insight) {
      throw new ValidationError(
        `Insight '${parsed.data.insightId}' does not exist`,
      );
    }

    const now = this.clock.now();
    const feedback: FeedbackEntity = {
      id: this.ids.next(),
      createdAt: now,
      ...parsed.data,
    };
    await this.memory.feedback.save(feedback);

    await this.memory.rewardSamples.save({
      id: this.ids.next(),
      createdAt: now,
      insightId: insight.id,
      features: featuresOf(insight),
      humanRating: feedback.starRating,
      usedInTraining: false,
    });

    const patternNames = patternNamesSchema.safeParse(
      insight.metadata.patternNames,
    );
    for (const name of patternNames.success ? patternNames.data : []) {
      const updated = await this.memory.patterns.recordOutcome(
        name,
        feedback.starRating,
        now,
      );
      if (!updated) {
        this.logger.debug({ pattern: name }, "Pattern no longer exists");
      }
    }

    this.logger.info(
      { insightId: insight.id, starRating: feedback.starRating },
      "Feedback recorded",
    );
    return feedback;
  }
}
