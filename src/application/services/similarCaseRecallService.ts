import { toErrorDetails } from "../../core/entities/appError";
import type { RecalledContext } from "../../core/entities/researchState";
import type { SignalSnapshot } from "../../core/entities/signal";
import type {
  EmbeddingPort,
  InsightRepositoryPort,
  PatternRepositoryPort,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";

export type RecallOptions = {
  limit: number;
  minSimilarity: number;
};

export const emptyRecall = (): RecalledContext => ({
  priorCases: [],
  patternNames: [],
});

export const signalEmbeddingText = (signal: SignalSnapshot): string =>
  `${signal.type} ${signal.subjectName ?? signal.subject} (${signal.subject}): ${JSON.stringify(signal.payload)}`;

/**
 * Looks up past insights and research patterns resembling a signal before deep research.
 * Recall is advisory: any failure degrades to an empty result.
 */
export class SimilarCaseRecallService {
  constructor(
    private readonly embedding: EmbeddingPort,
    private readonly insights: InsightRepositoryPort,
    private readonly patterns: PatternRepositoryPort,
    private readonly options: RecallOptions,
    private readonly logger: Logger,
  ) {}

  async recall(signal: SignalSnapshot): Promise<RecalledContext> {
    if (this.options.limit <= 0) {
      return emptyRecall();
    }

    const vectors = await this.embedding.embedTexts([signalEmbeddingText(signal)]);
    if (vectors.isErr()) {
      this.logger.warn(
        { subject: signal.subject, code: vectors.error.code },
        "Signal embedding failed, skipping recall",
      );
      return emptyRecall();
    }

    const [vector] = vectors.value;
    if (!vector) {
      return emptyRecall();
    }

    const query = {
      embedding: vector,
      limit: this.options.limit,
      minSimilarity: this.options.minSimilarity,
    };

    try {
      const [insights, patterns] = await Promise.all([
        this.insights.findSimilar(query),
        this.patterns.findSimilar(query),
      ]);

      return {
        priorCases: insights.map(({ item, similarity }) => ({
          insightId: item.id,
          headline: item.headline,
          score: item.interestingnessScore,
          similarity,
        })),
        patternNames: patterns.map(({ item }) => item.name),
      };
    } catch (error) {
      this.logger.warn(
        { subject: signal.subject, error: toErrorDetails(error) },
        "Similarity search failed, skipping recall",
      );
      return emptyRecall();
    }
  }
}
