import type {
  CompanyEntity,
  FeedbackEntity,
  InsightEntity,
  ResearchPatternEntity,
  RewardModelSnapshot,
  RewardTrainingSampleEntity,
  SimilarityMatch,
} from "../../core/entities/memory";
import type { ResearchState } from "../../core/entities/researchState";
import type { SignalEntity, SignalOutcome } from "../../core/entities/signal";
import type {
  CheckpointRepositoryPort,
  CompanyRepositoryPort,
  FeedbackRepositoryPort,
  InsightRepositoryPort,
  MemoryStore,
  PatternRepositoryPort,
  RewardModelRepositoryPort,
  RewardSampleRepositoryPort,
  SignalRepositoryPort,
  SimilarityQuery,
} from "../../core/ports/outboundPorts";
import { rankBySimilarity } from "./vectorMath";

// Rows are cloned on the way in and out so callers never share mutable state with the store.
const copy = <T>(value: T): T => structuredClone(value);

export class InMemorySignalRepository implements SignalRepositoryPort {
  private readonly rows = new Map<string, SignalEntity>();

  async create(signal: SignalEntity): Promise<void> {
    if (this.rows.has(signal.id)) {
      throw new Error(`Signal '${signal.id}' already exists.`);
    }
    this.rows.set(signal.id, copy(signal));
  }

  async findById(id: string): Promise<SignalEntity | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async listUnprocessed(limit: number): Promise<SignalEntity[]> {
    return [...this.rows.values()]
      .filter((row) => !row.processed)
      .sort(
        (left, right) =>
          left.discoveredAt.getTime() - right.discoveredAt.getTime(),
      )
      .slice(0, limit)
      .map(copy);
  }

  async markProcessed(id: string, outcome: SignalOutcome): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || row.processed) {
      return false;
    }

    this.rows.set(id, {
      ...row,
      processed: true,
      resultedInInsight: outcome.resultedInInsight,
      insightId: outcome.insightId,
    });
    return true;
  }
}

export class InMemoryCheckpointRepository implements CheckpointRepositoryPort {
  private readonly log: ResearchState[] = [];

  async start(state: ResearchState): Promise<boolean> {
    if (this.log.some((entry) => entry.signalId === state.signalId)) {
      return false;
    }
    await this.append(state);
    return true;
  }

  async append(state: ResearchState): Promise<void> {
    const previous = this.lastOf(state.runId);
    if (previous && previous.sequence >= state.sequence) {
      throw new Error(
        `Checkpoint sequence ${state.sequence} for run '${state.runId}' is not after ${previous.sequence}.`,
      );
    }
    this.log.push(copy(state));
  }

  async latestForRun(runId: string): Promise<ResearchState | null> {
    const row = this.lastOf(runId);
    return row ? copy(row) : null;
  }

  async latestForSignal(signalId: string): Promise<ResearchState | null> {
    const row = this.log.findLast((entry) => entry.signalId === signalId);
    return row ? copy(row) : null;
  }

  async history(runId: string): Promise<ResearchState[]> {
    return this.log.filter((entry) => entry.runId === runId).map(copy);
  }

  private lastOf(runId: string): ResearchState | undefined {
    return this.log.findLast((entry) => entry.runId === runId);
  }
}

export class InMemoryInsightRepository implements InsightRepositoryPort {
  readonly rows = new Map<string, InsightEntity>();

  async save(insight: InsightEntity): Promise<void> {
    if (this.rows.has(insight.id)) {
      return;
    }
    this.rows.set(insight.id, copy(insight));
  }

  async findById(id: string): Promise<InsightEntity | null> {
    const row = this.rows.get(id);
    return row ? copy(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<InsightEntity>[]> {
    return rankBySimilarity(
      [...this.rows.values()],
      (row) => row.embedding,
      query.embedding,
      query.limit,
      query.minSimilarity,
    ).map((match) => ({ ...match, item: copy(match.item) }));
  }

  async listUnshown(minScore: number, limit: number): Promise<InsightEntity[]> {
    return [...this.rows.values()]
      .filter((row) => !row.shownToUser && row.interestingnessScore >= minScore)
      .sort((left, right) => right.interestingnessScore - left.interestingnessScore)
      .slice(0, limit)
      .map(copy);
  }

  async markShown(ids: string[]): Promise<void> {
    ids.forEach((id) => {
      const row = this.rows.get(id);
      if (row) {
        this.rows.set(id, { ...row, shownToUser: true });
      }
    });
  }
}

export class InMemoryFeedbackRepository implements FeedbackRepositoryPort {
  private readonly rows: FeedbackEntity[] = [];

  constructor(private readonly insights: InMemoryInsightRepository) {}

  async save(feedback: FeedbackEntity): Promise<void> {
    this.rows.push(copy(feedback));
  }

  async listForInsight(insightId: string): Promise<FeedbackEntity[]> {
    return this.rows.filter((row) => row.insightId === insightId).map(copy);
  }

  async listHighRated(minRating: number, limit: number) {
    const grouped = new Map<string, number[]>();
    this.rows
      .filter((row) => row.starRating >= minRating)
      .forEach((row) => {
        grouped.set(row.insightId, [
          ...(grouped.get(row.insightId) ?? []),
          row.starRating,
        ]);
      });

    return [...grouped.entries()]
      .flatMap(([insightId, ratings]) => {
        const insight = this.insights.rows.get(insightId);
        if (!insight) return [];
        const avgRating =
          ratings.reduce((sum, rating) => sum + rating, 0) / ratings.length;
        return [{ insight: copy(insight), avgRating, count: ratings.length }];
      })
      .sort(
        (left, right) =>
          right.avgRating - left.avgRating || right.count - left.count,
      )
      .slice(0, limit);
  }
}

export class InMemoryPatternRepository implements PatternRepositoryPort {
  private readonly rows = new Map<string, ResearchPatternEntity>();

  async upsert(pattern: ResearchPatternEntity): Promise<void> {
    this.rows.set(pattern.name, copy(pattern));
  }

  async findByName(name: string): Promise<ResearchPatternEntity | null> {
    const row = this.rows.get(name);
    return row ? copy(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<ResearchPatternEntity>[]> {
    return rankBySimilarity(
      [...this.rows.values()],
      (row) => row.embedding,
      query.embedding,
      query.limit,
      query.minSimilarity,
    ).map((match) => ({ ...match, item: copy(match.item) }));
  }

  async recordOutcome(
    name: string,
    starRating: number,
    at: Date,
  ): Promise<boolean> {
    const row = this.rows.get(name);
    if (!row) {
      return false;
    }

    const count = row.usageCount;
    const success = starRating >= 4 ? 1 : 0;
    this.rows.set(name, {
      ...row,
      usageCount: count + 1,
      avgRating: (row.avgRating * count + starRating) / (count + 1),
      successRate: (row.successRate * count + success) / (count + 1),
      lastUsedAt: at,
    });
    return true;
  }
}

export class InMemoryCompanyRepository implements CompanyRepositoryPort {
  private readonly rows = new Map<string, CompanyEntity>();

  async upsert(company: CompanyEntity): Promise<void> {
    const symbol = company.symbol.toUpperCase();
    this.rows.set(symbol, copy({ ...company, symbol }));
  }

  async findBySymbol(symbol: string): Promise<CompanyEntity | null> {
    const row = this.rows.get(symbol.toUpperCase());
    return row ? copy(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<CompanyEntity>[]> {
    return rankBySimilarity(
      [...this.rows.values()],
      (row) => row.embedding,
      query.embedding,
      query.limit,
      query.minSimilarity,
    ).map((match) => ({ ...match, item: copy(match.item) }));
  }
}

export class InMemoryRewardSampleRepository
  implements RewardSampleRepositoryPort
{
  private readonly rows = new Map<string, RewardTrainingSampleEntity>();

  async save(sample: RewardTrainingSampleEntity): Promise<void> {
    this.rows.set(sample.id, copy(sample));
  }

  async listUnused(limit: number): Promise<RewardTrainingSampleEntity[]> {
    return [...this.rows.values()]
      .filter((row) => !row.usedInTraining)
      .sort((left, right) => left.createdAt.getTime() - right.createdAt.getTime())
      .slice(0, limit)
      .map(copy);
  }

  async markUsed(ids: string[]): Promise<void> {
    ids.forEach((id) => {
      const row = this.rows.get(id);
      if (row) {
        this.rows.set(id, { ...row, usedInTraining: true });
      }
    });
  }
}

export class InMemoryRewardModelRepository implements RewardModelRepositoryPort {
  private readonly snapshots: RewardModelSnapshot[] = [];

  async save(snapshot: RewardModelSnapshot): Promise<void> {
    this.snapshots.push(copy(snapshot));
  }

  async latest(): Promise<RewardModelSnapshot | null> {
    const last = this.snapshots.at(-1);
    return last ? copy(last) : null;
  }
}

/**
 * Builds a complete process-local memory store for single-process runs and tests.
 */
export const createInMemoryMemoryStore = (): MemoryStore => {
  const insights = new InMemoryInsightRepository();
  return {
    signals: new InMemorySignalRepository(),
    checkpoints: new InMemoryCheckpointRepository(),
    insights,
    feedback: new InMemoryFeedbackRepository(insights),
    patterns: new InMemoryPatternRepository(),
    companies: new InMemoryCompanyRepository(),
    rewardSamples: new InMemoryRewardSampleRepository(),
    rewardModels: new InMemoryRewardModelRepository(),
  };
};
