import {
  and,
  asc,
  cosineDistance,
  desc,
  eq,
  gte,
  inArray,
  isNotNull,
  sql,
  type SQL,
} from "drizzle-orm";
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
import type { Db } from "./client";
import {
  checkpointsTable,
  companiesTable,
  feedbackTable,
  insightsTable,
  patternsTable,
  rewardModelsTable,
  rewardSamplesTable,
  signalsTable,
} from "./schema";
import { decodeState, encodeState } from "./stateCodec";

const similarityOf = (
  column: Parameters<typeof cosineDistance>[0],
  embedding: number[],
): SQL<number> =>
  sql<number>`1 - (${cosineDistance(column, embedding)})`.mapWith(Number);

type SignalRow = typeof signalsTable.$inferSelect;
type InsightRow = typeof insightsTable.$inferSelect;
type PatternRow = typeof patternsTable.$inferSelect;
type CompanyRow = typeof companiesTable.$inferSelect;

const toSignal = (row: SignalRow): SignalEntity => ({
  ...row,
  insightId: row.insightId ?? undefined,
});

const toInsight = (row: InsightRow): InsightEntity => row;

const toPattern = (row: PatternRow): ResearchPatternEntity => ({
  ...row,
  lastUsedAt: row.lastUsedAt ?? undefined,
});

const toCompany = (row: CompanyRow): CompanyEntity => ({
  ...row,
  sector: row.sector ?? undefined,
  industry: row.industry ?? undefined,
  marketCap: row.marketCap ?? undefined,
});

/**
 * Owns signal rows. Only the pipeline flips the processed flags, and only once.
 */
export class PostgresSignalRepository implements SignalRepositoryPort {
  constructor(private readonly db: Db) {}

  async create(signal: SignalEntity): Promise<void> {
    await this.db.insert(signalsTable).values({
      ...signal,
      insightId: signal.insightId ?? null,
    });
  }

  async findById(id: string): Promise<SignalEntity | null> {
    const [row] = await this.db
      .select()
      .from(signalsTable)
      .where(eq(signalsTable.id, id))
      .limit(1);
    return row ? toSignal(row) : null;
  }

  /**
   * Serves the dispatch backlog oldest first so delayed signals are never starved.
   */
  async listUnprocessed(limit: number): Promise<SignalEntity[]> {
    const rows = await this.db
      .select()
      .from(signalsTable)
      .where(eq(signalsTable.processed, false))
      .orderBy(asc(signalsTable.discoveredAt))
      .limit(limit);
    return rows.map(toSignal);
  }

  /**
   * Guards on `processed = false` so redelivered signals leave the first outcome untouched.
   */
  async markProcessed(id: string, outcome: SignalOutcome): Promise<boolean> {
    const updated = await this.db
      .update(signalsTable)
      .set({
        processed: true,
        resultedInInsight: outcome.resultedInInsight,
        insightId: outcome.insightId ?? null,
      })
      .where(and(eq(signalsTable.id, id), eq(signalsTable.processed, false)))
      .returning({ id: signalsTable.id });
    return updated.length > 0;
  }
}

const toCheckpointRow = (state: ResearchState) => ({
  runId: state.runId,
  sequence: state.sequence,
  signalId: state.signalId,
  status: state.status,
  stagePointer: state.stagePointer,
  state: encodeState(state),
  createdAt: state.updatedAt,
});

/**
 * Append-only checkpoint log. The (run_id, sequence) unique index rejects out-of-order writes.
 */
export class PostgresCheckpointRepository implements CheckpointRepositoryPort {
  constructor(private readonly db: Db) {}

  /**
   * The partial unique index on `signal_id` for sequence 0 lets exactly one run claim a signal.
   */
  async start(state: ResearchState): Promise<boolean> {
    const inserted = await this.db
      .insert(checkpointsTable)
      .values(toCheckpointRow(state))
      .onConflictDoNothing()
      .returning({ runId: checkpointsTable.runId });
    return inserted.length > 0;
  }

  async append(state: ResearchState): Promise<void> {
    await this.db.insert(checkpointsTable).values(toCheckpointRow(state));
  }

  async latestForRun(runId: string): Promise<ResearchState | null> {
    const [row] = await this.db
      .select({ state: checkpointsTable.state })
      .from(checkpointsTable)
      .where(eq(checkpointsTable.runId, runId))
      .orderBy(desc(checkpointsTable.sequence))
      .limit(1);
    return row ? decodeState(row.state) : null;
  }

  async latestForSignal(signalId: string): Promise<ResearchState | null> {
    const [row] = await this.db
      .select({ state: checkpointsTable.state })
      .from(checkpointsTable)
      .where(eq(checkpointsTable.signalId, signalId))
      .orderBy(desc(checkpointsTable.createdAt), desc(checkpointsTable.sequence))
      .limit(1);
    return row ? decodeState(row.state) : null;
  }

  async history(runId: string): Promise<ResearchState[]> {
    const rows = await this.db
      .select({ state: checkpointsTable.state })
      .from(checkpointsTable)
      .where(eq(checkpointsTable.runId, runId))
      .orderBy(asc(checkpointsTable.sequence));
    return rows.map((row) => decodeState(row.state));
  }
}

/**
 * Episodic memory of persisted insights, searchable by pgvector cosine distance.
 */
export class PostgresInsightRepository implements InsightRepositoryPort {
  constructor(private readonly db: Db) {}

  async save(insight: InsightEntity): Promise<void> {
    await this.db.insert(insightsTable).values(insight).onConflictDoNothing();
  }

  async findById(id: string): Promise<InsightEntity | null> {
    const [row] = await this.db
      .select()
      .from(insightsTable)
      .where(eq(insightsTable.id, id))
      .limit(1);
    return row ? toInsight(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<InsightEntity>[]> {
    const similarity = similarityOf(insightsTable.embedding, query.embedding);
    const rows = await this.db
      .select({ insight: insightsTable, similarity })
      .from(insightsTable)
      .where(
        and(
          isNotNull(insightsTable.embedding),
          gte(similarity, query.minSimilarity ?? -1),
        ),
      )
      .orderBy(desc(similarity))
      .limit(query.limit);

    return rows.map((row) => ({
      item: toInsight(row.insight),
      similarity: row.similarity,
    }));
  }

  async listUnshown(minScore: number, limit: number): Promise<InsightEntity[]> {
    const rows = await this.db
      .select()
      .from(insightsTable)
      .where(
        and(
          eq(insightsTable.shownToUser, false),
          gte(insightsTable.interestingnessScore, minScore),
        ),
      )
      .orderBy(desc(insightsTable.interestingnessScore))
      .limit(limit);
    return rows.map(toInsight);
  }

  async markShown(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db
      .update(insightsTable)
      .set({ shownToUser: true })
      .where(inArray(insightsTable.id, ids));
  }
}

export class PostgresFeedbackRepository implements FeedbackRepositoryPort {
  constructor(private readonly db: Db) {}

  async save(feedback: FeedbackEntity): Promise<void> {
    await this.db.insert(feedbackTable).values({
      ...feedback,
      outcomeReturn: feedback.outcomeReturn ?? null,
      outcomeDate: feedback.outcomeDate ?? null,
    });
  }

  async listForInsight(insightId: string): Promise<FeedbackEntity[]> {
    const rows = await this.db
      .select()
      .from(feedbackTable)
      .where(eq(feedbackTable.insightId, insightId))
      .orderBy(asc(feedbackTable.createdAt));

    return rows.map((row) => ({
      ...row,
      outcomeReturn: row.outcomeReturn ?? undefined,
      outcomeDate: row.outcomeDate ?? undefined,
    }));
  }

  /**
   * Surfaces the best-received insights so pattern curation can start from what readers liked.
   */
  async listHighRated(minRating: number, limit: number) {
    const avgRating = sql<number>`avg(${feedbackTable.starRating})`.mapWith(
      Number,
    );
    const count = sql<number>`count(${feedbackTable.id})`.mapWith(Number);

    const rows = await this.db
      .select({ insight: insightsTable, avgRating, count })
      .from(feedbackTable)
      .innerJoin(insightsTable, eq(feedbackTable.insightId, insightsTable.id))
      .where(gte(feedbackTable.starRating, minRating))
      .groupBy(insightsTable.id)
      .orderBy(desc(avgRating), desc(count))
      .limit(limit);

    return rows.map((row) => ({
      insight: toInsight(row.insight),
      avgRating: row.avgRating,
      count: row.count,
    }));
  }
}

export class PostgresPatternRepository implements PatternRepositoryPort {
  constructor(private readonly db: Db) {}

  async upsert(pattern: ResearchPatternEntity): Promise<void> {
    const values = { ...pattern, lastUsedAt: pattern.lastUsedAt ?? null };
    await this.db
      .insert(patternsTable)
      .values(values)
      .onConflictDoUpdate({
        target: patternsTable.name,
        set: {
          description: values.description,
          embedding: values.embedding,
          metadata: values.metadata,
        },
      });
  }

  async findByName(name: string): Promise<ResearchPatternEntity | null> {
    const [row] = await this.db
      .select()
      .from(patternsTable)
      .where(eq(patternsTable.name, name))
      .limit(1);
    return row ? toPattern(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<ResearchPatternEntity>[]> {
    const similarity = similarityOf(patternsTable.embedding, query.embedding);
    const rows = await this.db
      .select({ pattern: patternsTable, similarity })
      .from(patternsTable)
      .where(
        and(
          isNotNull(patternsTable.embedding),
          gte(similarity, query.minSimilarity ?? -1),
        ),
      )
      .orderBy(desc(similarity))
      .limit(query.limit);

    return rows.map((row) => ({
      item: toPattern(row.pattern),
      similarity: row.similarity,
    }));
  }

  /**
   * Every right-hand side reads the pre-update row, so the running averages fold in exactly one rating.
   */
  async recordOutcome(
    name: string,
    starRating: number,
    at: Date,
  ): Promise<boolean> {
    const success = starRating >= 4 ? 1 : 0;
    const updated = await this.db
      .update(patternsTable)
      .set({
        avgRating: sql`(${patternsTable.avgRating} * ${patternsTable.usageCount} + ${starRating}) / (${patternsTable.usageCount} + 1)`,
        successRate: sql`(${patternsTable.successRate} * ${patternsTable.usageCount} + ${success}) / (${patternsTable.usageCount} + 1)`,
        usageCount: sql`${patternsTable.usageCount} + 1`,
        lastUsedAt: at,
      })
      .where(eq(patternsTable.name, name))
      .returning({ id: patternsTable.id });
    return updated.length > 0;
  }
}

export class PostgresCompanyRepository implements CompanyRepositoryPort {
  constructor(private readonly db: Db) {}

  async upsert(company: CompanyEntity): Promise<void> {
    const values = {
      ...company,
      symbol: company.symbol.toUpperCase(),
      sector: company.sector ?? null,
      industry: company.industry ?? null,
      marketCap: company.marketCap ?? null,
    };
    await this.db
      .insert(companiesTable)
      .values(values)
      .onConflictDoUpdate({
        target: companiesTable.symbol,
        set: {
          name: values.name,
          sector: values.sector,
          industry: values.industry,
          marketCap: values.marketCap,
          fundamentals: values.fundamentals,
          embedding: values.embedding,
          updatedAt: values.updatedAt,
        },
      });
  }

  async findBySymbol(symbol: string): Promise<CompanyEntity | null> {
    const [row] = await this.db
      .select()
      .from(companiesTable)
      .where(eq(companiesTable.symbol, symbol.toUpperCase()))
      .limit(1);
    return row ? toCompany(row) : null;
  }

  async findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<CompanyEntity>[]> {
    const similarity = similarityOf(companiesTable.embedding, query.embedding);
    const rows = await this.db
      .select({ company: companiesTable, similarity })
      .from(companiesTable)
      .where(
        and(
          isNotNull(companiesTable.embedding),
          gte(similarity, query.minSimilarity ?? -1),
        ),
      )
      .orderBy(desc(similarity))
      .limit(query.limit);

    return rows.map((row) => ({
      item: toCompany(row.company),
      similarity: row.similarity,
    }));
  }
}

export class PostgresRewardSampleRepository
  implements RewardSampleRepositoryPort
{
  constructor(private readonly db: Db) {}

  async save(sample: RewardTrainingSampleEntity): Promise<void> {
    await this.db.insert(rewardSamplesTable).values(sample);
  }

  async listUnused(limit: number): Promise<RewardTrainingSampleEntity[]> {
    return this.db
      .select()
      .from(rewardSamplesTable)
      .where(eq(rewardSamplesTable.usedInTraining, false))
      .orderBy(asc(rewardSamplesTable.createdAt))
      .limit(limit);
  }

  async markUsed(ids: string[]): Promise<void> {
    if (ids.length === 0) return;
    await this.db
      .update(rewardSamplesTable)
      .set({ usedInTraining: true })
      .where(inArray(rewardSamplesTable.id, ids));
  }
}

export class PostgresRewardModelRepository implements RewardModelRepositoryPort {
  constructor(private readonly db: Db) {}

  async save(snapshot: RewardModelSnapshot): Promise<void> {
    await this.db.insert(rewardModelsTable).values(snapshot);
  }

  async latest(): Promise<RewardModelSnapshot | null> {
    const [row] = await this.db
      .select()
      .from(rewardModelsTable)
      .orderBy(desc(rewardModelsTable.trainedAt))
      .limit(1);
    return row ?? null;
  }
}

export const createPostgresMemoryStore = (db: Db): MemoryStore => ({
  signals: new PostgresSignalRepository(db),
  checkpoints: new PostgresCheckpointRepository(db),
  insights: new PostgresInsightRepository(db),
  feedback: new PostgresFeedbackRepository(db),
  patterns: new PostgresPatternRepository(db),
  companies: new PostgresCompanyRepository(db),
  rewardSamples: new PostgresRewardSampleRepository(db),
  rewardModels: new PostgresRewardModelRepository(db),
});
