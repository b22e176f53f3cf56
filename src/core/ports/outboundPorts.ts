import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  CacheEntry,
  CompanyEntity,
  FeedbackEntity,
  InsightEntity,
  InsightFeatures,
  ResearchPatternEntity,
  RewardModelSnapshot,
  RewardTrainingSampleEntity,
  SimilarityMatch,
} from "../entities/memory";
import type { ResearchState } from "../entities/researchState";
import type { SignalEntity, SignalOutcome } from "../entities/signal";

export type PipelineJobPayload = {
  signalId: string;
  runId?: string;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: PipelineJobPayload): Promise<void>;
}

export type SimilarityQuery = {
  embedding: number[];
  limit: number;
  minSimilarity?: number;
};

export interface SignalRepositoryPort {
  create(signal: SignalEntity): Promise<void>;
  findById(id: string): Promise<SignalEntity | null>;
  listUnprocessed(limit: number): Promise<SignalEntity[]>;
  /**
   * Flips `processed` once. Returns false when the signal was already processed.
   */
  markProcessed(id: string, outcome: SignalOutcome): Promise<boolean>;
}

export interface CheckpointRepositoryPort {
  /**
   * Appends the first checkpoint of a run unless the signal already has one.
   * Returns false when another run claimed the signal first.
   */
  start(state: ResearchState): Promise<boolean>;
  append(state: ResearchState): Promise<void>;
  latestForRun(runId: string): Promise<ResearchState | null>;
  latestForSignal(signalId: string): Promise<ResearchState | null>;
  history(runId: string): Promise<ResearchState[]>;
}

export interface InsightRepositoryPort {
  /**
   * Inserts once per id; replays of the same insight are ignored.
   */
  save(insight: InsightEntity): Promise<void>;
  findById(id: string): Promise<InsightEntity | null>;
  findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<InsightEntity>[]>;
  listUnshown(minScore: number, limit: number): Promise<InsightEntity[]>;
  markShown(ids: string[]): Promise<void>;
}

export interface FeedbackRepositoryPort {
  save(feedback: FeedbackEntity): Promise<void>;
  listForInsight(insightId: string): Promise<FeedbackEntity[]>;
  listHighRated(
    minRating: number,
    limit: number,
  ): Promise<Array<{ insight: InsightEntity; avgRating: number; count: number }>>;
}

export interface PatternRepositoryPort {
  upsert(pattern: ResearchPatternEntity): Promise<void>;
  findByName(name: string): Promise<ResearchPatternEntity | null>;
  findSimilar(
    query: SimilarityQuery,
  ): Promise<SimilarityMatch<ResearchPatternEntity>[]>;
  /**
   * Folds one rating into the pattern's counters in a single atomic update.
   */
  recordOutcome(name: string, starRating: number, at: Date): Promise<boolean>;
}

export interface CompanyRepositoryPort {
  upsert(company: CompanyEntity): Promise<void>;
  findBySymbol(symbol: string): Promise<CompanyEntity | null>;
  findSimilar(query: SimilarityQuery): Promise<SimilarityMatch<CompanyEntity>[]>;
}

export interface RewardSampleRepositoryPort {
  save(sample: RewardTrainingSampleEntity): Promise<void>;
  listUnused(limit: number): Promise<RewardTrainingSampleEntity[]>;
  markUsed(ids: string[]): Promise<void>;
}

export interface RewardModelRepositoryPort {
  save(snapshot: RewardModelSnapshot): Promise<void>;
  latest(): Promise<RewardModelSnapshot | null>;
}

export type MemoryStore = {
  signals: SignalRepositoryPort;
  checkpoints: CheckpointRepositoryPort;
  insights: InsightRepositoryPort;
  feedback: FeedbackRepositoryPort;
  patterns: PatternRepositoryPort;
  companies: CompanyRepositoryPort;
  rewardSamples: RewardSampleRepositoryPort;
  rewardModels: RewardModelRepositoryPort;
};

export interface CacheStorePort {
  get(key: string): Promise<Result<CacheEntry | null, AppBoundaryError>>;
  put(
    key: string,
    value: unknown,
    ttlSeconds: number,
  ): Promise<Result<void, AppBoundaryError>>;
  invalidate(key: string): Promise<Result<void, AppBoundaryError>>;
}

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

export type ChatRequest = {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  json?: boolean;
  signal?: AbortSignal;
};

export interface LlmPort {
  chat(request: ChatRequest): Promise<Result<string, AppBoundaryError>>;
}

export interface EmbeddingPort {
  embedTexts(texts: string[]): Promise<Result<number[][], AppBoundaryError>>;
}

/**
 * Learned persistence scorer. Returns a score on the 0-10 scale.
 */
export interface InsightScorerPort {
  readonly version: string;
  score(features: InsightFeatures): number;
}

export type RewardModelParameters = Pick<RewardModelSnapshot, "weights" | "bias">;

export interface RewardTrainerPort {
  fit(
    samples: readonly RewardTrainingSampleEntity[],
    previous: RewardModelParameters | null,
  ): RewardModelParameters;
  load(snapshot: RewardModelSnapshot): InsightScorerPort;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
