export type EvidenceItem = {
  fact: string;
  source: string;
};

export type InsightEntity = {
  id: string;
  createdAt: Date;
  runId: string;
  signalId: string;
  signalType: string;
  subject: string;
  subjectName: string;
  headline: string;
  evidence: EvidenceItem[];
  analysis: string;
  interestingnessScore: number;
  shownToUser: boolean;
  embedding: number[] | null;
  metadata: Record<string, unknown>;
};

export type FeedbackEntity = {
  id: string;
  insightId: string;
  createdAt: Date;
  starRating: number;
  tags: string[];
  comment: string;
  invested: boolean;
  outcomeReturn?: number;
  outcomeDate?: Date;
};

export type ResearchPatternEntity = {
  id: string;
  name: string;
  description: string;
  successRate: number;
  avgRating: number;
  usageCount: number;
  lastUsedAt?: Date;
  embedding: number[] | null;
  metadata: Record<string, unknown>;
};

export type CompanyEntity = {
  symbol: string;
  name: string;
  sector?: string;
  industry?: string;
  marketCap?: number;
  fundamentals: Record<string, unknown>;
  embedding: number[] | null;
  updatedAt: Date;
};

/**
 * Numeric view of an insight consumed by the persistence scorer.
 */
export type InsightFeatures = {
  interestingnessScore: number;
  hasInsiderActivity: number;
  hasFundamentalConfluence: number;
  hasHistoricalPrecedent: number;
  signalPriority: number;
  factCount: number;
  analysisLength: number;
  verified: number;
};

export type RewardTrainingSampleEntity = {
  id: string;
  createdAt: Date;
  insightId: string;
  features: InsightFeatures;
  humanRating: number;
  usedInTraining: boolean;
};

export type RewardModelSnapshot = {
  version: string;
  trainedAt: Date;
  sampleCount: number;
  weights: Record<keyof InsightFeatures, number>;
  bias: number;
};

export type SimilarityMatch<T> = {
  item: T;
  similarity: number;
};

export type CacheEntry = {
  key: string;
  value: unknown;
  createdAt: Date;
  expiresAt: Date;
};
