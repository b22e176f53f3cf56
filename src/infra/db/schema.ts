import { sql } from "drizzle-orm";
import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  real,
  text,
  timestamp,
  uniqueIndex,
  vector,
} from "drizzle-orm/pg-core";
import type {
  EvidenceItem,
  InsightFeatures,
} from "../../core/entities/memory";

export const VECTOR_DIMENSION = 384;

export const signalsTable = pgTable(
  "signals",
  {
    id: text("id").primaryKey(),
    discoveredAt: timestamp("discovered_at", { withTimezone: true }).notNull(),
    type: text("type").notNull(),
    subject: text("subject").notNull(),
    payload: jsonb("payload").$type<Record<string, unknown>>().notNull(),
    processed: boolean("processed").notNull().default(false),
    resultedInInsight: boolean("resulted_in_insight").notNull().default(false),
    insightId: text("insight_id"),
  },
  (table) => ({
    pendingIdx: index("signals_pending_idx").on(
      table.processed,
      table.discoveredAt,
    ),
  }),
);

export const checkpointsTable = pgTable(
  "research_checkpoints",
  {
    runId: text("run_id").notNull(),
    sequence: integer("sequence").notNull(),
    signalId: text("signal_id").notNull(),
    status: text("status").notNull(),
    stagePointer: text("stage_pointer"),
    state: jsonb("state").$type<unknown>().notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    runSequenceIdx: uniqueIndex("research_checkpoints_run_sequence_uidx").on(
      table.runId,
      table.sequence,
    ),
    signalIdx: index("research_checkpoints_signal_idx").on(
      table.signalId,
      table.createdAt,
    ),
    signalStartIdx: uniqueIndex("research_checkpoints_signal_start_uidx")
      .on(table.signalId)
      .where(sql`${table.sequence} = 0`),
  }),
);

export const insightsTable = pgTable(
  "insights",
  {
    id: text("id").primaryKey(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    runId: text("run_id").notNull(),
    signalId: text("signal_id").notNull(),
    signalType: text("signal_type").notNull(),
    subject: text("subject").notNull(),
    subjectName: text("subject_name").notNull(),
    headline: text("headline").notNull(),
    evidence: jsonb("evidence").$type<EvidenceItem[]>().notNull(),
    analysis: text("analysis").notNull(),
    interestingnessScore: real("interestingness_score").notNull(),
    shownToUser: boolean("shown_to_user").notNull().default(false),
    embedding: vector("embedding", { dimensions: VECTOR_DIMENSION }),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull(),
  },
  (table) => ({
    subjectIdx: index("insights_subject_idx").on(table.subject),
    scoreIdx: index("insights_score_idx").on(table.interestingnessScore),
    embeddingIdx: index("insights_embedding_idx").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);

export const feedbackTable = pgTable(
  "feedback",
  {
    id: text("id").primaryKey(),
    insightId: text("insight_id")
      .notNull()
      .references(() => insightsTable.id),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    starRating: integer("star_rating").notNull(),
    tags: jsonb("tags").$type<string[]>().notNull(),
    comment: text("comment").notNull(),
    invested: boolean("invested").notNull().default(false),
    outcomeReturn: real("outcome_return"),
    outcomeDate: timestamp("outcome_date", { withTimezone: true }),
  },
  (table) => ({
    ratingIdx: index("feedback_rating_idx").on(table.starRating),
  }),
);

export const patternsTable = pgTable(
  "research_patterns",
  {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    description: text("description").notNull(),
    successRate: real("success_rate").notNull().default(0),
    avgRating: real("avg_rating").notNull().default(0),
    usageCount: integer("usage_count").notNull().default(0),
    lastUsedAt: timestamp("last_used_at", { withTimezone: true }),
    embedding: vector("embedding", { dimensions: VECTOR_DIMENSION }),
    metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull(),
  },
  (table) => ({
    nameIdx: uniqueIndex("research_patterns_name_uidx").on(table.name),
    embeddingIdx: index("research_patterns_embedding_idx").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);

export const companiesTable = pgTable(
  "companies",
  {
    symbol: text("symbol").primaryKey(),
    name: text("name").notNull(),
    sector: text("sector"),
    industry: text("industry"),
    marketCap: real("market_cap"),
    fundamentals: jsonb("fundamentals")
      .$type<Record<string, unknown>>()
      .notNull(),
    embedding: vector("embedding", { dimensions: VECTOR_DIMENSION }),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    embeddingIdx: index("companies_embedding_idx").using(
      "hnsw",
      table.embedding.op("vector_cosine_ops"),
    ),
  }),
);

export const rewardSamplesTable = pgTable(
  "reward_training_samples",
  {
    id: text("id").primaryKey(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
    insightId: text("insight_id")
      .notNull()
      .references(() => insightsTable.id),
    features: jsonb("features").$type<InsightFeatures>().notNull(),
    humanRating: real("human_rating").notNull(),
    usedInTraining: boolean("used_in_training").notNull().default(false),
  },
  (table) => ({
    unusedIdx: index("reward_training_samples_unused_idx").on(
      table.usedInTraining,
      table.createdAt,
    ),
  }),
);

export const rewardModelsTable = pgTable("reward_models", {
  version: text("version").primaryKey(),
  trainedAt: timestamp("trained_at", { withTimezone: true }).notNull(),
  sampleCount: integer("sample_count").notNull(),
  weights: jsonb("weights")
    .$type<Record<keyof InsightFeatures, number>>()
    .notNull(),
  bias: real("bias").notNull(),
});
