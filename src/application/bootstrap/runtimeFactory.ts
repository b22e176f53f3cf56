import { Redis } from "ioredis";
import type {
  CacheStorePort,
  EmbeddingPort,
  MemoryStore,
} from "../../core/ports/outboundPorts";
import type { StageHandlers } from "../../core/ports/inboundPorts";
import { createResearchGraph } from "../../core/pipeline/graph";
import { InMemoryCacheStore } from "../../infra/cache/inMemoryCacheStore";
import { RedisCacheStore } from "../../infra/cache/redisCacheStore";
import { createDb } from "../../infra/db/client";
import { createPostgresMemoryStore } from "../../infra/db/repositories";
import { VECTOR_DIMENSION } from "../../infra/db/schema";
import { MockEmbedding } from "../../infra/llm/mockEmbedding";
import { OllamaEmbedding } from "../../infra/llm/ollamaEmbedding";
import { OllamaLlm } from "../../infra/llm/ollamaLlm";
import { createInMemoryMemoryStore } from "../../infra/memory/inMemoryMemoryStore";
import { BullMqQueue } from "../../infra/queue/bullMqQueue";
import {
  LogisticRewardTrainer,
  PassthroughScorer,
} from "../../infra/scoring/logisticRewardModel";
import { createLlmStageHandlers } from "../../infra/stages/llmStageHandlers";
import { createMockStageHandlers } from "../../infra/stages/mockStageHandlers";
import {
  SystemClock,
  UuidIdGenerator,
} from "../../infra/system/systemPorts";
import { env, redisConfigFromUrl } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { CompanyKnowledgeService } from "../services/companyKnowledgeService";
import { FeedbackService } from "../services/feedbackService";
import { PipelineEngine } from "../services/pipelineEngine";
import { QualityGate } from "../services/qualityGate";
import { RewardTrainingService } from "../services/rewardTrainingService";
import { SignalDispatchService } from "../services/signalDispatchService";
import { SignalIntakeService } from "../services/signalIntakeService";
import { SimilarCaseRecallService } from "../services/similarCaseRecallService";
import { StageExecutor } from "../services/stageExecutor";

type Closer = () => Promise<void>;

const createMemoryStore = (closers: Closer[]): MemoryStore => {
  if (env.MEMORY_STORE === "memory") {
    return createInMemoryMemoryStore();
  }

  const { db, close } = createDb(env.POSTGRES_URL);
  closers.push(close);
  return createPostgresMemoryStore(db);
};

const createCacheStore = (
  clock: SystemClock,
  closers: Closer[],
): CacheStorePort => {
  if (env.CACHE_STORE === "memory") {
    return new InMemoryCacheStore(clock);
  }

  const client = new Redis({
    ...redisConfigFromUrl(env.REDIS_URL),
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
  closers.push(async () => {
    await client.quit();
  });
  return new RedisCacheStore(client, clock);
};

const createStageProviders = (): {
  handlers: StageHandlers;
  embedding: EmbeddingPort;
} => {
  if (env.STAGE_PROVIDER === "mock") {
    return {
      handlers: createMockStageHandlers(),
      embedding: new MockEmbedding(VECTOR_DIMENSION),
    };
  }

  const llm = new OllamaLlm(
    env.OLLAMA_BASE_URL,
    env.OLLAMA_DEEP_MODEL,
    env.STAGE_TIMEOUT_MS,
  );
  return {
    handlers: createLlmStageHandlers({
      llm,
      fastModel: env.OLLAMA_FAST_MODEL,
      deepModel: env.OLLAMA_DEEP_MODEL,
      temperature: env.LLM_TEMPERATURE,
    }),
    embedding: new OllamaEmbedding(
      env.OLLAMA_BASE_URL,
      env.OLLAMA_EMBED_MODEL,
      VECTOR_DIMENSION,
      env.OLLAMA_EMBED_TIMEOUT_MS,
    ),
  };
};

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = async () => {
  const closers: Closer[] = [];
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();

  const memory = createMemoryStore(closers);
  const cache = createCacheStore(clock, closers);
  const queue = new BullMqQueue(redisConfigFromUrl(env.REDIS_URL));
  closers.push(() => queue.close());

  const { handlers, embedding } = createStageProviders();
  const graph = createResearchGraph({
    defaultTimeoutMs: env.STAGE_TIMEOUT_MS,
    cacheTtlSeconds: env.CACHE_TTL_SECONDS,
    discoveryCacheTtlSeconds: env.DISCOVERY_CACHE_TTL_SECONDS,
  });

  const gate = new QualityGate(
    new PassthroughScorer(),
    logger,
    env.PERSIST_SCORE_THRESHOLD,
  );
  const executor = new StageExecutor(
    handlers,
    cache,
    graph,
    {
      maxRetries: env.STAGE_MAX_RETRIES,
      baseDelayMs: env.STAGE_RETRY_BASE_DELAY_MS,
    },
    logger,
  );
  const recall = new SimilarCaseRecallService(
    embedding,
    memory.insights,
    memory.patterns,
    { limit: env.RECALL_LIMIT, minSimilarity: env.RECALL_MIN_SIMILARITY },
    logger,
  );

  const engine = new PipelineEngine({
    graph,
    executor,
    gate,
    memory,
    embedding,
    recall,
    clock,
    ids,
    logger,
    runBudgetMs: env.PIPELINE_RUN_BUDGET_MS,
  });

  const rewardTraining = new RewardTrainingService(
    memory,
    new LogisticRewardTrainer(),
    gate,
    clock,
    { minSamples: env.REWARD_MIN_SAMPLES },
    logger,
  );
  await rewardTraining.refreshScorer();

  return {
    memory,
    embedding,
    queue,
    gate,
    engine,
    rewardTraining,
    intake: new SignalIntakeService(memory.signals, clock, ids, logger),
    companies: new CompanyKnowledgeService(
      memory.companies,
      embedding,
      clock,
      logger,
    ),
    dispatch: new SignalDispatchService(memory.signals, queue, clock, logger),
    feedback: new FeedbackService(memory, clock, ids, logger),
    close: async (): Promise<void> => {
      for (const close of closers.reverse()) {
        await close();
      }
    },
  };
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
