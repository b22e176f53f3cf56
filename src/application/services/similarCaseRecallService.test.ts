import { err, ok } from "neverthrow";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { InsightEntity } from "../../core/entities/memory";
import type { SignalSnapshot } from "../../core/entities/signal";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";
import { createInMemoryMemoryStore } from "../../infra/memory/inMemoryMemoryStore";
import {
  emptyRecall,
  signalEmbeddingText,
  SimilarCaseRecallService,
} from "./similarCaseRecallService";

const logger = pino({ level: "silent" });

const signal: SignalSnapshot = {
  type: "promoter_buy",
  subject: "ACME",
  subjectName: "Acme Industries",
  discoveredAt: "2026-03-02T09:00:00.000Z",
  payload: { priority: 8 },
};

const insight = (
  id: string,
  headline: string,
  embedding: number[],
): InsightEntity => ({
  id,
  createdAt: new Date("2026-02-01T10:00:00.000Z"),
  runId: `run-${id}`,
  signalId: `sig-${id}`,
  signalType: "promoter_buy",
  subject: "ACME",
  subjectName: "Acme Industries",
  headline,
  evidence: [],
  analysis: "",
  interestingnessScore: 8,
  shownToUser: false,
  embedding,
  metadata: {},
});

const fixedEmbedding: EmbeddingPort = {
  embedTexts: async (texts) => ok(texts.map(() => [1, 0, 0])),
};

const createHarness = async (embedding: EmbeddingPort = fixedEmbedding, limit = 5) => {
  const memory = createInMemoryMemoryStore();
  await memory.insights.save(insight("near", "Promoter bought before results", [1, 0, 0]));
  await memory.insights.save(insight("close", "Promoter pledge released", [3, 4, 0]));
  await memory.insights.save(insight("far", "Unrelated buyback", [0, 1, 0]));
  await memory.patterns.upsert({
    id: "pat-1",
    name: "promoter-accumulation",
    description: "Promoters raising stake",
    successRate: 0.6,
    avgRating: 4,
    usageCount: 5,
    embedding: [1, 0, 0],
    metadata: {},
  });

  const service = new SimilarCaseRecallService(
    embedding,
    memory.insights,
    memory.patterns,
    { limit, minSimilarity: 0.5 },
    logger,
  );
  return { memory, service };
};

describe("SimilarCaseRecallService", () => {
  it("returns prior cases above the similarity floor, nearest first", async () => {
    const { service } = await createHarness();

    expect(await service.recall(signal)).toEqual({
      priorCases: [
        {
          insightId: "near",
          headline: "Promoter bought before results",
          score: 8,
          similarity: 1,
        },
        {
          insightId: "close",
          headline: "Promoter pledge released",
          score: 8,
          similarity: 0.6,
        },
      ],
      patternNames: ["promoter-accumulation"],
    });
  });

  it("embeds the signal description including the company name", async () => {
    const embedTexts = vi.fn(fixedEmbedding.embedTexts);
    const { service } = await createHarness({ embedTexts });

    await service.recall(signal);

    expect(embedTexts).toHaveBeenCalledWith([
      'promoter_buy Acme Industries (ACME): {"priority":8}',
    ]);
    expect(signalEmbeddingText(signal)).toBe(
      'promoter_buy Acme Industries (ACME): {"priority":8}',
    );
  });

  it("returns nothing when recall is disabled", async () => {
    const embedTexts = vi.fn(fixedEmbedding.embedTexts);
    const { service } = await createHarness({ embedTexts }, 0);

    expect(await service.recall(signal)).toEqual(emptyRecall());
    expect(embedTexts).not.toHaveBeenCalled();
  });

  it("degrades to an empty result when embedding fails", async () => {
    const failure: AppBoundaryError = {
      source: "embedding",
      code: "transport_error",
      provider: "ollama",
      message: "connection refused",
      retryable: true,
    };
    const { service } = await createHarness({
      embedTexts: async () => err(failure),
    });

    expect(await service.recall(signal)).toEqual(emptyRecall());
  });

  it("degrades to an empty result when the similarity search throws", async () => {
    const { memory, service } = await createHarness();
    vi.spyOn(memory.insights, "findSimilar").mockRejectedValue(
      new Error("index unavailable"),
    );

    expect(await service.recall(signal)).toEqual(emptyRecall());
  });
});
