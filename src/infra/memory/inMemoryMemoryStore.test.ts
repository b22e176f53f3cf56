import { describe, expect, it } from "vitest";
import type { InsightEntity } from "../../core/entities/memory";
import type { ResearchState } from "../../core/entities/researchState";
import type { SignalEntity } from "../../core/entities/signal";
import { createInMemoryMemoryStore } from "./inMemoryMemoryStore";

const signal: SignalEntity = {
  id: "sig-1",
  discoveredAt: new Date("2026-03-02T09:00:00.000Z"),
  type: "promoter_buy",
  subject: "ACME",
  payload: {},
  processed: false,
  resultedInInsight: false,
};

const checkpoint = (runId: string, sequence: number): ResearchState => ({
  runId,
  signalId: "sig-1",
  signal: {
    type: "promoter_buy",
    subject: "ACME",
    discoveredAt: "2026-03-02T09:00:00.000Z",
    payload: {},
  },
  researchPath: [],
  results: {},
  isInteresting: false,
  verified: false,
  stagePointer: null,
  status: "running",
  recall: { priorCases: [], patternNames: [] },
  sequence,
  startedAt: new Date("2026-03-02T10:00:00.000Z"),
  updatedAt: new Date("2026-03-02T10:00:00.000Z"),
});

const insight = (id: string, interestingnessScore: number): InsightEntity => ({
  id,
  createdAt: new Date("2026-03-02T10:05:00.000Z"),
  runId: "run-1",
  signalId: "sig-1",
  signalType: "promoter_buy",
  subject: "ACME",
  subjectName: "ACME",
  headline: `Insight ${id}`,
  evidence: [],
  analysis: "",
  interestingnessScore,
  shownToUser: false,
  embedding: null,
  metadata: {},
});

describe("in-memory signals", () => {
  it("flips processed exactly once", async () => {
    const { signals } = createInMemoryMemoryStore();
    await signals.create(signal);

    expect(
      await signals.markProcessed("sig-1", {
        resultedInInsight: true,
        insightId: "ins-1",
      }),
    ).toBe(true);
    expect(
      await signals.markProcessed("sig-1", { resultedInInsight: false }),
    ).toBe(false);
    expect(await signals.findById("sig-1")).toMatchObject({
      processed: true,
      resultedInInsight: true,
      insightId: "ins-1",
    });
  });

  it("rejects a duplicate id", async () => {
    const { signals } = createInMemoryMemoryStore();
    await signals.create(signal);

    await expect(signals.create(signal)).rejects.toThrow(
      "Signal 'sig-1' already exists.",
    );
  });

  it("stores the subject exactly as given", async () => {
    const { signals } = createInMemoryMemoryStore();
    await signals.create({ ...signal, subject: "Acme" });

    expect((await signals.findById("sig-1"))?.subject).toBe("Acme");
  });

  it("hands out copies rather than stored rows", async () => {
    const { signals } = createInMemoryMemoryStore();
    await signals.create(signal);

    const read = await signals.findById("sig-1");
    if (read) {
      read.payload["mutated"] = true;
    }

    expect((await signals.findById("sig-1"))?.payload).toEqual({});
  });
});

describe("in-memory checkpoints", () => {
  it("keeps an ordered history per run", async () => {
    const { checkpoints } = createInMemoryMemoryStore();
    await checkpoints.append(checkpoint("run-1", 0));
    await checkpoints.append(checkpoint("run-2", 0));
    await checkpoints.append(checkpoint("run-1", 1));

    expect(
      (await checkpoints.history("run-1")).map((entry) => entry.sequence),
    ).toEqual([0, 1]);
    expect((await checkpoints.latestForRun("run-1"))?.sequence).toBe(1);
    expect((await checkpoints.latestForSignal("sig-1"))?.runId).toBe("run-1");
  });

  it("lets only the first run claim a signal", async () => {
    const { checkpoints } = createInMemoryMemoryStore();

    expect(await checkpoints.start(checkpoint("run-1", 0))).toBe(true);
    expect(await checkpoints.start(checkpoint("run-2", 0))).toBe(false);

    expect((await checkpoints.latestForSignal("sig-1"))?.runId).toBe("run-1");
    expect(await checkpoints.history("run-2")).toEqual([]);
  });

  it("rejects a checkpoint that does not advance the sequence", async () => {
    const { checkpoints } = createInMemoryMemoryStore();
    await checkpoints.append(checkpoint("run-1", 0));
    await checkpoints.append(checkpoint("run-1", 1));

    await expect(checkpoints.append(checkpoint("run-1", 1))).rejects.toThrow(
      "Checkpoint sequence 1 for run 'run-1' is not after 1.",
    );
  });
});

describe("in-memory insights and feedback", () => {
  it("ignores a replayed insight", async () => {
    const { insights } = createInMemoryMemoryStore();
    await insights.save(insight("ins-1", 8));
    await insights.save({ ...insight("ins-1", 8), headline: "Replay" });

    expect((await insights.findById("ins-1"))?.headline).toBe("Insight ins-1");
  });

  it("lists unshown insights best first and marks them shown", async () => {
    const { insights } = createInMemoryMemoryStore();
    await insights.save(insight("ins-1", 7.5));
    await insights.save(insight("ins-2", 9));
    await insights.save(insight("ins-3", 4));

    expect(
      (await insights.listUnshown(5, 10)).map((row) => row.id),
    ).toEqual(["ins-2", "ins-1"]);

    await insights.markShown(["ins-2"]);
    expect(
      (await insights.listUnshown(0, 10)).map((row) => row.id),
    ).toEqual(["ins-1", "ins-3"]);
  });

  it("groups high ratings per insight", async () => {
    const { insights, feedback } = createInMemoryMemoryStore();
    await insights.save(insight("ins-1", 8));
    await insights.save(insight("ins-2", 8));

    const rating = (id: string, insightId: string, starRating: number) => ({
      id,
      insightId,
      createdAt: new Date("2026-03-03T00:00:00.000Z"),
      starRating,
      tags: [],
      comment: "",
      invested: false,
    });
    await feedback.save(rating("fb-1", "ins-1", 5));
    await feedback.save(rating("fb-2", "ins-1", 4));
    await feedback.save(rating("fb-3", "ins-2", 4));
    await feedback.save(rating("fb-4", "ins-2", 2));

    expect(
      (await feedback.listHighRated(4, 10)).map((row) => [
        row.insight.id,
        row.avgRating,
        row.count,
      ]),
    ).toEqual([
      ["ins-1", 4.5, 2],
      ["ins-2", 4, 1],
    ]);
  });
});

describe("in-memory reward storage", () => {
  it("returns only samples not yet used for training", async () => {
    const { rewardSamples } = createInMemoryMemoryStore();
    const sample = (id: string) => ({
      id,
      createdAt: new Date("2026-03-03T00:00:00.000Z"),
      insightId: "ins-1",
      features: {
        interestingnessScore: 8,
        hasInsiderActivity: 1,
        hasFundamentalConfluence: 0,
        hasHistoricalPrecedent: 0,
        signalPriority: 5,
        factCount: 1,
        analysisLength: 0.1,
        verified: 1,
      },
      humanRating: 4,
      usedInTraining: false,
    });
    await rewardSamples.save(sample("s-1"));
    await rewardSamples.save(sample("s-2"));
    await rewardSamples.markUsed(["s-1"]);

    expect((await rewardSamples.listUnused(10)).map((row) => row.id)).toEqual([
      "s-2",
    ]);
  });
});

describe("in-memory similarity search", () => {
  const query = { embedding: [1, 0, 0], limit: 5 };
  const vectors: Array<[string, number[] | null]> = [
    ["orthogonal", [0, 2, 0]],
    ["close", [3, 4, 0]],
    ["unembedded", null],
    ["exact", [2, 0, 0]],
  ];

  it("ranks insights by cosine similarity and skips rows without a vector", async () => {
    const { insights } = createInMemoryMemoryStore();
    for (const [id, embedding] of vectors) {
      await insights.save({ ...insight(id, 5), embedding });
    }

    expect(
      (await insights.findSimilar(query)).map((match) => [
        match.item.id,
        match.similarity,
      ]),
    ).toEqual([
      ["exact", 1],
      ["close", 0.6],
      ["orthogonal", 0],
    ]);
  });

  it("applies the similarity floor and limit to patterns", async () => {
    const { patterns } = createInMemoryMemoryStore();
    for (const [name, embedding] of vectors) {
      await patterns.upsert({
        id: `pat-${name}`,
        name,
        description: "",
        successRate: 0,
        avgRating: 0,
        usageCount: 0,
        embedding,
        metadata: {},
      });
    }

    expect(
      (await patterns.findSimilar({ ...query, minSimilarity: 0.5 })).map(
        (match) => match.item.name,
      ),
    ).toEqual(["exact", "close"]);
    expect(
      (await patterns.findSimilar({ ...query, limit: 1 })).map(
        (match) => match.item.name,
      ),
    ).toEqual(["exact"]);
  });

  it("finds similar companies above the floor", async () => {
    const { companies } = createInMemoryMemoryStore();
    for (const [symbol, embedding] of vectors) {
      await companies.upsert({
        symbol,
        name: symbol,
        fundamentals: {},
        embedding,
        updatedAt: new Date("2026-03-01T00:00:00.000Z"),
      });
    }

    expect(
      (await companies.findSimilar({ ...query, minSimilarity: 0.6 })).map(
        (match) => [match.item.symbol, match.similarity],
      ),
    ).toEqual([
      ["EXACT", 1],
      ["CLOSE", 0.6],
    ]);
  });
});
