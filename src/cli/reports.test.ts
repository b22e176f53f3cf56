import { describe, expect, it } from "vitest";
import type { InsightEntity } from "../core/entities/memory";
import type { ResearchState } from "../core/entities/researchState";
import {
  formatCompanyMatches,
  formatDigest,
  formatInsightReport,
  formatRunReport,
} from "./reports";

const insight: InsightEntity = {
  id: "ins-1",
  createdAt: new Date("2026-03-02T10:05:00.000Z"),
  runId: "run-1",
  signalId: "sig-1",
  signalType: "promoter_buy",
  subject: "ACME",
  subjectName: "Acme Industries",
  headline: "Promoter adds to stake",
  evidence: [{ fact: "Promoter bought 2% of float", source: "exchange filing" }],
  analysis: "Buying lines up with improving margins.",
  interestingnessScore: 8.2,
  shownToUser: false,
  embedding: null,
  metadata: {},
};

const checkpoint = (overrides: Partial<ResearchState>): ResearchState => ({
  runId: "run-1",
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
  stagePointer: "discovery",
  status: "running",
  recall: { priorCases: [], patternNames: [] },
  sequence: 0,
  startedAt: new Date("2026-03-02T10:00:00.000Z"),
  updatedAt: new Date("2026-03-02T10:00:00.000Z"),
  ...overrides,
});

describe("formatInsightReport", () => {
  it("renders the score, subject, analysis and evidence", () => {
    expect(formatInsightReport(insight)).toBe(
      [
        "[8.2] Acme Industries (ACME) - promoter_buy",
        "Promoter adds to stake",
        "",
        "Buying lines up with improving margins.",
        "",
        "Evidence:",
        "- Promoter bought 2% of float [exchange filing]",
        "Insight id: ins-1",
      ].join("\n"),
    );
  });

  it("marks an empty evidence list", () => {
    expect(formatInsightReport({ ...insight, evidence: [] })).toContain(
      "Evidence:\n- none\n",
    );
  });
});

describe("formatDigest", () => {
  it("reports an empty digest", () => {
    expect(formatDigest([])).toBe("No unshown insights.");
  });

  it("separates insights with a blank line", () => {
    const second = { ...insight, id: "ins-2" };
    expect(formatDigest([insight, second])).toBe(
      `${formatInsightReport(insight)}\n\n${formatInsightReport(second)}`,
    );
  });
});

describe("formatRunReport", () => {
  it("reports a missing run", () => {
    expect(formatRunReport([])).toBe("No checkpoints recorded.");
  });

  it("summarizes the newest checkpoint of a failed run", () => {
    const history = [
      checkpoint({ sequence: 0 }),
      checkpoint({
        sequence: 1,
        researchPath: ["discovery", "level1"],
        stagePointer: "level4",
        status: "failed",
        failure: {
          classification: "timeout",
          stage: "level4",
          code: "run_budget_exceeded",
          message: "Run exceeded its time budget.",
        },
      }),
    ];

    expect(formatRunReport(history)).toBe(
      [
        "Run run-1 for signal sig-1: failed",
        "Subject: ACME (promoter_buy)",
        "Path: discovery -> level1",
        "Next stage: level4",
        "Checkpoints: 2",
        "Failure: timeout/run_budget_exceeded at level4: Run exceeded its time budget.",
      ].join("\n"),
    );
  });

  it("includes the persisted insight of a completed run", () => {
    const report = formatRunReport([
      checkpoint({
        status: "completed",
        stagePointer: null,
        persistenceScore: 8.2,
        insightId: "ins-1",
      }),
    ]);

    expect(report.split("\n").slice(3)).toEqual([
      "Next stage: (none)",
      "Checkpoints: 1",
      "Persistence score: 8.20",
      "Insight: ins-1",
    ]);
  });
});

describe("formatCompanyMatches", () => {
  it("lists matches with their similarity", () => {
    const company = (symbol: string, name: string, sector?: string) => ({
      symbol,
      name,
      sector,
      fundamentals: {},
      embedding: null,
      updatedAt: new Date("2026-03-01T00:00:00.000Z"),
    });

    expect(
      formatCompanyMatches([
        { item: company("BETA", "Beta Foods", "Consumer Staples"), similarity: 0.8 },
        { item: company("ACME", "Acme Industries"), similarity: 0.6 },
      ]),
    ).toBe("0.80 BETA Beta Foods (Consumer Staples)\n0.60 ACME Acme Industries");
  });

  it("says so when nothing matched", () => {
    expect(formatCompanyMatches([])).toBe("No similar companies.");
  });
});
