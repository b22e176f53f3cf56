import { describe, expect, it } from "vitest";
import type { ResearchState } from "../../core/entities/researchState";
import { decodeState, encodeState } from "./stateCodec";

const state: ResearchState = {
  runId: "run-1",
  signalId: "sig-1",
  signal: {
    type: "promoter_buy",
    subject: "ACME",
    subjectName: "Acme Industries",
    discoveredAt: "2026-03-02T09:00:00.000Z",
    payload: { priority: 8 },
  },
  researchPath: ["discovery", "level1"],
  results: {
    discovery: { isInteresting: true, assessment: "Large buy", initialScore: 8 },
    level1: { companyContext: "Mid-cap industrial" },
  },
  isInteresting: true,
  verified: false,
  stagePointer: "level1",
  status: "failed",
  failure: {
    classification: "transient",
    stage: "level2",
    code: "timeout",
    message: "Stage 'level2' timed out.",
    attempts: 3,
  },
  recall: {
    priorCases: [
      { insightId: "ins-0", headline: "Earlier buy", score: 7.5, similarity: 0.91 },
    ],
    patternNames: ["promoter-accumulation"],
  },
  sequence: 2,
  startedAt: new Date("2026-03-02T10:00:00.000Z"),
  updatedAt: new Date("2026-03-02T10:02:00.000Z"),
};

describe("state codec", () => {
  it("stores dates as ISO strings", () => {
    expect(encodeState(state)).toMatchObject({
      startedAt: "2026-03-02T10:00:00.000Z",
      updatedAt: "2026-03-02T10:02:00.000Z",
    });
  });

  it("decodes what it encodes", () => {
    expect(decodeState(encodeState(state))).toEqual(state);
  });

  it("raises on a row that does not match the state shape", () => {
    expect(() => decodeState({ ...state, stagePointer: "level9" })).toThrow(
      "Stored research state failed validation",
    );
  });
});
