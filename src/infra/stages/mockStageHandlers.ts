import { ok } from "neverthrow";
import type { SignalSnapshot } from "../../core/entities/signal";
import type { StageHandlers } from "../../core/ports/inboundPorts";

const DEFAULT_PRIORITY = 5;
const INTERESTING_PRIORITY = 5;

const priorityOf = (signal: SignalSnapshot): number => {
  const value = signal.payload["priority"];
  return typeof value === "number" && Number.isFinite(value)
    ? Math.min(10, Math.max(0, value))
    : DEFAULT_PRIORITY;
};

const label = (signal: SignalSnapshot): string =>
  `${signal.subjectName ?? signal.subject} (${signal.type})`;

/**
 * Deterministic handlers for local runs without a model server.
 * `payload.priority` (0-10) drives the discovery verdict and the synthesis score.
 */
export const createMockStageHandlers = (): StageHandlers => ({
  discovery: async ({ signal }) => {
    const priority = priorityOf(signal);
    return ok({
      isInteresting: priority >= INTERESTING_PRIORITY,
      assessment: `${label(signal)} screened at priority ${priority}.`,
      initialScore: priority,
    });
  },
  level1: async ({ signal }) =>
    ok({ companyContext: `Business overview for ${label(signal)}.` }),
  level2: async ({ signal, priorCases }) =>
    ok({
      historicalPatterns:
        priorCases.length === 0
          ? `No comparable past cases for ${signal.subject}.`
          : `Comparable past cases: ${priorCases.map((c) => c.headline).join("; ")}.`,
    }),
  level3: async ({ signal }) =>
    ok({ fundamentals: `Fundamental snapshot for ${signal.subject}.` }),
  level4: async ({ signal, companyContext, fundamentals }) =>
    ok({
      thesis: `${label(signal)} warrants attention given its fundamentals.`,
      keyEvidence: [companyContext, fundamentals],
      risks: ["Signal may already be priced in."],
    }),
  context: async ({ signal }) =>
    ok({
      industryContext: `Industry backdrop for ${signal.subject}.`,
      peerComparison: `Peer comparison for ${signal.subject}.`,
      macroFactors: "Neutral macro environment.",
    }),
  validation: async ({ keyEvidence }) =>
    ok({
      verified: keyEvidence.length > 0,
      notes: `${keyEvidence.length} evidence items checked.`,
    }),
  synthesis: async ({ signal, thesis, keyEvidence, verified }) =>
    ok({
      headline: `${label(signal)}: ${thesis}`,
      analysis: `${thesis} Fundamental and signal review complete.`,
      evidence: keyEvidence.map((fact) => ({ fact, source: "mock" })),
      interestingnessScore: Math.min(
        10,
        priorityOf(signal) + (verified ? 1 : 0),
      ),
      metadata: { provider: "mock" },
    }),
});
