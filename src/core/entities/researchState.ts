import type {
  PriorCase,
  StageName,
  StageResults,
} from "../pipeline/stages";
import type { SignalSnapshot } from "./signal";
import type { EvidenceItem } from "./memory";

export type RunStatus = "running" | "stopped_by_gate" | "failed" | "completed";

export const terminalStatuses: ReadonlySet<RunStatus> = new Set([
  "stopped_by_gate",
  "failed",
  "completed",
]);

export const isTerminal = (status: RunStatus): boolean =>
  terminalStatuses.has(status);

export type RunFailureClassification =
  | "transient"
  | "permanent"
  | "persistence"
  | "timeout";

export type RunFailure = {
  classification: RunFailureClassification;
  stage?: StageName;
  code: string;
  message: string;
  attempts?: number;
};

export type InsightDraft = {
  id: string;
  headline: string;
  analysis: string;
  evidence: EvidenceItem[];
  interestingnessScore: number;
  metadata: Record<string, unknown>;
};

export type RecalledContext = {
  priorCases: PriorCase[];
  patternNames: string[];
};

export type ResearchState = {
  runId: string;
  signalId: string;
  signal: SignalSnapshot;
  researchPath: StageName[];
  results: StageResults;
  isInteresting: boolean;
  verified: boolean;
  finalInsight?: InsightDraft;
  stagePointer: StageName | null;
  status: RunStatus;
  failure?: RunFailure;
  persistenceScore?: number;
  insightId?: string;
  recall: RecalledContext;
  sequence: number;
  startedAt: Date;
  updatedAt: Date;
};
