import type {
  CompanyEntity,
  InsightEntity,
  SimilarityMatch,
} from "../core/entities/memory";
import type { ResearchState } from "../core/entities/researchState";

/**
 * Formats one insight as a compact terminal block for the digest.
 */
export const formatInsightReport = (insight: InsightEntity): string => {
  const lines: string[] = [];

  lines.push(
    `[${insight.interestingnessScore.toFixed(1)}] ${insight.subjectName} (${insight.subject}) - ${insight.signalType}`,
  );
  lines.push(insight.headline);
  lines.push("");
  lines.push(insight.analysis);
  lines.push("");

  lines.push("Evidence:");
  if (insight.evidence.length === 0) {
    lines.push("- none");
  } else {
    insight.evidence.forEach((item) => {
      lines.push(`- ${item.fact} [${item.source}]`);
    });
  }

  lines.push(`Insight id: ${insight.id}`);
  return lines.join("\n");
};

export const formatDigest = (insights: InsightEntity[]): string =>
  insights.length === 0
    ? "No unshown insights."
    : insights.map(formatInsightReport).join("\n\n");

/**
 * Summarizes a run from its checkpoint history, newest checkpoint last.
 */
export const formatRunReport = (history: ResearchState[]): string => {
  const latest = history.at(-1);
  if (!latest) {
    return "No checkpoints recorded.";
  }

  const lines: string[] = [];
  lines.push(`Run ${latest.runId} for signal ${latest.signalId}: ${latest.status}`);
  lines.push(`Subject: ${latest.signal.subject} (${latest.signal.type})`);
  lines.push(
    `Path: ${latest.researchPath.length > 0 ? latest.researchPath.join(" -> ") : "(none)"}`,
  );
  lines.push(`Next stage: ${latest.stagePointer ?? "(none)"}`);
  lines.push(`Checkpoints: ${history.length}`);

  if (latest.failure) {
    const { classification, code, stage, message } = latest.failure;
    lines.push(
      `Failure: ${classification}/${code}${stage ? ` at ${stage}` : ""}: ${message}`,
    );
  }

  if (latest.persistenceScore !== undefined) {
    lines.push(`Persistence score: ${latest.persistenceScore.toFixed(2)}`);
  }
  if (latest.insightId) {
    lines.push(`Insight: ${latest.insightId}`);
  }

  return lines.join("\n");
};

export const formatCompanyMatches = (
  matches: SimilarityMatch<CompanyEntity>[],
): string =>
  matches.length === 0
    ? "No similar companies."
    : matches
        .map(
          ({ item, similarity }) =>
            `${similarity.toFixed(2)} ${item.symbol} ${item.name}${item.sector ? ` (${item.sector})` : ""}`,
        )
        .join("\n");
