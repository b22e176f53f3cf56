import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SignalSnapshot } from "../../core/entities/signal";
import type {
  StageCallContext,
  StageHandlers,
} from "../../core/ports/inboundPorts";
import type { LlmPort } from "../../core/ports/outboundPorts";
import type { StageName } from "../../core/pipeline/stages";

export type LlmStageHandlerOptions = {
  llm: LlmPort;
  fastModel: string;
  deepModel: string;
  temperature?: number;
};

const describeSignal = (signal: SignalSnapshot): string =>
  [
    `Signal type: ${signal.type}`,
    `Company: ${signal.subjectName ?? signal.subject} (${signal.subject})`,
    `Discovered at: ${signal.discoveredAt}`,
    `Details: ${JSON.stringify(signal.payload)}`,
  ].join("\n");

const jsonInstruction = (shape: string): string =>
  `Respond with a single JSON object of the form ${shape} and nothing else.`;

const parseJsonObject = (
  stage: StageName,
  raw: string,
): Result<unknown, AppBoundaryError> => {
  try {
    return ok(JSON.parse(raw));
  } catch (error) {
    return err({
      source: "stage",
      code: "malformed_response",
      provider: stage,
      message: `Stage '${stage}' returned text that is not JSON.`,
      retryable: false,
      cause: error,
    });
  }
};

/**
 * Stage handlers backed by a chat model in JSON mode. Screening uses the fast model,
 * everything after the discovery gate uses the deep one.
 */
export const createLlmStageHandlers = (
  options: LlmStageHandlerOptions,
): StageHandlers => {
  const ask = async (
    context: StageCallContext,
    model: string,
    system: string,
    user: string,
  ): Promise<Result<unknown, AppBoundaryError>> => {
    const reply = await options.llm.chat({
      model,
      json: true,
      temperature: options.temperature,
      signal: context.signal,
      messages: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
    });
    return reply.andThen((text) => parseJsonObject(context.stage, text));
  };

  return {
    discovery: ({ signal }, context) =>
      ask(
        context,
        options.fastModel,
        [
          "You screen market signals for an equity research desk.",
          "Flag a signal as interesting only when it plausibly moves the company's prospects.",
          "Score it from 0 (noise) to 10 (exceptional).",
          jsonInstruction(
            '{"isInteresting": boolean, "assessment": string, "initialScore": number}',
          ),
        ].join(" "),
        describeSignal(signal),
      ),

    level1: ({ signal }, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Describe the company behind this signal: business model, segments, recent developments.",
          jsonInstruction('{"companyContext": string}'),
        ].join(" "),
        describeSignal(signal),
      ),

    level2: ({ signal, priorCases }, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Identify historical precedents for this kind of signal and how they played out.",
          jsonInstruction('{"historicalPatterns": string}'),
        ].join(" "),
        [
          describeSignal(signal),
          priorCases.length === 0
            ? "No similar past cases are on record."
            : `Similar past cases:\n${priorCases
                .map(
                  (c) =>
                    `- ${c.headline} (score ${c.score}, similarity ${c.similarity.toFixed(2)})`,
                )
                .join("\n")}`,
        ].join("\n\n"),
      ),

    level3: ({ signal }, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Summarize the company's fundamentals relevant to this signal: growth, margins, leverage, valuation.",
          jsonInstruction('{"fundamentals": string}'),
        ].join(" "),
        describeSignal(signal),
      ),

    level4: (input, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Combine the research below into an investment thesis with its key evidence and risks.",
          jsonInstruction(
            '{"thesis": string, "keyEvidence": string[], "risks": string[]}',
          ),
        ].join(" "),
        [
          describeSignal(input.signal),
          `Company context:\n${input.companyContext}`,
          `Historical patterns:\n${input.historicalPatterns}`,
          `Fundamentals:\n${input.fundamentals}`,
        ].join("\n\n"),
      ),

    context: (input, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Place the company in its industry: sector trends, closest peers, macro factors.",
          jsonInstruction(
            '{"industryContext": string, "peerComparison": string, "macroFactors": string}',
          ),
        ].join(" "),
        [
          describeSignal(input.signal),
          `Company context:\n${input.companyContext}`,
          `Fundamentals:\n${input.fundamentals}`,
        ].join("\n\n"),
      ),

    validation: (input, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Check whether the thesis follows from the evidence and is consistent with the industry context.",
          jsonInstruction('{"verified": boolean, "notes": string}'),
        ].join(" "),
        [
          describeSignal(input.signal),
          `Thesis:\n${input.thesis}`,
          `Evidence:\n${input.keyEvidence.map((e) => `- ${e}`).join("\n")}`,
          `Industry context:\n${input.industryContext}`,
        ].join("\n\n"),
      ),

    synthesis: (input, context) =>
      ask(
        context,
        options.deepModel,
        [
          "Write the final insight for a reader who has seconds to decide whether to dig in.",
          "Cite each evidence fact with its source and score the insight from 0 to 10.",
          jsonInstruction(
            '{"headline": string, "analysis": string, "evidence": [{"fact": string, "source": string}], "interestingnessScore": number}',
          ),
        ].join(" "),
        [
          describeSignal(input.signal),
          `Screening assessment:\n${input.assessment}`,
          `Thesis:\n${input.thesis}`,
          `Evidence:\n${input.keyEvidence.map((e) => `- ${e}`).join("\n")}`,
          `Risks:\n${input.risks.map((r) => `- ${r}`).join("\n")}`,
          `Industry:\n${input.industryContext}`,
          `Peers:\n${input.peerComparison}`,
          `Validation (${input.verified ? "verified" : "not verified"}):\n${input.validationNotes}`,
        ].join("\n\n"),
      ),
  };
};
