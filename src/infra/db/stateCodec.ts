import { z } from "zod";
import type { ResearchState } from "../../core/entities/researchState";
import { canonicalJson } from "../../shared/utils/fingerprint";
import {
  signalSnapshotSchema,
  stageNames,
  stageSchemas,
} from "../../core/pipeline/stages";

const stageNameSchema = z.enum(stageNames);

const storedStateSchema = z.object({
  runId: z.string(),
  signalId: z.string(),
  signal: signalSnapshotSchema,
  researchPath: z.array(stageNameSchema),
  results: z.object({
    discovery: stageSchemas.discovery.output.optional(),
    level1: stageSchemas.level1.output.optional(),
    level2: stageSchemas.level2.output.optional(),
    level3: stageSchemas.level3.output.optional(),
    level4: stageSchemas.level4.output.optional(),
    context: stageSchemas.context.output.optional(),
    validation: stageSchemas.validation.output.optional(),
    synthesis: stageSchemas.synthesis.output.optional(),
  }),
  isInteresting: z.boolean(),
  verified: z.boolean(),
  finalInsight: z
    .object({
      id: z.string(),
      headline: z.string(),
      analysis: z.string(),
      evidence: z.array(z.object({ fact: z.string(), source: z.string() })),
      interestingnessScore: z.number(),
      metadata: z.record(z.unknown()),
    })
    .optional(),
  stagePointer: stageNameSchema.nullable(),
  status: z.enum(["running", "stopped_by_gate", "failed", "completed"]),
  failure: z
    .object({
      classification: z.enum(["transient", "permanent", "persistence", "timeout"]),
      stage: stageNameSchema.optional(),
      code: z.string(),
      message: z.string(),
      attempts: z.number().int().optional(),
    })
    .optional(),
  persistenceScore: z.number().optional(),
  insightId: z.string().optional(),
  recall: z.object({
    priorCases: z.array(
      z.object({
        insightId: z.string(),
        headline: z.string(),
        score: z.number(),
        similarity: z.number(),
      }),
    ),
    patternNames: z.array(z.string()),
  }),
  sequence: z.number().int().min(0),
  startedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

/**
 * Converts a checkpoint into plain JSON for the jsonb column.
 */
export const encodeState = (state: ResearchState): unknown =>
  JSON.parse(canonicalJson(state));

/**
 * Strictly decodes a stored checkpoint. A row that does not decode is corrupt and raises.
 */
export const decodeState = (raw: unknown): ResearchState => {
  const parsed = storedStateSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `Stored research state failed validation: ${parsed.error.message}`,
    );
  }
  return parsed.data;
};
