import { z } from "zod";

export const stageNames = [
  "discovery",
  "level1",
  "level2",
  "level3",
  "level4",
  "context",
  "validation",
  "synthesis",
] as const;

export type StageName = (typeof stageNames)[number];

export const signalSnapshotSchema = z.object({
  type: z.string().min(1),
  subject: z.string().min(1),
  subjectName: z.string().optional(),
  discoveredAt: z.string().min(1),
  payload: z.record(z.unknown()),
});

const priorCaseSchema = z.object({
  insightId: z.string(),
  headline: z.string(),
  score: z.number(),
  similarity: z.number(),
});

export type PriorCase = z.infer<typeof priorCaseSchema>;

const narrative = z.string().trim().min(1);

const discoveryInput = z.object({ signal: signalSnapshotSchema });
const discoveryOutput = z.object({
  isInteresting: z.boolean(),
  assessment: narrative,
  initialScore: z.number().min(0).max(10),
});

const level1Input = z.object({ signal: signalSnapshotSchema });
const level1Output = z.object({ companyContext: narrative });

const level2Input = z.object({
  signal: signalSnapshotSchema,
  priorCases: z.array(priorCaseSchema),
});
const level2Output = z.object({ historicalPatterns: narrative });

const level3Input = z.object({ signal: signalSnapshotSchema });
const level3Output = z.object({ fundamentals: narrative });

const level4Input = z.object({
  signal: signalSnapshotSchema,
  companyContext: z.string(),
  historicalPatterns: z.string(),
  fundamentals: z.string(),
});
const level4Output = z.object({
  thesis: narrative,
  keyEvidence: z.array(z.string()),
  risks: z.array(z.string()),
});

const contextInput = z.object({
  signal: signalSnapshotSchema,
  companyContext: z.string(),
  fundamentals: z.string(),
});
const contextOutput = z.object({
  industryContext: narrative,
  peerComparison: narrative,
  macroFactors: z.string(),
});

const validationInput = z.object({
  signal: signalSnapshotSchema,
  thesis: z.string(),
  keyEvidence: z.array(z.string()),
  industryContext: z.string(),
});
const validationOutput = z.object({
  verified: z.boolean(),
  notes: z.string(),
});

const synthesisInput = z.object({
  signal: signalSnapshotSchema,
  assessment: z.string(),
  thesis: z.string(),
  keyEvidence: z.array(z.string()),
  risks: z.array(z.string()),
  industryContext: z.string(),
  peerComparison: z.string(),
  verified: z.boolean(),
  validationNotes: z.string(),
});
const synthesisOutput = z.object({
  headline: narrative,
  analysis: narrative,
  evidence: z
    .array(z.object({ fact: narrative, source: z.string().default("research") }))
    .min(1),
  interestingnessScore: z.number().min(0).max(10),
  metadata: z.record(z.unknown()).default({}),
});

/**
 * Input and output shape per stage. Keys double as the tag of every stage union below.
 */
export type StageIO = {
  discovery: {
    input: z.infer<typeof discoveryInput>;
    output: z.infer<typeof discoveryOutput>;
  };
  level1: {
    input: z.infer<typeof level1Input>;
    output: z.infer<typeof level1Output>;
  };
  level2: {
    input: z.infer<typeof level2Input>;
    output: z.infer<typeof level2Output>;
  };
  level3: {
    input: z.infer<typeof level3Input>;
    output: z.infer<typeof level3Output>;
  };
  level4: {
    input: z.infer<typeof level4Input>;
    output: z.infer<typeof level4Output>;
  };
  context: {
    input: z.infer<typeof contextInput>;
    output: z.infer<typeof contextOutput>;
  };
  validation: {
    input: z.infer<typeof validationInput>;
    output: z.infer<typeof validationOutput>;
  };
  synthesis: {
    input: z.infer<typeof synthesisInput>;
    output: z.infer<typeof synthesisOutput>;
  };
};

export type StageInput<S extends StageName> = StageIO[S]["input"];
export type StageOutput<S extends StageName> = StageIO[S]["output"];

type StageSchemas = {
  [S in StageName]: {
    input: z.ZodType<StageInput<S>, z.ZodTypeDef, unknown>;
    output: z.ZodType<StageOutput<S>, z.ZodTypeDef, unknown>;
  };
};

export const stageSchemas: StageSchemas = {
  discovery: { input: discoveryInput, output: discoveryOutput },
  level1: { input: level1Input, output: level1Output },
  level2: { input: level2Input, output: level2Output },
  level3: { input: level3Input, output: level3Output },
  level4: { input: level4Input, output: level4Output },
  context: { input: contextInput, output: contextOutput },
  validation: { input: validationInput, output: validationOutput },
  synthesis: { input: synthesisInput, output: synthesisOutput },
};

/**
 * One result slot per stage, so concurrent stages never write the same field.
 */
export type StageResults = {
  [S in StageName]?: StageOutput<S>;
};
