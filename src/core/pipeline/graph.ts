import type { StageName } from "./stages";

/**
 * A gated stage stops the run when its gate rejects. The persistence gate always follows
 * the last step and is not declared here.
 */
export type PipelineStep =
  | { kind: "stage"; stage: StageName; gate?: "discovery" }
  | { kind: "fanOut"; stages: readonly StageName[] };

export type StageSettings = {
  timeoutMs: number;
  cacheTtlSeconds: number;
};

export type PipelineGraph = {
  readonly steps: readonly PipelineStep[];
  readonly settings: Readonly<Record<StageName, StageSettings>>;
};

const stagesOf = (step: PipelineStep): readonly StageName[] =>
  step.kind === "stage" ? [step.stage] : step.stages;

const deepFreeze = (graph: PipelineGraph): PipelineGraph => {
  graph.steps.forEach((step) => {
    if (step.kind === "fanOut") {
      Object.freeze(step.stages);
    }
    Object.freeze(step);
  });
  Object.freeze(graph.steps);
  Object.values(graph.settings).forEach((settings) => Object.freeze(settings));
  Object.freeze(graph.settings);
  return Object.freeze(graph);
};

/**
 * Validates and freezes a stage graph so every engine instance shares one immutable definition.
 */
export const createPipelineGraph = (graph: PipelineGraph): PipelineGraph => {
  const seen = new Set<StageName>();

  graph.steps.forEach((step) => {
    const stages = stagesOf(step);
    if (stages.length === 0) {
      throw new Error("Pipeline step must declare at least one stage.");
    }

    stages.forEach((stage) => {
      if (seen.has(stage)) {
        throw new Error(`Stage '${stage}' appears more than once in the graph.`);
      }
      seen.add(stage);
    });
  });

  if (seen.size === 0) {
    throw new Error("Pipeline graph must contain at least one step.");
  }

  return deepFreeze({
    steps: graph.steps.map((step) =>
      step.kind === "fanOut" ? { ...step, stages: [...step.stages] } : { ...step },
    ),
    settings: { ...graph.settings },
  });
};

/**
 * Derives the next unit of work purely from the stage pointer. A pointer inside a fan-out
 * yields the members declared after it.
 */
export const nextStep = (
  graph: PipelineGraph,
  pointer: StageName | null,
): PipelineStep | null => {
  if (pointer === null) {
    return graph.steps[0] ?? null;
  }

  const index = graph.steps.findIndex((step) =>
    stagesOf(step).includes(pointer),
  );
  if (index === -1) {
    throw new Error(`Stage pointer '${pointer}' is not part of the graph.`);
  }

  const current = graph.steps[index];
  if (current?.kind === "fanOut") {
    const remaining = current.stages.slice(current.stages.indexOf(pointer) + 1);
    if (remaining.length > 0) {
      return { kind: "fanOut", stages: remaining };
    }
  }

  return graph.steps[index + 1] ?? null;
};

/**
 * Builds the research graph: cheap discovery, gated fan-out of levels 1-3, then the sequential tail.
 */
export const createResearchGraph = (options: {
  defaultTimeoutMs: number;
  cacheTtlSeconds: number;
  discoveryCacheTtlSeconds: number;
}): PipelineGraph => {
  const standard: StageSettings = {
    timeoutMs: options.defaultTimeoutMs,
    cacheTtlSeconds: options.cacheTtlSeconds,
  };

  return createPipelineGraph({
    steps: [
      { kind: "stage", stage: "discovery", gate: "discovery" },
      { kind: "fanOut", stages: ["level1", "level2", "level3"] },
      { kind: "stage", stage: "level4" },
      { kind: "stage", stage: "context" },
      { kind: "stage", stage: "validation" },
      { kind: "stage", stage: "synthesis" },
    ],
    settings: {
      discovery: {
        timeoutMs: options.defaultTimeoutMs,
        cacheTtlSeconds: options.discoveryCacheTtlSeconds,
      },
      level1: standard,
      level2: standard,
      level3: standard,
      level4: standard,
      context: standard,
      validation: standard,
      synthesis: standard,
    },
  });
};
