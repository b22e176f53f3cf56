import { err, type Result } from "neverthrow";
import {
  PersistenceError,
  toErrorDetails,
} from "../../core/entities/appError";
import type { InsightEntity } from "../../core/entities/memory";
import {
  isTerminal,
  type InsightDraft,
  type ResearchState,
  type RunFailure,
  type RunStatus,
} from "../../core/entities/researchState";
import { toSignalSnapshot } from "../../core/entities/signal";
import {
  nextStep,
  type PipelineGraph,
  type PipelineStep,
} from "../../core/pipeline/graph";
import type {
  StageInput,
  StageName,
  StageOutput,
  StageResults,
} from "../../core/pipeline/stages";
import type {
  ClockPort,
  EmbeddingPort,
  IdGeneratorPort,
  MemoryStore,
} from "../../core/ports/outboundPorts";
import type { Logger } from "../../shared/logger/logger";
import { featuresOfDraft, type QualityGate } from "./qualityGate";
import type { StageError, StageExecutor } from "./stageExecutor";
import {
  emptyRecall,
  type SimilarCaseRecallService,
} from "./similarCaseRecallService";

export type RunOutcome = {
  runId: string;
  signalId: string;
  status: RunStatus;
  insightId?: string;
  score?: number;
  failure?: RunFailure;
  cancelled: boolean;
  resumed: boolean;
};

export type RunOptions = {
  /** Id for a new run; ignored when the signal already has a checkpointed run. */
  runId?: string;
  signal?: AbortSignal;
};

export type PipelineEngineDeps = {
  graph: PipelineGraph;
  executor: Pick<StageExecutor, "execute">;
  gate: QualityGate;
  memory: MemoryStore;
  embedding: EmbeddingPort;
  recall: Pick<SimilarCaseRecallService, "recall">;
  clock: ClockPort;
  ids: IdGeneratorPort;
  logger: Logger;
  runBudgetMs: number;
};

type MissingInput = { missing: StageName[] };

type InputBuilders = {
  [S in StageName]: (state: ResearchState) => StageInput<S> | MissingInput;
};

type ResultWriters = {
  [S in StageName]: (results: StageResults, output: StageOutput<S>) => void;
};

type ApplyResult = (results: StageResults) => void;

const isMissing = (value: object): value is MissingInput => "missing" in value;

const inputBuilders: InputBuilders = {
  discovery: (state) => ({ signal: state.signal }),
  level1: (state) => ({ signal: state.signal }),
  level2: (state) => ({
    signal: state.signal,
    priorCases: state.recall.priorCases,
  }),
  level3: (state) => ({ signal: state.signal }),
  level4: ({ signal, results }) =>
    results.level1 && results.level2 && results.level3
      ? {
          signal,
          companyContext: results.level1.companyContext,
          historicalPatterns: results.level2.historicalPatterns,
          fundamentals: results.level3.fundamentals,
        }
      : { missing: ["level1", "level2", "level3"] },
  context: ({ signal, results }) =>
    results.level1 && results.level3
      ? {
          signal,
          companyContext: results.level1.companyContext,
          fundamentals: results.level3.fundamentals,
        }
      : { missing: ["level1", "level3"] },
  validation: ({ signal, results }) =>
    results.level4 && results.context
      ? {
          signal,
          thesis: results.level4.thesis,
          keyEvidence: results.level4.keyEvidence,
          industryContext: results.context.industryContext,
        }
      : { missing: ["level4", "context"] },
  synthesis: ({ signal, results }) =>
    results.discovery && results.level4 && results.context && results.validation
      ? {
          signal,
          assessment: results.discovery.assessment,
          thesis: results.level4.thesis,
          keyEvidence: results.level4.keyEvidence,
          risks: results.level4.risks,
          industryContext: results.context.industryContext,
          peerComparison: results.context.peerComparison,
          verified: results.validation.verified,
          validationNotes: results.validation.notes,
        }
      : { missing: ["discovery", "level4", "context", "validation"] },
};

const resultWriters: ResultWriters = {
  discovery: (results, output) => {
    results.discovery = output;
  },
  level1: (results, output) => {
    results.level1 = output;
  },
  level2: (results, output) => {
    results.level2 = output;
  },
  level3: (results, output) => {
    results.level3 = output;
  },
  level4: (results, output) => {
    results.level4 = output;
  },
  context: (results, output) => {
    results.context = output;
  },
  validation: (results, output) => {
    results.validation = output;
  },
  synthesis: (results, output) => {
    results.synthesis = output;
  },
};

const COMPLETED_CHECKPOINT = "checkpoints.append(completed)";

const stagesOfStep = (step: PipelineStep): readonly StageName[] =>
  step.kind === "stage" ? [step.stage] : step.stages;

const failureFromStage = (error: StageError): RunFailure => ({
  classification: error.classification,
  stage: error.stage,
  code: error.code,
  message: error.message,
  attempts: error.attempts,
});

/**
 * Drives one research run per signal through the stage graph, checkpointing after every
 * transition so a crashed or cancelled run resumes where it stopped.
 */
export class PipelineEngine {
  private readonly runsBySignal = new Map<string, Promise<void>>();

  constructor(private readonly deps: PipelineEngineDeps) {}

  /**
   * Starts the signal's run, or resumes it when one is already checkpointed. Deliveries of
   * the same signal inside this process run one after another.
   */
  runSignal(signalId: string, options: RunOptions = {}): Promise<RunOutcome> {
    return this.serialize(signalId, () => this.startOrResume(signalId, options));
  }

  /**
   * Continues a run from its latest checkpoint. The run budget counts from this call,
   * so a resumed run gets a fresh budget.
   */
  async resumeRun(
    runId: string,
    options: Omit<RunOptions, "runId"> = {},
  ): Promise<RunOutcome> {
    const latest = await this.latestCheckpoint(runId);

    return this.serialize(latest.signalId, async () =>
      this.continueRun(await this.latestCheckpoint(runId), options.signal),
    );
  }

  private async startOrResume(
    signalId: string,
    options: RunOptions,
  ): Promise<RunOutcome> {
    const { memory, clock, ids, logger } = this.deps;

    const existing = await this.read("checkpoints.latestForSignal", () =>
      memory.checkpoints.latestForSignal(signalId),
    );
    if (existing) {
      logger.info(
        { runId: existing.runId, signalId, status: existing.status },
        "Signal already has a run, resuming",
      );
      return this.continueRun(existing, options.signal);
    }

    const signal = await this.read("signals.findById", () =>
      memory.signals.findById(signalId),
    );
    if (!signal) {
      throw new Error(`Signal '${signalId}' does not exist.`);
    }

    const subjectName = await this.lookupSubjectName(signal.subject);
    const now = clock.now();
    const state: ResearchState = {
      runId: options.runId ?? ids.next(),
      signalId,
      signal: toSignalSnapshot(signal, subjectName),
      researchPath: [],
      results: {},
      isInteresting: false,
      verified: false,
      stagePointer: null,
      status: "running",
      recall: emptyRecall(),
      sequence: 0,
      startedAt: now,
      updatedAt: now,
    };

    const claimed = await this.persist("checkpoints.start", () =>
      memory.checkpoints.start(state),
    );
    if (!claimed) {
      const winner = await this.read("checkpoints.latestForSignal", () =>
        memory.checkpoints.latestForSignal(signalId),
      );
      if (!winner) {
        throw new Error(`Signal '${signalId}' was claimed without a checkpoint.`);
      }

      logger.info(
        { runId: winner.runId, signalId },
        "Signal claimed by another run, resuming it",
      );
      return this.continueRun(winner, options.signal);
    }

    logger.info(
      { runId: state.runId, signalId, type: signal.type, subject: signal.subject },
      "Research run started",
    );

    return this.drive(state, false, options.signal);
  }

  private async latestCheckpoint(runId: string): Promise<ResearchState> {
    const latest = await this.read("checkpoints.latestForRun", () =>
      this.deps.memory.checkpoints.latestForRun(runId),
    );
    if (!latest) {
      throw new Error(`Run '${runId}' has no checkpoint.`);
    }
    return latest;
  }

  /**
   * Chains work per signal id. The stored promise only orders callers; each caller still
   * receives its own task's result or rejection.
   */
  private serialize<T>(signalId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.runsBySignal.get(signalId) ?? Promise.resolve();
    const current = previous.then(task);
    const settled = current.then(
      () => undefined,
      () => undefined,
    );
    this.runsBySignal.set(signalId, settled);

    return current.finally(() => {
      if (this.runsBySignal.get(signalId) === settled) {
        this.runsBySignal.delete(signalId);
      }
    });
  }

  private async continueRun(
    state: ResearchState,
    abort?: AbortSignal,
  ): Promise<RunOutcome> {
    if (isTerminal(state.status)) {
      await this.markProcessed(state);
      return this.outcome(state, { resumed: true });
    }

    return this.drive(state, true, abort);
  }

  private async drive(
    initial: ResearchState,
    resumed: boolean,
    abort?: AbortSignal,
  ): Promise<RunOutcome> {
    const { clock, logger, runBudgetMs } = this.deps;
    const startedAt = clock.now().getTime();
    const deadline = startedAt + runBudgetMs;
    let state = initial;
    let cancelled = false;

    try {
      while (state.status === "running") {
        if (abort?.aborted) {
          cancelled = true;
          break;
        }

        const step = nextStep(this.deps.graph, state.stagePointer);
        if (clock.now().getTime() > deadline) {
          state = await this.fail(state, {
            classification: "timeout",
            stage: step ? stagesOfStep(step)[0] : undefined,
            code: "run_budget_exceeded",
            message: `Run exceeded its ${runBudgetMs}ms budget.`,
          });
          break;
        }

        state = step
          ? await this.runStep(state, step)
          : await this.finish(state);
      }
    } catch (error) {
      if (!(error instanceof PersistenceError)) {
        throw error;
      }

      if (error.operation === COMPLETED_CHECKPOINT) {
        // The insight row exists, so the run must not be recorded as failed.
        logger.error(
          {
            runId: state.runId,
            insightId: state.finalInsight?.id,
            error: toErrorDetails(error),
          },
          "Completed checkpoint not recorded, run left resumable",
        );
        throw error;
      }

      state = await this.failAfterPersistenceError(state, error);
    }

    if (cancelled) {
      logger.info(
        { runId: state.runId, stagePointer: state.stagePointer },
        "Research run cancelled",
      );
      return this.outcome(state, { resumed, cancelled: true });
    }

    if (isTerminal(state.status)) {
      await this.markProcessed(state);
    }

    logger.info(
      {
        runId: state.runId,
        signalId: state.signalId,
        status: state.status,
        researchPath: state.researchPath,
        score: state.persistenceScore,
        failure: state.failure,
        durationMs: clock.now().getTime() - startedAt,
      },
      "Research run finished",
    );

    return this.outcome(state, { resumed });
  }

  /**
   * Executes one step of the graph. A fan-out joins every member before anything is
   * recorded; on failure only the successful prefix in declared order is kept.
   */
  private async runStep(
    state: ResearchState,
    step: PipelineStep,
  ): Promise<ResearchState> {
    const stages = stagesOfStep(step);
    this.deps.logger.debug({ runId: state.runId, stages }, "Running step");

    const outcomes = await Promise.all(
      stages.map((stage) => this.runStage(stage, state)),
    );

    const recorded: StageName[] = [];
    const results: StageResults = { ...state.results };
    let failure: RunFailure | undefined;

    for (const [index, outcome] of outcomes.entries()) {
      const stage = stages[index];
      if (stage === undefined) continue;
      if (outcome.isErr()) {
        failure = failureFromStage(outcome.error);
        break;
      }
      outcome.value(results);
      recorded.push(stage);
    }

    const researchPath = [...state.researchPath, ...recorded];
    let next: ResearchState = {
      ...state,
      researchPath,
      results,
      stagePointer: researchPath.at(-1) ?? null,
      verified: results.validation?.verified ?? state.verified,
    };

    if (failure) {
      return this.fail(next, failure);
    }

    if (step.kind === "stage" && step.stage === "synthesis" && results.synthesis) {
      next = { ...next, finalInsight: this.draftInsight(next) };
    }

    if (step.kind === "stage" && step.gate === "discovery") {
      const decision = this.deps.gate.evaluateDiscovery(next);
      if (!decision.pass) {
        this.deps.logger.info(
          { runId: state.runId, score: decision.score },
          "Discovery gate rejected signal",
        );
        return this.commit({ ...next, isInteresting: false, status: "stopped_by_gate" });
      }

      next = {
        ...next,
        isInteresting: true,
        recall: await this.deps.recall.recall(next.signal),
      };
    }

    return this.commit(next);
  }

  private async runStage<S extends StageName>(
    stage: S,
    state: ResearchState,
  ): Promise<Result<ApplyResult, StageError>> {
    const input = inputBuilders[stage](state);
    if (isMissing(input)) {
      return err({
        stage,
        classification: "permanent",
        code: "missing_dependency",
        message: `Stage '${stage}' needs results from ${input.missing.join(", ")}.`,
        attempts: 0,
      });
    }

    const output = await this.deps.executor.execute(stage, input);
    return output.map(
      (value): ApplyResult =>
        (results) => resultWriters[stage](results, value),
    );
  }

  private draftInsight(state: ResearchState): InsightDraft | undefined {
    const synthesis = state.results.synthesis;
    if (!synthesis) {
      return undefined;
    }

    return {
      id: this.deps.ids.next(),
      headline: synthesis.headline,
      analysis: synthesis.analysis,
      evidence: synthesis.evidence,
      interestingnessScore: synthesis.interestingnessScore,
      metadata: {
        ...synthesis.metadata,
        patternNames: state.recall.patternNames,
        priorCaseIds: state.recall.priorCases.map((c) => c.insightId),
      },
    };
  }

  /**
   * Applies the persistence gate and, when it passes, writes the insight before the
   * completed checkpoint. If that checkpoint cannot be written the run stays at its
   * synthesis checkpoint, and a redelivery re-inserts the same insight id and completes.
   */
  private async finish(state: ResearchState): Promise<ResearchState> {
    const draft = state.finalInsight;
    if (!draft) {
      return this.fail(state, {
        classification: "permanent",
        code: "missing_insight",
        message: "Run reached the persistence gate without a synthesized insight.",
      });
    }

    const decision = this.deps.gate.evaluatePersistence(draft, state);
    if (!decision.pass) {
      this.deps.logger.info(
        { runId: state.runId, score: decision.score },
        "Persistence gate rejected insight",
      );
      return this.commit({
        ...state,
        status: "stopped_by_gate",
        persistenceScore: decision.score,
      });
    }

    const insight: InsightEntity = {
      id: draft.id,
      createdAt: this.deps.clock.now(),
      runId: state.runId,
      signalId: state.signalId,
      signalType: state.signal.type,
      subject: state.signal.subject,
      subjectName: state.signal.subjectName ?? state.signal.subject,
      headline: draft.headline,
      evidence: draft.evidence,
      analysis: draft.analysis,
      interestingnessScore: draft.interestingnessScore,
      shownToUser: false,
      embedding: await this.embedInsight(draft, state.runId),
      metadata: {
        ...draft.metadata,
        persistenceScore: decision.score,
        scorerVersion: this.deps.gate.scorerVersion,
        features: featuresOfDraft(draft, state),
      },
    };

    await this.persist("insights.save", () => this.deps.memory.insights.save(insight));

    try {
      return await this.commit({
        ...state,
        status: "completed",
        persistenceScore: decision.score,
        insightId: insight.id,
      });
    } catch (error) {
      throw new PersistenceError(
        COMPLETED_CHECKPOINT,
        error instanceof PersistenceError ? error.cause : error,
      );
    }
  }

  private async embedInsight(
    draft: InsightDraft,
    runId: string,
  ): Promise<number[] | null> {
    const vectors = await this.deps.embedding.embedTexts([
      `${draft.headline}\n\n${draft.analysis}`,
    ]);
    if (vectors.isErr()) {
      this.deps.logger.warn(
        { runId, code: vectors.error.code, message: vectors.error.message },
        "Insight embedding failed, storing without vector",
      );
      return null;
    }

    return vectors.value[0] ?? null;
  }

  private async fail(
    state: ResearchState,
    failure: RunFailure,
  ): Promise<ResearchState> {
    this.deps.logger.warn({ runId: state.runId, failure }, "Research run failed");
    return this.commit({ ...state, status: "failed", failure });
  }

  private async failAfterPersistenceError(
    state: ResearchState,
    error: PersistenceError,
  ): Promise<ResearchState> {
    this.deps.logger.error(
      { runId: state.runId, error: toErrorDetails(error) },
      "Memory store write failed during run",
    );

    try {
      return await this.fail(state, {
        classification: "persistence",
        stage: state.stagePointer ?? undefined,
        code: "persistence_error",
        message: error.message,
      });
    } catch (secondary) {
      this.deps.logger.error(
        { runId: state.runId, error: toErrorDetails(secondary) },
        "Could not record failed checkpoint",
      );
      throw error;
    }
  }

  private async commit(state: ResearchState): Promise<ResearchState> {
    const next: ResearchState = {
      ...state,
      sequence: state.sequence + 1,
      updatedAt: this.deps.clock.now(),
    };
    await this.persist("checkpoints.append", () =>
      this.deps.memory.checkpoints.append(next),
    );
    return next;
  }

  private async markProcessed(state: ResearchState): Promise<void> {
    const flipped = await this.persist("signals.markProcessed", () =>
      this.deps.memory.signals.markProcessed(state.signalId, {
        resultedInInsight: state.status === "completed",
        insightId: state.status === "completed" ? state.insightId : undefined,
      }),
    );
    if (!flipped) {
      this.deps.logger.debug(
        { runId: state.runId, signalId: state.signalId },
        "Signal was already marked processed",
      );
    }
  }

  private async lookupSubjectName(symbol: string): Promise<string | undefined> {
    try {
      const company = await this.deps.memory.companies.findBySymbol(symbol);
      return company?.name;
    } catch (error) {
      this.deps.logger.warn(
        { symbol, error: toErrorDetails(error) },
        "Company lookup failed, using symbol as display name",
      );
      return undefined;
    }
  }

  private outcome(
    state: ResearchState,
    flags: { resumed: boolean; cancelled?: boolean },
  ): RunOutcome {
    return {
      runId: state.runId,
      signalId: state.signalId,
      status: state.status,
      insightId: state.insightId,
      score: state.persistenceScore,
      failure: state.failure,
      cancelled: flags.cancelled ?? false,
      resumed: flags.resumed,
    };
  }

  private async persist<T>(operation: string, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      throw error instanceof PersistenceError
        ? error
        : new PersistenceError(operation, error);
    }
  }

  private read<T>(operation: string, query: () => Promise<T>): Promise<T> {
    return this.persist(operation, query);
  }
}
