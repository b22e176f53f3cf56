import { Command, InvalidArgumentError } from "commander";
import { z } from "zod";
import {
  createRuntime,
  type Runtime,
} from "../application/bootstrap/runtimeFactory";
import { toErrorDetails, ValidationError } from "../core/entities/appError";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { runBounded } from "../shared/utils/concurrency";
import {
  formatCompanyMatches,
  formatDigest,
  formatRunReport,
} from "./reports";

const parsePositiveInt = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
};

const parseNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Expected a number.");
  }
  return parsed;
};

const parseDate = (value: string): Date => {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError("Expected an ISO-8601 timestamp.");
  }
  return parsed;
};

const payloadSchema = z.record(z.unknown());

const parsePayload = (raw: string): Record<string, unknown> => {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError("Payload is not valid JSON", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = payloadSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ValidationError("Payload must be a JSON object");
  }
  return parsed.data;
};

/**
 * Opens the runtime for one command and always releases its connections.
 */
const withRuntime = async (
  task: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await task(runtime);
  } finally {
    await runtime.close();
  }
};

/**
 * Defines a single command surface so operational tasks share the worker's wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("signal-insights")
    .description("Signal research pipeline CLI");

  cli
    .command("signal:add")
    .description("Record a market signal for research")
    .requiredOption("--type <type>", "Signal type, e.g. promoter_buy")
    .requiredOption("--subject <symbol>", "Ticker symbol")
    .option("--payload <json>", "Signal details as a JSON object", "{}")
    .option("--discovered-at <iso>", "When the signal was observed", parseDate)
    .action(
      async (opts: {
        type: string;
        subject: string;
        payload: string;
        discoveredAt?: Date;
      }) => {
        await withRuntime(async (runtime) => {
          const signal = await runtime.intake.record({
            type: opts.type,
            subject: opts.subject,
            payload: parsePayload(opts.payload),
            discoveredAt: opts.discoveredAt,
          });
          console.log(signal.id);
        });
      },
    );

  cli
    .command("company:add")
    .description("Add or update company knowledge used to name subjects")
    .requiredOption("--symbol <symbol>", "Ticker symbol")
    .requiredOption("--name <name>", "Company display name")
    .option("--sector <sector>", "Sector")
    .option("--industry <industry>", "Industry")
    .option("--market-cap <amount>", "Market capitalisation", parseNumber)
    .option("--fundamentals <json>", "Fundamentals as a JSON object", "{}")
    .action(
      async (opts: {
        symbol: string;
        name: string;
        sector?: string;
        industry?: string;
        marketCap?: number;
        fundamentals: string;
      }) => {
        await withRuntime(async (runtime) => {
          await runtime.companies.save({
            symbol: opts.symbol,
            name: opts.name,
            sector: opts.sector,
            industry: opts.industry,
            marketCap: opts.marketCap,
            fundamentals: parsePayload(opts.fundamentals),
          });
        });
      },
    );

  cli
    .command("company:similar")
    .description("List known companies resembling a description")
    .requiredOption("--query <text>", "Free-text description")
    .option("--limit <n>", "Maximum companies", parsePositiveInt, 5)
    .option("--min-similarity <value>", "Lowest cosine similarity", parseNumber)
    .action(
      async (opts: { query: string; limit: number; minSimilarity?: number }) => {
        await withRuntime(async (runtime) => {
          const matches = await runtime.companies.findSimilar(
            opts.query,
            opts.limit,
            opts.minSimilarity,
          );
          console.log(formatCompanyMatches(matches));
        });
      },
    );

  cli
    .command("dispatch")
    .description("Enqueue unprocessed signals once")
    .option(
      "--limit <n>",
      "Maximum signals to enqueue",
      parsePositiveInt,
      env.APP_DISPATCH_BATCH_SIZE,
    )
    .action(async (opts: { limit: number }) => {
      await withRuntime(async (runtime) => {
        const dispatched = await runtime.dispatch.dispatchPending(opts.limit);
        logger.info({ count: dispatched.length }, "Dispatch finished");
      });
    });

  cli
    .command("run")
    .description("Start the scheduler loop that enqueues unprocessed signals")
    .action(async () => {
      const runtime = await createRuntime();
      logger.info(
        { intervalSeconds: env.APP_DISPATCH_INTERVAL_SECONDS },
        "Scheduler started",
      );

      const tick = async (): Promise<void> => {
        await runtime.dispatch.dispatchPending(env.APP_DISPATCH_BATCH_SIZE);
      };

      await tick();
      const timer = setInterval(() => {
        tick().catch((error) => {
          logger.error({ error: toErrorDetails(error) }, "Scheduler tick failed");
        });
      }, env.APP_DISPATCH_INTERVAL_SECONDS * 1_000);

      (["SIGINT", "SIGTERM"] as const).forEach((name) => {
        process.once(name, () => {
          clearInterval(timer);
          logger.info({ reason: name }, "Scheduler stopping");
          runtime.close().then(
            () => process.exit(0),
            (error: unknown) => {
              logger.error(
                { error: toErrorDetails(error) },
                "Scheduler shutdown failed",
              );
              process.exit(1);
            },
          );
        });
      });
    });

  cli
    .command("process")
    .description("Run pending signals through the pipeline in this process")
    .option(
      "--limit <n>",
      "Maximum signals to process",
      parsePositiveInt,
      env.APP_DISPATCH_BATCH_SIZE,
    )
    .option(
      "--concurrency <n>",
      "Runs in flight at once",
      parsePositiveInt,
      env.QUEUE_CONCURRENCY_PIPELINE,
    )
    .action(async (opts: { limit: number; concurrency: number }) => {
      await withRuntime(async (runtime) => {
        const pending = await runtime.memory.signals.listUnprocessed(opts.limit);
        const outcomes = await runBounded(pending, opts.concurrency, (signal) =>
          runtime.engine.runSignal(signal.id),
        );

        outcomes.forEach((outcome) => {
          logger.info(
            {
              signalId: outcome.signalId,
              runId: outcome.runId,
              status: outcome.status,
              insightId: outcome.insightId,
              failure: outcome.failure,
            },
            "Run finished",
          );
        });
      });
    });

  cli
    .command("resume")
    .description("Continue a run from its latest checkpoint")
    .requiredOption("--run <runId>", "Run id")
    .option("--enqueue", "Hand the run to the worker instead of running it here")
    .action(async (opts: { run: string; enqueue?: boolean }) => {
      await withRuntime(async (runtime) => {
        if (opts.enqueue) {
          const latest = await runtime.memory.checkpoints.latestForRun(opts.run);
          if (!latest) {
            throw new ValidationError(`Run '${opts.run}' has no checkpoints`);
          }
          await runtime.dispatch.dispatchResume(opts.run, latest.signalId);
          logger.info({ runId: opts.run }, "Resume enqueued");
          return;
        }

        const outcome = await runtime.engine.resumeRun(opts.run);
        logger.info({ outcome }, "Run finished");
      });
    });

  cli
    .command("inspect")
    .description("Show a run's checkpoint summary")
    .requiredOption("--run <runId>", "Run id")
    .action(async (opts: { run: string }) => {
      await withRuntime(async (runtime) => {
        const history = await runtime.memory.checkpoints.history(opts.run);
        console.log(formatRunReport(history));
      });
    });

  cli
    .command("digest")
    .description("Print insights not yet shown and mark them shown")
    .option("--min-score <score>", "Lowest score to include", parseNumber, 0)
    .option("--limit <n>", "Maximum insights", parsePositiveInt, 10)
    .option("--keep-unshown", "Leave the insights unshown")
    .action(
      async (opts: { minScore: number; limit: number; keepUnshown?: boolean }) => {
        await withRuntime(async (runtime) => {
          const insights = await runtime.memory.insights.listUnshown(
            opts.minScore,
            opts.limit,
          );
          console.log(formatDigest(insights));

          if (!opts.keepUnshown && insights.length > 0) {
            await runtime.memory.insights.markShown(
              insights.map((insight) => insight.id),
            );
          }
        });
      },
    );

  cli
    .command("feedback")
    .description("Rate an insight from 1 to 5 stars")
    .requiredOption("--insight <id>", "Insight id")
    .requiredOption("--rating <stars>", "Star rating", parsePositiveInt)
    .option("--tags <tags>", "Comma-separated tags", "")
    .option("--comment <text>", "Free-form comment", "")
    .option("--invested", "Record that you acted on the insight")
    .option("--return <pct>", "Realized return", parseNumber)
    .option("--outcome-date <iso>", "When the return was realized", parseDate)
    .action(
      async (opts: {
        insight: string;
        rating: number;
        tags: string;
        comment: string;
        invested?: boolean;
        return?: number;
        outcomeDate?: Date;
      }) => {
        await withRuntime(async (runtime) => {
          const feedback = await runtime.feedback.submit({
            insightId: opts.insight,
            starRating: opts.rating,
            tags: opts.tags
              .split(",")
              .map((tag) => tag.trim())
              .filter((tag) => tag.length > 0),
            comment: opts.comment,
            invested: Boolean(opts.invested),
            outcomeReturn: opts.return,
            outcomeDate: opts.outcomeDate,
          });
          logger.info({ feedbackId: feedback.id }, "Feedback saved");
        });
      },
    );

  cli
    .command("feedback:top")
    .description("List insights with the best average rating")
    .option("--min-rating <stars>", "Lowest rating counted", parsePositiveInt, 4)
    .option("--limit <n>", "Maximum insights", parsePositiveInt, 10)
    .action(async (opts: { minRating: number; limit: number }) => {
      await withRuntime(async (runtime) => {
        const rows = await runtime.memory.feedback.listHighRated(
          opts.minRating,
          opts.limit,
        );
        rows.forEach(({ insight, avgRating, count }) => {
          console.log(
            `${avgRating.toFixed(2)} (${count}) ${insight.subject} ${insight.headline} [${insight.id}]`,
          );
        });
      });
    });

  cli
    .command("retrain")
    .description("Fit the persistence scorer on new feedback")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const outcome = await runtime.rewardTraining.retrain();
        logger.info(outcome, "Retrain finished");
      });
    });

  cli
    .command("status")
    .description("Report configuration and queue backlog")
    .action(async () => {
      await withRuntime(async (runtime) => {
        const queueCounts = await runtime.queue.getQueueCounts();
        logger.info(
          {
            stageProvider: env.STAGE_PROVIDER,
            memoryStore: env.MEMORY_STORE,
            cacheStore: env.CACHE_STORE,
            scorerVersion: runtime.gate.scorerVersion,
            persistThreshold: env.PERSIST_SCORE_THRESHOLD,
            dispatchIntervalSeconds: env.APP_DISPATCH_INTERVAL_SECONDS,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            ollama: env.OLLAMA_BASE_URL,
            queueCounts,
          },
          "Runtime status",
        );
      });
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
