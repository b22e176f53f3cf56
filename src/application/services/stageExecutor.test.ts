import { err, ok, type Result } from "neverthrow";
import pino from "pino";
import { describe, expect, it, vi } from "vitest";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SignalSnapshot } from "../../core/entities/signal";
import { createResearchGraph } from "../../core/pipeline/graph";
import type { StageInput } from "../../core/pipeline/stages";
import type {
  StageCallContext,
  StageHandlers,
} from "../../core/ports/inboundPorts";
import type { CacheStorePort } from "../../core/ports/outboundPorts";
import { InMemoryCacheStore } from "../../infra/cache/inMemoryCacheStore";
import { createMockStageHandlers } from "../../infra/stages/mockStageHandlers";
import { stageFingerprint } from "../../shared/utils/fingerprint";
import { StageExecutor, type StageExecutorOptions } from "./stageExecutor";

const signal: SignalSnapshot = {
  type: "insider_buy",
  subject: "ACME",
  subjectName: "Acme Industries",
  discoveredAt: "2026-03-02T09:00:00.000Z",
  payload: { priority: 8 },
};

const discoveryOutput = {
  isInteresting: true,
  assessment: "Cluster of director purchases.",
  initialScore: 8,
};

const clock = { now: () => new Date("2026-03-02T10:00:00.000Z") };

const boundary = (
  code: AppBoundaryError["code"],
  retryable: boolean,
): AppBoundaryError => ({
  source: "llm",
  code,
  provider: "test",
  message: `${code} from test`,
  retryable,
});

type DiscoveryImpl = (
  input: StageInput<"discovery">,
  context: StageCallContext,
) => Promise<Result<unknown, AppBoundaryError>>;

const setup = (
  impl: DiscoveryImpl,
  overrides: {
    cache?: CacheStorePort;
    options?: Partial<StageExecutorOptions>;
    timeoutMs?: number;
  } = {},
) => {
  const discovery = vi.fn(impl);
  const handlers: StageHandlers = { ...createMockStageHandlers(), discovery };
  const cache = overrides.cache ?? new InMemoryCacheStore(clock);
  const sleep = vi.fn(async (_ms: number) => {});
  const logger = pino({ level: "silent" });
  const executor = new StageExecutor(
    handlers,
    cache,
    createResearchGraph({
      defaultTimeoutMs: overrides.timeoutMs ?? 1_000,
      cacheTtlSeconds: 3_600,
      discoveryCacheTtlSeconds: 600,
    }),
    { maxRetries: 2, baseDelayMs: 500, ...overrides.options },
    logger,
    sleep,
  );
  return { executor, discovery, cache, sleep, logger };
};

describe("StageExecutor", () => {
  it("serves an identical request from cache without calling the stage", async () => {
    const { executor, discovery } = setup(async () => ok(discoveryOutput));

    const first = await executor.execute("discovery", { signal });
    const second = await executor.execute("discovery", {
      signal: { ...signal, payload: { priority: 8 } },
    });

    expect(first._unsafeUnwrap()).toEqual(discoveryOutput);
    expect(second._unsafeUnwrap()).toEqual(discoveryOutput);
    expect(discovery).toHaveBeenCalledTimes(1);
  });

  it("stores results under the stage fingerprint with the stage ttl", async () => {
    const cache = new InMemoryCacheStore(clock);
    const { executor } = setup(async () => ok(discoveryOutput), { cache });

    await executor.execute("discovery", { signal });

    const entry = (
      await cache.get(stageFingerprint("discovery", { signal }))
    )._unsafeUnwrap();
    expect(entry?.value).toEqual(discoveryOutput);
    expect(entry?.expiresAt.toISOString()).toBe("2026-03-02T10:10:00.000Z");
  });

  it("retries transient failures with exponential backoff", async () => {
    let calls = 0;
    const { executor, discovery, sleep } = setup(async () => {
      calls += 1;
      return calls < 3 ? err(boundary("rate_limited", true)) : ok(discoveryOutput);
    });

    const result = await executor.execute("discovery", { signal });

    expect(result._unsafeUnwrap()).toEqual(discoveryOutput);
    expect(discovery).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([500, 1_000]);
  });

  it("reports a transient error once retries are exhausted", async () => {
    const { executor, discovery } = setup(async () =>
      err(boundary("transport_error", true)),
    );

    const result = await executor.execute("discovery", { signal });

    expect(discovery).toHaveBeenCalledTimes(3);
    expect(result._unsafeUnwrapErr()).toMatchObject({
      stage: "discovery",
      classification: "transient",
      code: "transport_error",
      attempts: 3,
    });
  });

  it("does not retry permanent failures", async () => {
    const { executor, discovery, sleep } = setup(async () =>
      err(boundary("auth_invalid", false)),
    );

    const result = await executor.execute("discovery", { signal });

    expect(discovery).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(result._unsafeUnwrapErr()).toMatchObject({
      classification: "permanent",
      code: "auth_invalid",
      attempts: 1,
    });
  });

  it("times out a slow stage and aborts its signal", async () => {
    const seen: AbortSignal[] = [];
    const { executor } = setup(
      (_input, context) =>
        new Promise(() => {
          seen.push(context.signal);
        }),
      { timeoutMs: 10, options: { maxRetries: 0 } },
    );

    const result = await executor.execute("discovery", { signal });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      classification: "transient",
      code: "timeout",
      attempts: 1,
    });
    expect(seen[0]?.aborted).toBe(true);
  });

  it("treats undecodable output as permanent and caches nothing", async () => {
    const cache = new InMemoryCacheStore(clock);
    const { executor, discovery } = setup(
      async () => ok({ isInteresting: "yes" }),
      { cache },
    );

    const result = await executor.execute("discovery", { signal });

    expect(discovery).toHaveBeenCalledTimes(1);
    expect(result._unsafeUnwrapErr()).toMatchObject({
      classification: "permanent",
      code: "validation_error",
    });
    expect(cache.size).toBe(0);
  });

  it("rejects invalid input before touching cache or stage", async () => {
    const { executor, discovery } = setup(async () => ok(discoveryOutput));

    const result = await executor.execute("discovery", {
      signal: { ...signal, subject: "" },
    });

    expect(discovery).not.toHaveBeenCalled();
    expect(result._unsafeUnwrapErr()).toMatchObject({
      classification: "permanent",
      code: "invalid_input",
      attempts: 0,
    });
  });

  it("retries when the stage throws", async () => {
    let calls = 0;
    const { executor, discovery } = setup(async () => {
      calls += 1;
      if (calls === 1) {
        throw new Error("socket hang up");
      }
      return ok(discoveryOutput);
    });

    const result = await executor.execute("discovery", { signal });

    expect(result.isOk()).toBe(true);
    expect(discovery).toHaveBeenCalledTimes(2);
  });

  it("falls through to the stage when the cache is unavailable", async () => {
    const unavailable: AppBoundaryError = {
      ...boundary("cache_unavailable", true),
      source: "cache",
    };
    const cache: CacheStorePort = {
      get: async () => err(unavailable),
      put: async () => err(unavailable),
      invalidate: async () => ok(undefined),
    };
    const { executor, discovery, logger } = setup(
      async () => ok(discoveryOutput),
      { cache },
    );
    const warn = vi.spyOn(logger, "warn");

    const result = await executor.execute("discovery", { signal });

    expect(result._unsafeUnwrap()).toEqual(discoveryOutput);
    expect(discovery).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      expect.objectContaining({ code: "cache_unavailable" }),
      "Cache unavailable, treating as miss",
    );
  });

  it("ignores cached values that no longer decode", async () => {
    const cache = new InMemoryCacheStore(clock);
    await cache.put(
      stageFingerprint("discovery", { signal }),
      { stale: true },
      600,
    );
    const { executor, discovery } = setup(async () => ok(discoveryOutput), {
      cache,
    });

    const result = await executor.execute("discovery", { signal });

    expect(result._unsafeUnwrap()).toEqual(discoveryOutput);
    expect(discovery).toHaveBeenCalledTimes(1);
  });
});
