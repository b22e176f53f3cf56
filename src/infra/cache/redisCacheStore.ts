import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CacheEntry } from "../../core/entities/memory";
import type {
  CacheStorePort,
  ClockPort,
} from "../../core/ports/outboundPorts";

/**
 * Subset of the ioredis client this adapter relies on.
 */
export type RedisCacheClient = {
  get(key: string): Promise<string | null>;
  set(
    key: string,
    value: string,
    expiryMode: "EX",
    seconds: number,
  ): Promise<unknown>;
  del(key: string): Promise<number>;
};

const storedEntrySchema = z.object({
  value: z.unknown(),
  createdAt: z.string(),
  expiresAt: z.string(),
});

/**
 * Stores stage responses in Redis with native key expiry. Any client failure surfaces as
 * `cache_unavailable` so callers can degrade to a miss.
 */
export class RedisCacheStore implements CacheStorePort {
  constructor(
    private readonly client: RedisCacheClient,
    private readonly clock: ClockPort,
  ) {}

  async get(key: string): Promise<Result<CacheEntry | null, AppBoundaryError>> {
    let raw: string | null;
    try {
      raw = await this.client.get(key);
    } catch (error) {
      return err(this.unavailable("get", error));
    }

    if (raw === null) {
      return ok(null);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      await this.invalidate(key);
      return ok(null);
    }

    const parsed = storedEntrySchema.safeParse(decoded);
    if (!parsed.success) {
      await this.invalidate(key);
      return ok(null);
    }

    const expiresAt = new Date(parsed.data.expiresAt);
    if (expiresAt.getTime() <= this.clock.now().getTime()) {
      await this.invalidate(key);
      return ok(null);
    }

    return ok({
      key,
      value: parsed.data.value,
      createdAt: new Date(parsed.data.createdAt),
      expiresAt,
    });
  }

  async put(
    key: string,
    value: unknown,
    ttlSeconds: number,
  ): Promise<Result<void, AppBoundaryError>> {
    const createdAt = this.clock.now();
    const payload = JSON.stringify({
      value,
      createdAt: createdAt.toISOString(),
      expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1_000).toISOString(),
    });

    try {
      await this.client.set(key, payload, "EX", Math.max(1, Math.ceil(ttlSeconds)));
      return ok(undefined);
    } catch (error) {
      return err(this.unavailable("put", error));
    }
  }

  async invalidate(key: string): Promise<Result<void, AppBoundaryError>> {
    try {
      await this.client.del(key);
      return ok(undefined);
    } catch (error) {
      return err(this.unavailable("invalidate", error));
    }
  }

  private unavailable(operation: string, cause: unknown): AppBoundaryError {
    return {
      source: "cache",
      code: "cache_unavailable",
      provider: "redis",
      message: `Redis cache ${operation} failed: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      retryable: true,
      cause,
    };
  }
}
