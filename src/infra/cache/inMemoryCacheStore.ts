import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CacheEntry } from "../../core/entities/memory";
import type {
  CacheStorePort,
  ClockPort,
} from "../../core/ports/outboundPorts";

/**
 * Process-local cache for single-process runs and tests. Expired entries are evicted on read.
 */
export class InMemoryCacheStore implements CacheStorePort {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(private readonly clock: ClockPort) {}

  async get(key: string): Promise<Result<CacheEntry | null, AppBoundaryError>> {
    const entry = this.entries.get(key);
    if (!entry) {
      return ok(null);
    }

    if (entry.expiresAt.getTime() <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return ok(null);
    }

    return ok(entry);
  }

  async put(
    key: string,
    value: unknown,
    ttlSeconds: number,
  ): Promise<Result<void, AppBoundaryError>> {
    const createdAt = this.clock.now();
    this.entries.set(key, {
      key,
      value,
      createdAt,
      expiresAt: new Date(createdAt.getTime() + ttlSeconds * 1_000),
    });
    return ok(undefined);
  }

  async invalidate(key: string): Promise<Result<void, AppBoundaryError>> {
    this.entries.delete(key);
    return ok(undefined);
  }

  get size(): number {
    return this.entries.size;
  }
}
