import { describe, expect, it } from "vitest";
import { type RedisCacheClient, RedisCacheStore } from "./redisCacheStore";

const clock = { now: () => new Date("2026-03-02T10:00:00.000Z") };

const createFakeRedis = () => {
  const values = new Map<string, string>();
  const expiries = new Map<string, number>();
  const client: RedisCacheClient = {
    get: async (key) => values.get(key) ?? null,
    set: async (key, value, _mode, seconds) => {
      values.set(key, value);
      expiries.set(key, seconds);
      return "OK";
    },
    del: async (key) => (values.delete(key) ? 1 : 0),
  };
  return { client, values, expiries };
};

const failingClient: RedisCacheClient = {
  get: async () => {
    throw new Error("ECONNREFUSED");
  },
  set: async () => {
    throw new Error("ECONNREFUSED");
  },
  del: async () => {
    throw new Error("ECONNREFUSED");
  },
};

describe("RedisCacheStore", () => {
  it("writes JSON with native expiry and reads it back", async () => {
    const { client, expiries } = createFakeRedis();
    const store = new RedisCacheStore(client, clock);

    await store.put("k", { fundamentals: "solid" }, 90);

    expect(expiries.get("k")).toBe(90);
    expect((await store.get("k"))._unsafeUnwrap()).toEqual({
      key: "k",
      value: { fundamentals: "solid" },
      createdAt: new Date("2026-03-02T10:00:00.000Z"),
      expiresAt: new Date("2026-03-02T10:01:30.000Z"),
    });
  });

  it("drops an undecodable entry and reports a miss", async () => {
    const { client, values } = createFakeRedis();
    values.set("k", "{not json");
    const store = new RedisCacheStore(client, clock);

    expect((await store.get("k"))._unsafeUnwrap()).toBeNull();
    expect(values.has("k")).toBe(false);
  });

  it("drops an entry whose stored expiry has passed", async () => {
    const { client, values } = createFakeRedis();
    values.set(
      "k",
      JSON.stringify({
        value: 1,
        createdAt: "2026-03-02T09:00:00.000Z",
        expiresAt: "2026-03-02T09:30:00.000Z",
      }),
    );
    const store = new RedisCacheStore(client, clock);

    expect((await store.get("k"))._unsafeUnwrap()).toBeNull();
    expect(values.has("k")).toBe(false);
  });

  it("reports client failures as cache_unavailable", async () => {
    const store = new RedisCacheStore(failingClient, clock);

    const read = await store.get("k");
    const write = await store.put("k", 1, 60);

    expect(read._unsafeUnwrapErr()).toMatchObject({
      source: "cache",
      code: "cache_unavailable",
      provider: "redis",
      message: "Redis cache get failed: ECONNREFUSED",
      retryable: true,
    });
    expect(write._unsafeUnwrapErr().message).toBe(
      "Redis cache put failed: ECONNREFUSED",
    );
  });
});
