import { describe, expect, it } from "vitest";
import { InMemoryCacheStore } from "./inMemoryCacheStore";

const createStore = () => {
  let now = new Date("2026-03-02T10:00:00.000Z");
  const store = new InMemoryCacheStore({ now: () => now });
  return {
    store,
    advance: (ms: number) => {
      now = new Date(now.getTime() + ms);
    },
  };
};

describe("InMemoryCacheStore", () => {
  it("returns a stored value with its lifetime", async () => {
    const { store } = createStore();
    await store.put("k", { thesis: "steady" }, 60);

    const entry = await store.get("k");
    expect(entry._unsafeUnwrap()).toEqual({
      key: "k",
      value: { thesis: "steady" },
      createdAt: new Date("2026-03-02T10:00:00.000Z"),
      expiresAt: new Date("2026-03-02T10:01:00.000Z"),
    });
  });

  it("treats an entry as gone once its expiry is reached", async () => {
    const { store, advance } = createStore();
    await store.put("k", 1, 60);

    advance(59_999);
    expect((await store.get("k"))._unsafeUnwrap()).not.toBeNull();

    advance(1);
    expect((await store.get("k"))._unsafeUnwrap()).toBeNull();
    expect(store.size).toBe(0);
  });

  it("forgets invalidated keys", async () => {
    const { store } = createStore();
    await store.put("k", 1, 60);
    await store.invalidate("k");

    expect((await store.get("k"))._unsafeUnwrap()).toBeNull();
  });
});
