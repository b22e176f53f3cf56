import { describe, expect, it } from "vitest";
import { cosineSimilarity } from "../memory/vectorMath";
import { MockEmbedding } from "./mockEmbedding";

const embedAll = async (texts: string[]): Promise<number[][]> => {
  const result = await new MockEmbedding(64).embedTexts(texts);
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
  return result.value;
};

describe("MockEmbedding", () => {
  it("returns one unit vector per text at the configured dimension", async () => {
    const [vector] = await embedAll(["Promoter buys ACME shares"]);

    expect(vector).toHaveLength(64);
    const norm = Math.sqrt((vector ?? []).reduce((sum, v) => sum + v * v, 0));
    expect(norm).toBeCloseTo(1, 10);
  });

  it("is deterministic and ignores case and punctuation", async () => {
    const [left, right] = await embedAll([
      "Promoter buys ACME shares",
      "promoter, buys acme SHARES!",
    ]);

    expect(left).toEqual(right);
  });

  it("places texts sharing words closer than unrelated texts", async () => {
    const [query, related, unrelated] = await embedAll([
      "promoter buys acme shares",
      "promoter buys acme stock",
      "quarterly rainfall totals",
    ]);

    expect(cosineSimilarity(query ?? [], related ?? [])).toBeGreaterThan(
      cosineSimilarity(query ?? [], unrelated ?? []),
    );
  });

  it("returns a zero vector for text without words", async () => {
    const [vector] = await embedAll(["  ...  "]);

    expect(vector).toEqual(new Array<number>(64).fill(0));
  });
});
