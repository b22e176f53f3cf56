import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { EmbeddingPort } from "../../core/ports/outboundPorts";

const bucketOf = (token: string, dimension: number): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < token.length; i += 1) {
    hash ^= token.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0) % dimension;
};

/**
 * Hashed bag-of-words vectors so recall and memory work locally without an embedding model.
 * Texts sharing words land close together; unit length unless the text has no words.
 */
export class MockEmbedding implements EmbeddingPort {
  constructor(private readonly dimension: number) {}

  async embedTexts(
    texts: string[],
  ): Promise<Result<number[][], AppBoundaryError>> {
    return ok(texts.map((text) => this.embed(text)));
  }

  private embed(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(/[a-z0-9]+/g) ?? [];
    tokens.forEach((token) => {
      const bucket = bucketOf(token, this.dimension);
      vector[bucket] = (vector[bucket] ?? 0) + 1;
    });

    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? vector : vector.map((value) => value / norm);
  }
}
