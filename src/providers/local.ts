import type { EmbeddingProvider } from "../embeddings";
import type { EmbeddingVector } from "../types";

function hashToken(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++) {
    h = (h * 31 + s.charCodeAt(i)) >>> 0;
  }
  return h;
}

/**
 * Offline fallback: hashes lowercase word tokens into a fixed number of
 * buckets and L2-normalizes the counts. Keyword overlap, not semantics, but
 * deterministic and dependency free.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
  public readonly modelName: string;

  public constructor(private readonly dimension = 256) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new RangeError(`dimension must be a positive integer (got ${dimension})`);
    }
    this.modelName = `local-hash-${dimension}`;
  }

  public embedText(text: string): EmbeddingVector {
    const vec = new Float32Array(this.dimension);
    const tokens = text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}\s]/gu, " ")
      .split(/\s+/)
      .filter((t) => t.length > 1);
    for (const t of tokens) {
      vec[hashToken(t) % this.dimension] += 1;
    }
    let norm = 0;
    for (const v of vec) norm += v * v;
    norm = Math.sqrt(norm);
    if (norm > 0) {
      for (let i = 0; i < vec.length; i++) vec[i] /= norm;
    }
    return vec;
  }

  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    signal?.throwIfAborted();
    return texts.map((t) => this.embedText(t));
  }
}
