import { DimensionMismatchError, InvalidArgumentError } from "./errors";
import type { Chunk, EmbeddingVector, ScoredChunk } from "./types";

interface Entry {
  chunk: Chunk;
  vector: EmbeddingVector;
  norm: number;
}

function l2norm(v: EmbeddingVector): number {
  let s = 0;
  for (let i = 0; i < v.length; i++) s += v[i] * v[i];
  return Math.sqrt(s);
}

/**
 * In-memory chunk → vector store for a single document, queried by linear
 * cosine-similarity scan. Insertion order is chunk order and breaks score
 * ties (earlier chunk first). Norms are computed once on insert.
 */
export class VectorIndex {
  private readonly items: Entry[] = [];
  private dim: number | null = null;
  private sealed = false;

  public constructor(public readonly documentId: string) {}

  public get size(): number {
    return this.items.length;
  }

  /** Vector dimension, or null while empty. */
  public get dimension(): number | null {
    return this.dim;
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  /** Reject further inserts. Called when the index is installed in a session. */
  public seal(): void {
    this.sealed = true;
  }

  /**
   * Append a chunk and its vector. Validation happens before any mutation,
   * so a rejected insert leaves the index unchanged.
   *
   * @throws {DimensionMismatchError} If the vector's length differs from stored vectors.
   * @throws {InvalidArgumentError} For sealed indexes, foreign or out-of-order chunks, or malformed vectors.
   */
  public insert(chunk: Chunk, vector: EmbeddingVector): void {
    if (this.sealed) throw new InvalidArgumentError("Index is sealed");
    if (chunk.documentId !== this.documentId) {
      throw new InvalidArgumentError(
        `Chunk belongs to document '${chunk.documentId}', index is for '${this.documentId}'`,
      );
    }
    if (chunk.index !== this.items.length) {
      throw new InvalidArgumentError(
        `Chunk index ${chunk.index} out of order (expected ${this.items.length})`,
      );
    }
    if (vector.length === 0) throw new InvalidArgumentError("Empty embedding vector");
    if (this.dim !== null && vector.length !== this.dim) {
      throw new DimensionMismatchError(this.dim, vector.length);
    }
    if (!vector.every(Number.isFinite)) {
      throw new InvalidArgumentError("Embedding vector contains non-finite values");
    }
    this.dim = vector.length;
    this.items.push({ chunk, vector, norm: l2norm(vector) });
  }

  /**
   * Top-k chunks by cosine similarity to `vector`, highest first.
   *
   * @param k Maximum results; values above {@link size} return everything.
   * @throws {InvalidArgumentError} If k is not a positive integer or the vector has non-finite values.
   * @throws {DimensionMismatchError} If the query dimension differs from the index.
   */
  public query(vector: EmbeddingVector, k: number): ScoredChunk[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer (got ${k})`);
    }
    if (this.items.length === 0) return [];
    if (vector.length !== this.dim) {
      throw new DimensionMismatchError(this.dim ?? 0, vector.length);
    }
    if (!vector.every(Number.isFinite)) {
      throw new InvalidArgumentError("Query vector contains non-finite values");
    }
    const qn = l2norm(vector);
    const scored = this.items.map((e) => {
      let dot = 0;
      for (let i = 0; i < vector.length; i++) dot += vector[i] * e.vector[i];
      const denom = qn * e.norm;
      return { chunk: e.chunk, score: denom === 0 ? 0 : dot / denom };
    });
    // Array.prototype.sort is stable: equal scores keep insertion order.
    scored.sort((a, b) => b.score - a.score);
    return scored.slice(0, k);
  }

  /** Chunks in insertion order. */
  public chunks(): Chunk[] {
    return this.items.map((e) => e.chunk);
  }

  /** (chunk, vector) pairs in insertion order. */
  public *entries(): IterableIterator<[Chunk, EmbeddingVector]> {
    for (const e of this.items) yield [e.chunk, e.vector];
  }
}
