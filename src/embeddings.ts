import { EmbeddingServiceError } from "./errors";
import type { EmbeddingVector } from "./types";

/**
 * Capability implemented by every embedding backend. A provider embeds one
 * batch per call and must answer with exactly one vector per input, in
 * input order. Failures should be raised as {@link EmbeddingServiceError}
 * so the client can tell transient from permanent ones.
 */
export interface EmbeddingProvider {
  readonly modelName: string;
  embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]>;
}

export interface EmbeddingsOptions {
  /** Texts per provider call (default 100). */
  batchSize?: number;
  /** Retries of a transient failure per batch (default 3). */
  maxRetries?: number;
  /** First backoff delay; doubles on every retry (default 250ms). */
  retryBaseMs?: number;
  verbose?: boolean;
}

export interface EmbedCallOptions {
  signal?: AbortSignal;
  /** Invoked after every batch with (embedded so far, total). */
  onProgress?: (done: number, total: number) => void;
}

/** Resolve after `ms`, or reject with the signal's reason once it aborts. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Embedding client: batches texts through an {@link EmbeddingProvider},
 * retries transient failures with exponential backoff, and checks that every
 * answer has the right shape. A single instance can be reused for any number
 * of embed() calls.
 */
export class Embeddings {
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly verbose: boolean;

  public constructor(provider: EmbeddingProvider, opts: EmbeddingsOptions = {}) {
    this.provider = provider;
    this.batchSize = Math.max(1, Math.floor(opts.batchSize ?? 100));
    this.maxRetries = Math.max(0, Math.floor(opts.maxRetries ?? 3));
    this.retryBaseMs = Math.max(0, opts.retryBaseMs ?? 250);
    this.verbose = !!opts.verbose;
  }

  /** @returns Underlying model identifier. */
  public getModelName(): string {
    return this.provider.modelName;
  }

  /**
   * Embed texts in order. Never substitutes a placeholder vector: any batch
   * that cannot be embedded fails the whole call.
   *
   * @throws {EmbeddingServiceError} On provider failure after retries.
   * @throws The signal's abort reason when cancelled.
   */
  public async embed(texts: readonly string[], opts: EmbedCallOptions = {}): Promise<EmbeddingVector[]> {
    const { signal, onProgress } = opts;
    const out: EmbeddingVector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      signal?.throwIfAborted();
      const batch = texts.slice(i, i + this.batchSize);
      const vectors = await this.embedBatchWithRetry(batch, signal);
      out.push(...vectors);
      onProgress?.(out.length, texts.length);
      if (this.verbose) {
        console.error(`[RAG][verbose] Embedded ${out.length}/${texts.length}`);
      }
    }
    return out;
  }

  /** Embed a single text (e.g. a query). */
  public async embedOne(text: string, signal?: AbortSignal): Promise<EmbeddingVector> {
    const [vector] = await this.embed([text], { signal });
    if (!vector) throw new EmbeddingServiceError("Provider returned no vector", false);
    return vector;
  }

  private async embedBatchWithRetry(
    batch: readonly string[],
    signal?: AbortSignal,
  ): Promise<EmbeddingVector[]> {
    for (let attempt = 0; ; attempt++) {
      try {
        const vectors = await this.provider.embedBatch(batch, signal);
        Embeddings.checkBatch(batch.length, vectors);
        return vectors;
      } catch (e) {
        if (signal?.aborted) throw signal.reason;
        const err = Embeddings.toServiceError(e);
        if (!err.transient || attempt >= this.maxRetries) throw err;
        const delay = this.retryBaseMs * 2 ** attempt;
        console.error(
          `[RAG] Embedding batch failed (${err.message}); retry ${attempt + 1}/${this.maxRetries} in ${delay}ms`,
        );
        await sleep(delay, signal);
      }
    }
  }

  private static checkBatch(expected: number, vectors: EmbeddingVector[]): void {
    if (vectors.length !== expected) {
      throw new EmbeddingServiceError(
        `Provider returned ${vectors.length} vectors for ${expected} inputs`,
        false,
      );
    }
    const dim = vectors[0]?.length ?? 0;
    for (const v of vectors) {
      if (v.length === 0 || v.length !== dim) {
        throw new EmbeddingServiceError("Provider returned vectors of inconsistent dimension", false);
      }
    }
  }

  private static toServiceError(e: unknown): EmbeddingServiceError {
    if (e instanceof EmbeddingServiceError) return e;
    const message = e instanceof Error ? e.message : String(e);
    return new EmbeddingServiceError(`Embedding provider failed: ${message}`, false, { cause: e });
  }
}
