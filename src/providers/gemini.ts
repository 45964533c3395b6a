import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type GenerativeModel,
} from "@google/generative-ai";
import { EmbeddingServiceError } from "../errors";
import type { EmbeddingProvider } from "../embeddings";
import type { EmbeddingVector } from "../types";

/** Gemini caps batchEmbedContents at 100 requests. */
export const GEMINI_MAX_BATCH = 100;

/** Rate limits, server errors and network failures are worth retrying. */
function isTransient(e: unknown): boolean {
  if (e instanceof GoogleGenerativeAIFetchError) {
    const status = e.status ?? 0;
    return status === 429 || status >= 500 || status === 0;
  }
  // undici surfaces connection failures as TypeError("fetch failed")
  return e instanceof TypeError;
}

/**
 * Embedding provider backed by the Gemini embedding API. One
 * batchEmbedContents call per batch.
 */
export class GeminiEmbeddingProvider implements EmbeddingProvider {
  public readonly modelName: string;
  private readonly model: GenerativeModel;

  public constructor(apiKey: string, modelName = "text-embedding-004") {
    if (!apiKey.trim()) {
      throw new EmbeddingServiceError("GEMINI_API_KEY is not set", false);
    }
    this.modelName = modelName;
    this.model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelName });
  }

  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    if (texts.length > GEMINI_MAX_BATCH) {
      throw new EmbeddingServiceError(
        `Gemini accepts at most ${GEMINI_MAX_BATCH} texts per batch (got ${texts.length})`,
        false,
      );
    }
    try {
      const res = await this.model.batchEmbedContents(
        {
          requests: texts.map((text) => ({
            content: { role: "user", parts: [{ text }] },
          })),
        },
        { signal },
      );
      return res.embeddings.map((e) => Float32Array.from(e.values));
    } catch (e) {
      if (signal?.aborted) throw signal.reason;
      const message = e instanceof Error ? e.message : String(e);
      throw new EmbeddingServiceError(`Gemini embedding request failed: ${message}`, isTransient(e), {
        cause: e,
      });
    }
  }
}
