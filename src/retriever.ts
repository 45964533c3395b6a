import type { Embeddings } from "./embeddings";
import { InvalidArgumentError, NoActiveDocumentError } from "./errors";
import type { DocumentSessionStore } from "./session";
import type { ScoredChunk } from "./types";

export const DEFAULT_TOP_K = 3;

export interface RetrievalResult {
  documentId: string;
  matches: ScoredChunk[];
  /** Formatted context block handed to the generation step. */
  context: string;
}

/**
 * Join chunk texts into one context block, most relevant first. Each excerpt
 * is numbered so the generator can tell chunks apart.
 */
export function formatContext(matches: readonly ScoredChunk[]): string {
  return matches.map((m, i) => `[Excerpt ${i + 1}]:\n${m.chunk.text}`).join("\n\n");
}

/**
 * Query-time half of the pipeline: embed the question, rank the active
 * document's chunks and build the context. Never mutates the session.
 */
export class Retriever {
  public constructor(
    private readonly session: DocumentSessionStore,
    private readonly embeddings: Embeddings,
  ) {}

  /**
   * @throws {NoActiveDocumentError} When nothing is indexed.
   * @throws {EmbeddingServiceError} When the query cannot be embedded.
   * @throws {InvalidArgumentError} If k is not a positive integer.
   */
  public async search(query: string, k = DEFAULT_TOP_K, signal?: AbortSignal): Promise<RetrievalResult> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new InvalidArgumentError(`k must be a positive integer (got ${k})`);
    }
    // Capture the handle once; a replace during embedding must not mix documents.
    const active = this.session.current();
    if (!active) throw new NoActiveDocumentError();

    const qEmb = await this.embeddings.embedOne(query, signal);
    const matches = active.index.query(qEmb, k);
    return { documentId: active.document.id, matches, context: formatContext(matches) };
  }

  /** Context string for the top `k` chunks. */
  public async retrieve(query: string, k = DEFAULT_TOP_K, signal?: AbortSignal): Promise<string> {
    const { context } = await this.search(query, k, signal);
    return context;
  }
}
