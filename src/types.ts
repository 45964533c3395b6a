/**
 * Shared document/chunk types used throughout the indexing + retrieval layers.
 */

/** Fixed-length embedding. The dimension is set by the model that produced it. */
export type EmbeddingVector = Float32Array;

/** A document whose text has been extracted and is (or is about to be) indexed. */
export interface SourceDocument {
  /** Unique within the active session. */
  readonly id: string;
  /** Original upload filename (falls back to the id). */
  readonly filename: string;
  /** Raw extracted text. */
  readonly text: string;
  readonly pageCount?: number;
}

/**
 * A contiguous slice of a document's text. `start`/`end` are half-open
 * character offsets into {@link SourceDocument.text}.
 */
export interface Chunk {
  /** Sequence index within the document (0-based, contiguous). */
  readonly index: number;
  readonly documentId: string;
  readonly text: string;
  readonly start: number;
  readonly end: number;
}

/** A chunk paired with its cosine similarity to a query. */
export interface ScoredChunk {
  readonly chunk: Chunk;
  readonly score: number;
}
