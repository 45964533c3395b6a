import path from "node:path";
import type { Embeddings } from "./embeddings";
import { IndexingCancelledError, InvalidArgumentError } from "./errors";
import type { Persistence } from "./persistence";
import { assertChunkParams, segment } from "./segmenter";
import type { DocumentSession, DocumentSessionStore } from "./session";
import type { StatusManager } from "./status";
import type { SourceDocument } from "./types";
import { VectorIndex } from "./vector-index";

/**
 * Options required to construct a {@link DocumentIndexer}. Chunk sizing may
 * be overridden per call; persistence and status are optional.
 */
export interface DocumentIndexerOptions {
  embeddings: Embeddings;
  session: DocumentSessionStore;
  chunkSize?: number; // default 500
  chunkOverlap?: number; // default 50
  persistence?: Persistence;
  status?: StatusManager;
  verbose?: boolean;
}

export interface IndexDocumentInput {
  text: string;
  documentId: string;
  filename?: string;
  pageCount?: number;
  chunkSize?: number;
  chunkOverlap?: number;
}

export interface IndexResult {
  documentId: string;
  filename: string;
  chunks: number;
  /** Vector dimension, null for a document without text. */
  dimension: number | null;
  status: "indexed";
}

/**
 * Indexing entry point: segments a document, embeds every chunk, builds a
 * fresh {@link VectorIndex} and installs it as the active session.
 *
 * Only one document can be active, so a new run cancels any run still in
 * flight. A run that fails or is cancelled never touches the active session.
 */
export class DocumentIndexer {
  private readonly embeddings: Embeddings;
  private readonly session: DocumentSessionStore;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly persistence?: Persistence;
  private readonly status?: StatusManager;
  private readonly verbose: boolean;
  private inFlight: AbortController | null = null;

  public constructor(opts: DocumentIndexerOptions) {
    this.embeddings = opts.embeddings;
    this.session = opts.session;
    this.chunkSize = opts.chunkSize ?? 500;
    this.chunkOverlap = opts.chunkOverlap ?? 50;
    assertChunkParams(this.chunkSize, this.chunkOverlap);
    this.persistence = opts.persistence;
    this.status = opts.status;
    this.verbose = !!opts.verbose;
  }

  /**
   * Index `input.text` as the new active document.
   *
   * @param signal Optional caller cancellation (e.g. request aborted).
   * @throws {InvalidConfigurationError} For bad chunk parameters.
   * @throws {EmbeddingServiceError} If any chunk cannot be embedded.
   * @throws {IndexingCancelledError} If superseded, cleared or aborted.
   */
  public async indexDocument(input: IndexDocumentInput, signal?: AbortSignal): Promise<IndexResult> {
    const documentId = input.documentId.trim();
    if (!documentId) throw new InvalidArgumentError("documentId must not be empty");
    const chunkSize = input.chunkSize ?? this.chunkSize;
    const chunkOverlap = input.chunkOverlap ?? this.chunkOverlap;
    const chunks = segment(input.text, chunkSize, chunkOverlap, documentId);

    this.inFlight?.abort(new IndexingCancelledError("Superseded by a newer document"));
    const controller = new AbortController();
    this.inFlight = controller;
    const runSignal = signal ? AbortSignal.any([controller.signal, signal]) : controller.signal;

    const document: SourceDocument = {
      id: documentId,
      filename: input.filename?.trim() || documentId,
      text: input.text,
      pageCount: input.pageCount,
    };
    console.error(`[RAG] Indexing ${document.filename}: ${chunks.length} chunks`);
    this.status?.beginIndexing(chunks.length);

    let installed: DocumentSession;
    try {
      const vectors = await this.embeddings.embed(
        chunks.map((c) => c.text),
        {
          signal: runSignal,
          onProgress: (done) => {
            if (this.inFlight === controller) this.status?.setEmbedded(done);
          },
        },
      );
      const index = new VectorIndex(documentId);
      chunks.forEach((chunk, i) => index.insert(chunk, vectors[i]));
      // last check before the swap: a cancelled run must not become active
      runSignal.throwIfAborted();
      installed = this.session.replace(document, index);
    } catch (e) {
      const err = runSignal.aborted ? DocumentIndexer.cancellation(runSignal.reason) : e;
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[RAG] Indexing ${document.filename} failed: ${message}`);
      // a superseded run leaves the status to its successor
      if (this.inFlight === controller) this.status?.endIndexing(message);
      throw err;
    } finally {
      if (this.inFlight === controller) this.inFlight = null;
    }

    this.status?.endIndexing();
    this.status?.setDocument({
      documentId,
      filename: document.filename,
      chunks: chunks.length,
      pageCount: document.pageCount ?? null,
      indexedAt: new Date().toISOString(),
    });
    await this.persistence?.save(
      installed,
      { chunkSize, chunkOverlap, modelName: this.embeddings.getModelName() },
      () => this.session.current() === installed,
    );
    if (this.verbose) {
      console.error(`[RAG][verbose] Active document is now ${documentId}`);
    }
    return {
      documentId,
      filename: document.filename,
      chunks: chunks.length,
      dimension: installed.index.dimension,
      status: "indexed",
    };
  }

  /**
   * Drop the active document, cancel any run in flight and remove the
   * snapshot. @returns Whether a document was active.
   */
  public async clearSession(): Promise<boolean> {
    if (this.inFlight) {
      this.inFlight.abort(new IndexingCancelledError("Session cleared"));
      this.inFlight = null;
      this.status?.endIndexing("Session cleared");
    }
    const had = this.session.clear();
    this.status?.setDocument(null);
    await this.persistence?.remove();
    if (had) console.error(`[RAG] Session cleared.`);
    return had;
  }

  /**
   * Restore the active session from the persisted snapshot, if one exists
   * and was embedded with the current model. The snapshot keeps the chunks
   * as they were cut, whatever sizing the server now defaults to.
   */
  public async restore(): Promise<boolean> {
    if (!this.persistence) return false;
    const loaded = await this.persistence.load(this.embeddings.getModelName());
    if (!loaded) return false;
    const { document, index } = loaded;
    this.session.replace(document, index);
    this.status?.setDocument({
      documentId: document.id,
      filename: document.filename,
      chunks: index.size,
      pageCount: document.pageCount ?? null,
      indexedAt: loaded.savedAt,
    });
    return true;
  }

  /**
   * Resolve a user-supplied relative path against `root`, rejecting traversal
   * outside it.
   */
  public static ensureWithinRoot(root: string, relPath: string): string {
    const abs = path.resolve(root, relPath);
    const normRoot = path.resolve(root) + path.sep;
    if (!abs.startsWith(normRoot)) {
      throw new InvalidArgumentError("Path outside DOCUMENTS_ROOT");
    }
    return abs;
  }

  private static cancellation(reason: unknown): IndexingCancelledError {
    if (reason instanceof IndexingCancelledError) return reason;
    return new IndexingCancelledError(
      reason instanceof Error ? `Indexing aborted: ${reason.message}` : "Indexing aborted",
    );
  }
}
