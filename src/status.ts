/**
 * Counters for the most recent indexing run. Reset at the start of each run.
 */
export interface IndexingStatus {
  /** True while a document is being segmented / embedded. */
  inProgress: boolean;
  /** Number of chunks produced for the document being indexed. */
  chunksTotal: number;
  /** Number of those chunks that have embeddings so far. */
  chunksEmbedded: number;
  /** Message of the last failed run, cleared on success. */
  lastError: string | null;
}

/** Summary of the active document, if any. */
export interface ActiveDocumentStatus {
  documentId: string;
  filename: string;
  chunks: number;
  pageCount: number | null;
  indexedAt: string;
}

/**
 * What /health and session_status report.
 *
 * `ready` flips once the embedding provider is configured and any persisted
 * snapshot has been restored; it does not require an active document.
 */
export interface ServerStatus {
  /** Version from package.json. */
  version: string;
  /** Embedding model identifier. */
  modelName: string;
  /** 'stdio', 'http', or 'unknown' before a transport starts. */
  transport: string;
  ready: boolean;
  /** ISO timestamp when the StatusManager was created. */
  startedAt: string;
  document: ActiveDocumentStatus | null;
  indexing: IndexingStatus;
}

/**
 * Owner of the status record. The indexer reports run progress here; the
 * transports only read it.
 */
export class StatusManager {
  private readonly data: ServerStatus;

  public constructor(initial?: Partial<ServerStatus>) {
    this.data = {
      version: initial?.version ?? "0.0.0",
      modelName: initial?.modelName ?? "",
      transport: initial?.transport ?? "unknown",
      ready: initial?.ready ?? false,
      startedAt: initial?.startedAt ?? new Date().toISOString(),
      document: initial?.document ?? null,
      indexing: initial?.indexing ?? {
        inProgress: false,
        chunksTotal: 0,
        chunksEmbedded: 0,
        lastError: null,
      },
    };
  }

  public markTransport(t: string) {
    this.data.transport = t;
  }

  public setModelName(name: string) {
    this.data.modelName = name;
  }

  /** Start a new indexing run with `chunks` chunks to embed. */
  public beginIndexing(chunks: number) {
    this.data.indexing = { inProgress: true, chunksTotal: chunks, chunksEmbedded: 0, lastError: null };
  }

  public setEmbedded(count: number) {
    this.data.indexing.chunksEmbedded = count;
  }

  /** Finish the current run; `error` records a failure. */
  public endIndexing(error?: string) {
    this.data.indexing.inProgress = false;
    this.data.indexing.lastError = error ?? null;
  }

  public setDocument(doc: ActiveDocumentStatus | null) {
    this.data.document = doc;
  }

  public markReady() {
    this.data.ready = true;
  }

  /** Live record, not a copy. Callers must not mutate it. */
  public getStatus(): ServerStatus {
    return this.data;
  }
}
