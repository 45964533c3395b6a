/**
 * Error kinds raised by the retrieval core. Every error carries a stable
 * `kind` so transports can map it without instanceof chains.
 */
export type RagErrorKind =
  | "InvalidConfiguration"
  | "DimensionMismatch"
  | "EmbeddingServiceError"
  | "NoActiveDocument"
  | "InvalidArgument"
  | "IndexingCancelled"
  | "DocumentExtractionError";

export abstract class RagError extends Error {
  public abstract readonly kind: RagErrorKind;
}

/** Bad chunk / overlap parameters. */
export class InvalidConfigurationError extends RagError {
  public readonly kind = "InvalidConfiguration";

  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

/** A vector's length differs from the vectors it is compared or stored with. */
export class DimensionMismatchError extends RagError {
  public readonly kind = "DimensionMismatch";

  constructor(
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Embedding dimension mismatch: expected ${expected}, got ${actual}`);
    this.name = "DimensionMismatchError";
  }
}

/**
 * Failure contacting (or interpreting the answer of) the embedding provider.
 * `transient` marks failures worth retrying: rate limits, 5xx, network.
 */
export class EmbeddingServiceError extends RagError {
  public readonly kind = "EmbeddingServiceError";

  constructor(
    message: string,
    public readonly transient: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "EmbeddingServiceError";
  }
}

export class NoActiveDocumentError extends RagError {
  public readonly kind = "NoActiveDocument";

  constructor() {
    super("No document is currently indexed");
    this.name = "NoActiveDocumentError";
  }
}

export class InvalidArgumentError extends RagError {
  public readonly kind = "InvalidArgument";

  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/** An indexing run was superseded by a newer one, cleared, or aborted by its caller. */
export class IndexingCancelledError extends RagError {
  public readonly kind = "IndexingCancelled";

  constructor(message = "Indexing was cancelled") {
    super(message);
    this.name = "IndexingCancelledError";
  }
}

export class DocumentExtractionError extends RagError {
  public readonly kind = "DocumentExtractionError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentExtractionError";
  }
}

export function isRagError(e: unknown): e is RagError {
  return e instanceof RagError;
}
