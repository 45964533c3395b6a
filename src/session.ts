import { InvalidArgumentError } from "./errors";
import type { SourceDocument } from "./types";
import type { VectorIndex } from "./vector-index";

/** The active (document, index) pair. Frozen: replaced whole, never edited. */
export interface DocumentSession {
  readonly document: SourceDocument;
  readonly index: VectorIndex;
}

/**
 * Holds at most one active document session. Uploading a new document
 * replaces the previous one.
 *
 * Updates swap a single frozen handle, so a reader that grabbed
 * {@link current} keeps a consistent document/index pair even if a replace
 * lands while it is still working.
 */
export class DocumentSessionStore {
  private active: DocumentSession | null = null;

  /**
   * Install a new session, discarding the previous one. The index is sealed.
   *
   * @throws {InvalidArgumentError} If the index was built for another document.
   */
  public replace(document: SourceDocument, index: VectorIndex): DocumentSession {
    if (index.documentId !== document.id) {
      throw new InvalidArgumentError(
        `Index for '${index.documentId}' cannot be paired with document '${document.id}'`,
      );
    }
    index.seal();
    const session: DocumentSession = Object.freeze({ document, index });
    this.active = session;
    return session;
  }

  public current(): DocumentSession | null {
    return this.active;
  }

  /** @returns Whether a session was active. */
  public clear(): boolean {
    const had = this.active !== null;
    this.active = null;
    return had;
  }
}
