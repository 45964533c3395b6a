import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { DocumentSession } from "./session";
import type { Chunk, EmbeddingVector, SourceDocument } from "./types";
import { VectorIndex } from "./vector-index";

/**
 * How the stored chunks were produced. Only `modelName` must match on load:
 * vectors from another model are not comparable with fresh query vectors.
 */
export interface SnapshotParams {
  chunkSize: number;
  chunkOverlap: number;
  modelName: string;
}

/** A restored session, ready to be installed in a DocumentSessionStore. */
export interface LoadedSnapshot {
  document: SourceDocument;
  index: VectorIndex;
  params: SnapshotParams;
  savedAt: string;
}

const snapshotSchema = z.object({
  version: z.literal(1),
  meta: z.object({
    chunkSize: z.number(),
    chunkOverlap: z.number(),
    modelName: z.string(),
    savedAt: z.string(),
    embEncoding: z.literal("f32-base64"),
  }),
  document: z.object({
    id: z.string(),
    filename: z.string(),
    text: z.string(),
    pageCount: z.number().int().nonnegative().optional(),
  }),
  chunks: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      start: z.number().int().nonnegative(),
      end: z.number().int().nonnegative(),
      text: z.string(),
      emb: z.string(),
    }),
  ),
});

type Snapshot = z.infer<typeof snapshotSchema>;

function encodeVector(v: EmbeddingVector): string {
  return Buffer.from(v.buffer, v.byteOffset, v.byteLength).toString("base64");
}

function decodeVector(s: string): EmbeddingVector | null {
  const buf = Buffer.from(s, "base64");
  if (buf.byteLength === 0 || buf.byteLength % 4 !== 0) return null;
  // copy: the Buffer may be a view into a shared pool with arbitrary alignment
  const bytes = new Uint8Array(buf);
  return new Float32Array(bytes.buffer, 0, bytes.byteLength / 4);
}

/**
 * Persists the active document session as a single JSON file (vectors as
 * base64-encoded little-endian float32) so a restart can skip re-embedding.
 * Only one document is ever stored.
 *
 * Writes and removals run one at a time in call order, so a removal is never
 * overtaken by a save that was requested before it.
 */
export class Persistence {
  private queue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly storePath: string,
    private readonly verbose = false,
  ) {}

  /**
   * Attempt to load the snapshot. Returns null when the file is missing,
   * unreadable, malformed or was embedded with another model.
   */
  public async load(modelName: string): Promise<LoadedSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.storePath, "utf8");
    } catch {
      return null;
    }
    let snapshot: Snapshot;
    try {
      const parsed = snapshotSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        console.error(`[RAG] Ignoring malformed snapshot at ${this.storePath}`);
        return null;
      }
      snapshot = parsed.data;
    } catch (e) {
      console.error(`[RAG] Failed to parse snapshot at ${this.storePath}:`, e);
      return null;
    }

    const { meta } = snapshot;
    if (meta.modelName !== modelName) {
      console.error(
        `[RAG] Stored snapshot was embedded with ${meta.modelName}, current model is ${modelName}. Ignoring it.`,
      );
      return null;
    }

    const document: SourceDocument = {
      id: snapshot.document.id,
      filename: snapshot.document.filename,
      text: snapshot.document.text,
      pageCount: snapshot.document.pageCount,
    };
    const index = new VectorIndex(document.id);
    try {
      for (const c of snapshot.chunks) {
        const emb = decodeVector(c.emb);
        if (!emb) throw new Error(`chunk ${c.index} has an undecodable vector`);
        const chunk: Chunk = Object.freeze({
          index: c.index,
          documentId: document.id,
          text: c.text,
          start: c.start,
          end: c.end,
        });
        index.insert(chunk, emb);
      }
    } catch (e) {
      console.error(`[RAG] Snapshot at ${this.storePath} is inconsistent:`, e);
      return null;
    }
    console.error(`[RAG] Loaded persisted snapshot: ${document.id} (${index.size} chunks).`);
    return {
      document,
      index,
      params: { chunkSize: meta.chunkSize, chunkOverlap: meta.chunkOverlap, modelName: meta.modelName },
      savedAt: meta.savedAt,
    };
  }

  /**
   * Write the session to disk. Failures are logged, never thrown.
   *
   * @param stillWanted Checked when the queued write is about to run; the
   *   write is skipped when it returns false (session cleared or replaced).
   */
  public save(
    session: DocumentSession,
    params: SnapshotParams,
    stillWanted: () => boolean = () => true,
  ): Promise<void> {
    return this.enqueue(async () => {
      if (!stillWanted()) {
        if (this.verbose) console.error(`[RAG][verbose] Skipping stale snapshot of ${session.document.id}`);
        return;
      }
      await this.write(session, params);
    });
  }

  /** Delete the snapshot file if present. */
  public remove(): Promise<void> {
    return this.enqueue(async () => {
      try {
        await fs.rm(this.storePath, { force: true });
      } catch (e) {
        console.error(`[RAG] Failed to remove snapshot at ${this.storePath}:`, e);
      }
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.queue.then(task);
    this.queue = next;
    return next;
  }

  private async write(session: DocumentSession, params: SnapshotParams): Promise<void> {
    const { document, index } = session;
    const out: Snapshot = {
      version: 1,
      meta: {
        chunkSize: params.chunkSize,
        chunkOverlap: params.chunkOverlap,
        modelName: params.modelName,
        savedAt: new Date().toISOString(),
        embEncoding: "f32-base64",
      },
      document: {
        id: document.id,
        filename: document.filename,
        text: document.text,
        pageCount: document.pageCount,
      },
      chunks: Array.from(index.entries(), ([chunk, emb]) => ({
        index: chunk.index,
        start: chunk.start,
        end: chunk.end,
        text: chunk.text,
        emb: encodeVector(emb),
      })),
    };
    try {
      await fs.mkdir(path.dirname(this.storePath), { recursive: true });
      await fs.writeFile(this.storePath, JSON.stringify(out));
      if (this.verbose) console.error(`[RAG][verbose] Persisted snapshot to ${this.storePath}`);
    } catch (e) {
      console.error(`[RAG] Failed to save snapshot:`, e);
    }
  }
}
