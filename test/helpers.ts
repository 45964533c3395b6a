import type { Server } from "node:http";
import type { EmbeddingProvider } from "../src/embeddings";
import type { Chunk, EmbeddingVector } from "../src/types";

/** Deterministic provider: vectors come from `fn`, every batch is recorded. */
export class FakeProvider implements EmbeddingProvider {
  public readonly modelName: string;
  public readonly calls: string[][] = [];

  public constructor(
    private readonly fn: (text: string) => number[],
    modelName = "fake-model",
  ) {
    this.modelName = modelName;
  }

  public async embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    signal?.throwIfAborted();
    this.calls.push([...texts]);
    return texts.map((t) => Float32Array.from(this.fn(t)));
  }
}

/**
 * Provider whose batches wait until released. Pending batches reject with the
 * abort reason when their signal fires.
 */
export class GatedProvider implements EmbeddingProvider {
  public readonly modelName = "gated-model";
  private readonly waiting: Array<() => void> = [];

  public constructor(
    private readonly fn: (text: string) => number[],
    private readonly shouldWait: (texts: readonly string[]) => boolean = () => true,
  ) {}

  public get pending(): number {
    return this.waiting.length;
  }

  public releaseAll(): void {
    for (const release of this.waiting.splice(0)) release();
  }

  public embedBatch(texts: readonly string[], signal?: AbortSignal): Promise<EmbeddingVector[]> {
    const vectors = texts.map((t) => Float32Array.from(this.fn(t)));
    if (!this.shouldWait(texts)) return Promise.resolve(vectors);
    return new Promise((resolve, reject) => {
      signal?.addEventListener("abort", () => reject(signal.reason), { once: true });
      this.waiting.push(() => resolve(vectors));
    });
  }
}

/** Count whole-word occurrences of each keyword. */
export function keywordVector(keywords: readonly string[]): (text: string) => number[] {
  return (text) => {
    const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
    return keywords.map((k) => words.filter((w) => w === k).length);
  };
}

export function makeChunk(index: number, text: string, documentId = "doc"): Chunk {
  return { index, documentId, text, start: index * 10, end: index * 10 + text.length };
}

/** Let pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

/** Base URL of a listener bound to an ephemeral port. */
export function urlOf(server: Server): string {
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("server is not listening on a TCP port");
  return `http://127.0.0.1:${addr.port}`;
}

/** Stop a listener, dropping keep-alive connections. */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
