import { createHash } from "node:crypto";
import type { Server } from "node:http";
import express from "express";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Embeddings, type EmbeddingProvider } from "../src/embeddings";
import {
  DimensionMismatchError,
  DocumentExtractionError,
  EmbeddingServiceError,
  IndexingCancelledError,
  InvalidArgumentError,
  InvalidConfigurationError,
  NoActiveDocumentError,
} from "../src/errors";
import { DocumentIndexer } from "../src/indexer";
import { PdfExtractor, type ExtractedPdf } from "../src/pdf-extractor";
import { DocumentSessionStore } from "../src/session";
import { StatusManager } from "../src/status";
import { createDocumentRouter, statusForError } from "../src/transport/documents";
import { closeServer, FakeProvider, GatedProvider, keywordVector, urlOf } from "./helpers";

const vectorOf = keywordVector(["refund", "shipping", "warranty"]);

/** Extractor that skips PDF parsing and records what it was given. */
class StubExtractor extends PdfExtractor {
  public readonly seen: Array<{ label: string; bytes: string }> = [];

  public constructor(private readonly result: () => ExtractedPdf) {
    super();
  }

  public override async extract(data: Uint8Array, label = "document"): Promise<ExtractedPdf> {
    this.seen.push({ label, bytes: Buffer.from(data).toString("utf8") });
    return this.result();
  }
}

function pdfForm(name: string, content: string, type = "application/pdf"): FormData {
  const form = new FormData();
  form.append("file", new Blob([content], { type }), name);
  return form;
}

describe("statusForError", () => {
  it.each([
    [new InvalidArgumentError("x"), 400],
    [new InvalidConfigurationError("x"), 400],
    [new IndexingCancelledError(), 409],
    [new DocumentExtractionError("x"), 422],
    [new EmbeddingServiceError("x", true), 502],
    [new NoActiveDocumentError(), 500],
    [new DimensionMismatchError(3, 2), 500],
  ])("maps %s to %i", (error, code) => {
    expect(statusForError(error)).toBe(code);
  });
});

describe("document routes", () => {
  let server: Server | undefined;

  afterEach(async () => {
    if (server) await closeServer(server);
    server = undefined;
  });

  async function start(opts: {
    provider?: EmbeddingProvider;
    extract?: () => ExtractedPdf;
    maxUploadBytes?: number;
  } = {}) {
    const session = new DocumentSessionStore();
    const status = new StatusManager();
    const indexer = new DocumentIndexer({
      embeddings: new Embeddings(opts.provider ?? new FakeProvider(vectorOf)),
      session,
      chunkSize: 20,
      chunkOverlap: 0,
      status,
    });
    const pdf = new StubExtractor(opts.extract ?? (() => ({ text: "Refund: thirty days.", pageCount: 1 })));
    const app = express();
    app.use(createDocumentRouter({ indexer, pdf, maxUploadBytes: opts.maxUploadBytes ?? 1024 }));
    const listener = await new Promise<Server>((resolve) => {
      const s = app.listen(0, "127.0.0.1", () => resolve(s));
    });
    server = listener;
    return { base: urlOf(listener), session, status, pdf };
  }

  it("indexes an uploaded PDF as the active document", async () => {
    const { base, session, pdf } = await start();
    const res = await fetch(`${base}/documents`, { method: "POST", body: pdfForm("report.pdf", "%PDF-1.4 stub") });

    const hash = createHash("md5").update("%PDF-1.4 stub").digest("hex").slice(0, 8);
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      documentId: `report_${hash}`,
      filename: "report.pdf",
      chunks: 1,
      dimension: 3,
      status: "indexed",
      pageCount: 1,
    });
    expect(pdf.seen).toEqual([{ label: "report.pdf", bytes: "%PDF-1.4 stub" }]);
    expect(session.current()?.document.id).toBe(`report_${hash}`);
  });

  it("rejects a request without a file", async () => {
    const { base } = await start();
    const form = new FormData();
    form.append("note", "no file here");
    const res = await fetch(`${base}/documents`, { method: "POST", body: form });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "InvalidArgument", message: "No file uploaded (field 'file')" });
  });

  it("rejects files that are not PDFs", async () => {
    const { base, pdf } = await start();
    const res = await fetch(`${base}/documents`, {
      method: "POST",
      body: pdfForm("notes.txt", "plain text", "text/plain"),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "InvalidArgument", message: "Only PDF uploads are supported" });
    expect(pdf.seen).toEqual([]);
  });

  it("rejects uploads above the size limit", async () => {
    const { base, session } = await start({ maxUploadBytes: 16 });
    const res = await fetch(`${base}/documents`, { method: "POST", body: pdfForm("big.pdf", "x".repeat(32)) });
    expect(res.status).toBe(413);
    expect(await res.json()).toMatchObject({ error: "InvalidArgument" });
    expect(session.current()).toBeNull();
  });

  it("reports extraction failures as 422", async () => {
    const { base } = await start({
      extract: () => {
        throw new DocumentExtractionError("Failed to extract text from broken.pdf: bad xref");
      },
    });
    const res = await fetch(`${base}/documents`, { method: "POST", body: pdfForm("broken.pdf", "%PDF") });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "DocumentExtractionError",
      message: "Failed to extract text from broken.pdf: bad xref",
    });
  });

  it("clears the active document", async () => {
    const { base, session } = await start();
    await fetch(`${base}/documents`, { method: "POST", body: pdfForm("report.pdf", "%PDF") });

    const first = await fetch(`${base}/documents`, { method: "DELETE" });
    expect(await first.json()).toEqual({ cleared: true });
    expect(session.current()).toBeNull();

    const second = await fetch(`${base}/documents`, { method: "DELETE" });
    expect(await second.json()).toEqual({ cleared: false });
  });

  it("stops indexing when the client disconnects", async () => {
    const gated = new GatedProvider(vectorOf);
    const { base, session, status } = await start({ provider: gated });
    const controller = new AbortController();
    const upload = fetch(`${base}/documents`, {
      method: "POST",
      body: pdfForm("report.pdf", "%PDF"),
      signal: controller.signal,
    }).catch((e: unknown) => e);

    await vi.waitFor(() => expect(gated.pending).toBe(1));
    controller.abort();

    await expect(upload).resolves.toMatchObject({ name: "AbortError" });
    await vi.waitFor(() => expect(status.getStatus().indexing.lastError).toBe("Client disconnected"));
    expect(status.getStatus().indexing.inProgress).toBe(false);
    expect(session.current()).toBeNull();
  });
});
