import express from "express";
import multer from "multer";
import { IndexingCancelledError, isRagError, type RagError } from "../errors";
import type { DocumentIndexer } from "../indexer";
import { ingestPdf } from "../ingest";
import { PdfExtractor } from "../pdf-extractor";

export interface DocumentRoutesOptions {
  indexer: DocumentIndexer;
  pdf: PdfExtractor;
  maxUploadBytes: number;
}

/** HTTP status for a domain error surfaced by an upload. */
export function statusForError(e: RagError): number {
  switch (e.kind) {
    case "InvalidArgument":
    case "InvalidConfiguration":
      return 400;
    case "IndexingCancelled":
      return 409;
    case "DocumentExtractionError":
      return 422;
    case "EmbeddingServiceError":
      return 502;
    default:
      return 500;
  }
}

/**
 * Upload routes for the document-ingestion side:
 *  - POST   /documents  multipart field "file" (PDF) → index as active document
 *  - DELETE /documents  → clear the active document
 */
export function createDocumentRouter(opts: DocumentRoutesOptions): express.Router {
  const router = express.Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.maxUploadBytes, files: 1 },
  });

  router.post("/documents", upload.single("file"), async (req, res) => {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: "InvalidArgument", message: "No file uploaded (field 'file')" });
      return;
    }
    if (!PdfExtractor.isPdf(file.originalname) && file.mimetype !== "application/pdf") {
      res.status(400).json({ error: "InvalidArgument", message: "Only PDF uploads are supported" });
      return;
    }

    // Client went away before we answered: stop embedding.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort(new IndexingCancelledError("Client disconnected"));
    });

    try {
      const result = await ingestPdf(opts, file.originalname, file.buffer, controller.signal);
      res.status(201).json(result);
    } catch (e) {
      if (!isRagError(e)) throw e;
      console.error(`[HTTP] Upload of ${file.originalname} failed: ${e.message}`);
      if (!res.headersSent) res.status(statusForError(e)).json({ error: e.kind, message: e.message });
    }
  });

  router.delete("/documents", async (_req, res) => {
    res.json({ cleared: await opts.indexer.clearSession() });
  });

  const uploadErrors: express.ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof multer.MulterError) {
      res.status(err.code === "LIMIT_FILE_SIZE" ? 413 : 400).json({
        error: "InvalidArgument",
        message: err.message,
      });
      return;
    }
    next(err);
  };
  router.use(uploadErrors);

  return router;
}
