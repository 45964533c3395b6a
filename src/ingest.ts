import type { DocumentIndexer, IndexResult } from "./indexer";
import { generateDocumentId, type PdfExtractor } from "./pdf-extractor";

export interface IngestDeps {
  indexer: DocumentIndexer;
  pdf: PdfExtractor;
}

export interface IngestResult extends IndexResult {
  pageCount: number;
}

/**
 * Upload path of the HTTP route: derive the document id from the bytes,
 * extract the text and index it as the new active document.
 */
export async function ingestPdf(
  deps: IngestDeps,
  filename: string,
  data: Uint8Array,
  signal?: AbortSignal,
): Promise<IngestResult> {
  const documentId = generateDocumentId(filename, data);
  const { text, pageCount } = await deps.pdf.extract(data, filename);
  const result = await deps.indexer.indexDocument({ text, documentId, filename, pageCount }, signal);
  return { ...result, pageCount };
}

/** index_pdf path: read and extract a PDF on disk, then index it. */
export async function ingestPdfFile(
  deps: IngestDeps,
  filePath: string,
  signal?: AbortSignal,
): Promise<IngestResult> {
  const { text, pageCount, filename, documentId } = await deps.pdf.extractFile(filePath);
  const result = await deps.indexer.indexDocument({ text, documentId, filename, pageCount }, signal);
  return { ...result, pageCount };
}
