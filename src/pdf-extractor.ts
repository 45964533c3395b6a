/**
 * PDF text extraction for uploaded documents.
 *
 * Extracted text is laid out page by page:
 *
 *   Page 1:
 *   <text of page 1>
 *
 *   Page 3:
 *   <text of page 3>
 *
 * Pages whose text is blank are skipped, so page numbers stay those of the
 * original file. The page labels end up inside chunks, which lets the
 * generator cite pages.
 */

import { createHash } from "node:crypto";
import fs from "node:fs/promises";
import path from "node:path";
import { PDFParse } from "pdf-parse";
import { DocumentExtractionError } from "./errors";

export interface ExtractedPdf {
  text: string;
  /** Total pages in the file, including blank ones. */
  pageCount: number;
}

/** A PDF read from disk, with the id derived from its bytes. */
export interface ExtractedFile extends ExtractedPdf {
  filename: string;
  documentId: string;
}

export interface PageText {
  num: number;
  text: string;
}

/** Lay out page texts as `Page n:` sections, dropping blank pages. */
export function formatPages(pages: readonly PageText[]): string {
  return pages
    .filter((p) => p.text.trim())
    .map((p) => `Page ${p.num}:\n${p.text}`)
    .join("\n\n");
}

/**
 * Stable id for an upload: filename stem plus the first 8 hex digits of the
 * content's MD5, so re-uploading the same file yields the same id.
 */
export function generateDocumentId(filename: string, content: Uint8Array | string): string {
  const hash = createHash("md5").update(content).digest("hex").slice(0, 8);
  const stem = path.parse(path.basename(filename)).name || "document";
  return `${stem}_${hash}`;
}

/**
 * PDF text extraction utility.
 */
export class PdfExtractor {
  public constructor(private readonly verbose = false) {}

  /**
   * Extract text from PDF bytes.
   *
   * @throws {DocumentExtractionError} If the bytes cannot be parsed.
   */
  public async extract(data: Uint8Array, label = "document"): Promise<ExtractedPdf> {
    if (this.verbose) {
      console.error(`[PDF] Extracting text from ${label}...`);
    }
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      const text = formatPages(result.pages.map((p) => ({ num: p.num, text: p.text ?? "" })));
      if (this.verbose) {
        console.error(`[PDF] ${label}: ${result.pages.length} pages, ${text.length} chars`);
      }
      return { text, pageCount: result.pages.length };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new DocumentExtractionError(`Failed to extract text from ${label}: ${message}`, {
        cause: e,
      });
    } finally {
      await parser.destroy();
    }
  }

  /**
   * Read a PDF from disk and extract it.
   *
   * @throws {DocumentExtractionError} If the file cannot be read or parsed.
   */
  public async extractFile(filePath: string): Promise<ExtractedFile> {
    const filename = path.basename(filePath);
    let data: Buffer;
    try {
      data = await fs.readFile(filePath);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      throw new DocumentExtractionError(`Cannot read ${filename}: ${message}`, { cause: e });
    }
    const extracted = await this.extract(data, filename);
    return { ...extracted, filename, documentId: generateDocumentId(filename, data) };
  }

  /**
   * Check if a file is a PDF based on its extension.
   * @returns True if file has .pdf extension (case-insensitive)
   */
  public static isPdf(filePath: string): boolean {
    return path.extname(filePath).toLowerCase() === ".pdf";
  }
}
