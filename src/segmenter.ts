import { InvalidConfigurationError } from "./errors";
import type { Chunk } from "./types";

/**
 * Validate chunk sizing parameters. Overlap must stay below the chunk size
 * or the window would never advance.
 *
 * @throws {InvalidConfigurationError}
 */
export function assertChunkParams(chunkSize: number, overlap: number): void {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidConfigurationError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
    throw new InvalidConfigurationError(
      `chunkOverlap must be an integer in [0, chunkSize) (got ${overlap}, chunkSize ${chunkSize})`,
    );
  }
}

/**
 * Split text into fixed-size overlapping windows. Each window starts
 * `chunkSize - overlap` characters after the previous one; the window that
 * reaches the end of the text is the last one and may be shorter.
 *
 * @param text Full input string to divide.
 * @param chunkSize Maximum characters per chunk.
 * @param overlap Characters shared with the previous chunk.
 * @param documentId Owner recorded on every chunk.
 * @returns Frozen chunks in left-to-right order, sequence indices from 0.
 */
export function segment(text: string, chunkSize: number, overlap: number, documentId = ""): Chunk[] {
  assertChunkParams(chunkSize, overlap);
  const out: Chunk[] = [];
  const step = chunkSize - overlap;
  let start = 0;
  while (start < text.length) {
    const end = Math.min(text.length, start + chunkSize);
    out.push(
      Object.freeze({ index: out.length, documentId, text: text.slice(start, end), start, end }),
    );
    if (end === text.length) break;
    start += step;
  }
  return out;
}
