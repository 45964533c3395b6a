/**
 * MCP tool surface of the retrieval core.
 *
 * Tool contracts:
 *  index_document
 *    Input:  { text, documentId?, filename?, pageCount?, chunkSize?, chunkOverlap? }
 *    Output: { documentId, filename, chunks, dimension, status: "indexed" }
 *  index_pdf
 *    Input:  { path }  (relative to DOCUMENTS_ROOT)
 *    Output: index_document output plus pageCount
 *  rag_query
 *    Input:  { query, top_k? }
 *    Output: { documentId, context, matches: Array<{ index, start, end, score, text }> }
 *  clear_session
 *    Output: { cleared }
 *  session_status
 *    Output: server status snapshot
 *
 * Argument problems are MCP InvalidParams errors. Failures a client is
 * expected to recover from (no document, embedding outage, cancelled
 * indexing...) come back as `isError` results carrying `{ error, message }`
 * so the calling model can fall back to answering without the document.
 */
import { ErrorCode, McpError, type CallToolResult, type Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { InvalidArgumentError, isRagError } from "./errors";
import { DocumentIndexer } from "./indexer";
import { ingestPdfFile } from "./ingest";
import { generateDocumentId, PdfExtractor } from "./pdf-extractor";
import type { Retriever } from "./retriever";
import type { StatusManager } from "./status";

export interface ToolContext {
  indexer: DocumentIndexer;
  retriever: Retriever;
  pdf: PdfExtractor;
  status: StatusManager;
  /** Default number of chunks returned by rag_query. */
  topK: number;
  /** Root that index_pdf paths are resolved against. */
  documentsRoot: string;
}

const indexDocumentArgs = z.object({
  text: z.string(),
  documentId: z.string().trim().min(1).optional(),
  filename: z.string().optional(),
  pageCount: z.number().int().nonnegative().optional(),
  chunkSize: z.number().int().positive().optional(),
  chunkOverlap: z.number().int().nonnegative().optional(),
});

const indexPdfArgs = z.object({ path: z.string().min(1) });

const ragQueryArgs = z.object({
  query: z.string().trim().min(1),
  top_k: z.number().int().min(1).max(50).optional(),
});

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "index_document",
    description:
      "Index plain document text as the active document, replacing any previous one. Text is split into overlapping chunks and embedded.",
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "Full extracted document text." },
        documentId: {
          type: "string",
          description: "Identifier for the document. Derived from the text when omitted.",
        },
        filename: { type: "string", description: "Original filename, for display." },
        pageCount: { type: "number", minimum: 0 },
        chunkSize: { type: "number", minimum: 1, description: "Characters per chunk." },
        chunkOverlap: {
          type: "number",
          minimum: 0,
          description: "Characters shared by consecutive chunks (must be below chunkSize).",
        },
      },
      required: ["text"],
    },
  },
  {
    name: "index_pdf",
    description:
      "Extract the text of a PDF under DOCUMENTS_ROOT and index it as the active document, replacing any previous one.",
    inputSchema: {
      type: "object",
      properties: {
        path: {
          type: "string",
          description: "Path to the PDF relative to DOCUMENTS_ROOT (use forward slashes).",
        },
      },
      required: ["path"],
    },
  },
  {
    name: "rag_query",
    description:
      "Semantically search the active document and return the most relevant excerpts, plus a formatted context block for answering.",
    inputSchema: {
      type: "object",
      properties: {
        query: {
          type: "string",
          description: "Natural language question or search terms.",
        },
        top_k: {
          type: "number",
          description: "Maximum number of excerpts to return (1-50).",
          minimum: 1,
          maximum: 50,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "clear_session",
    description: "Remove the active document and its index.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "session_status",
    description: "Report the active document, indexing progress and embedding model.",
    inputSchema: { type: "object", properties: {} },
  },
];

function jsonResult(payload: unknown): CallToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

function parseArgs<T extends z.ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`)
      .join("; ");
    throw new McpError(ErrorCode.InvalidParams, detail);
  }
  return parsed.data;
}

/** Absolute path of a PDF under the documents root. */
function resolvePdfPath(ctx: ToolContext, relPath: string): string {
  const abs = DocumentIndexer.ensureWithinRoot(ctx.documentsRoot, relPath);
  if (!PdfExtractor.isPdf(abs)) throw new InvalidArgumentError("index_pdf expects a .pdf file");
  return abs;
}

async function dispatch(
  ctx: ToolContext,
  name: string,
  args: unknown,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  switch (name) {
    case "index_document": {
      const a = parseArgs(indexDocumentArgs, args);
      const documentId = a.documentId ?? generateDocumentId(a.filename ?? "document", a.text);
      return jsonResult(await ctx.indexer.indexDocument({ ...a, documentId }, signal));
    }
    case "index_pdf": {
      const a = parseArgs(indexPdfArgs, args);
      return jsonResult(await ingestPdfFile(ctx, resolvePdfPath(ctx, a.path), signal));
    }
    case "rag_query": {
      const a = parseArgs(ragQueryArgs, args);
      const result = await ctx.retriever.search(a.query, a.top_k ?? ctx.topK, signal);
      return jsonResult({
        documentId: result.documentId,
        context: result.context,
        matches: result.matches.map((m) => ({
          index: m.chunk.index,
          start: m.chunk.start,
          end: m.chunk.end,
          score: Number(m.score.toFixed(4)),
          text: m.chunk.text,
        })),
      });
    }
    case "clear_session":
      return jsonResult({ cleared: await ctx.indexer.clearSession() });
    case "session_status":
      return jsonResult(ctx.status.getStatus());
    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

/**
 * Execute a tool call. Domain errors are translated here so transports
 * never see raw RagErrors.
 */
export async function callTool(
  ctx: ToolContext,
  name: string,
  args: unknown,
  signal?: AbortSignal,
): Promise<CallToolResult> {
  try {
    return await dispatch(ctx, name, args, signal);
  } catch (e) {
    if (!isRagError(e)) throw e;
    if (e.kind === "InvalidArgument" || e.kind === "InvalidConfiguration") {
      throw new McpError(ErrorCode.InvalidParams, e.message);
    }
    return { ...jsonResult({ error: e.kind, message: e.message }), isError: true };
  }
}
