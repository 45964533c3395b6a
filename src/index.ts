/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (see config.ts for every variable).
 * 2. Build the embedding provider (Gemini, or the offline hashing model).
 * 3. Wire the document session store, indexer and retriever.
 * 4. Restore the persisted document snapshot when INDEX_STORE_PATH is set.
 * 5. Start a Model Context Protocol (MCP) server over either:
 *      - STDIO (default): good for local editor / agent integration.
 *      - Streamable HTTP (MCP_TRANSPORT=http|streamable-http): adds PDF
 *        upload at /documents and /health for readiness & status.
 *
 * Exposed tools: index_document, index_pdf, rag_query, clear_session,
 * session_status (contracts in tools.ts).
 *
 * The chat generation step lives outside this process: clients call
 * rag_query and feed the returned context to their own model.
 */
import { APP_VERSION, getConfig, type Config } from "./config";
import { Embeddings, type EmbeddingProvider } from "./embeddings";
import { DocumentIndexer } from "./indexer";
import { Persistence } from "./persistence";
import { PdfExtractor } from "./pdf-extractor";
import { GeminiEmbeddingProvider } from "./providers/gemini";
import { HashingEmbeddingProvider } from "./providers/local";
import { Retriever } from "./retriever";
import { createServer } from "./server";
import { DocumentSessionStore } from "./session";
import { StatusManager } from "./status";
import type { ToolContext } from "./tools";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config: Config = getConfig();
const status = new StatusManager({ version: APP_VERSION });

function createProvider(cfg: Config): EmbeddingProvider {
  if (cfg.EMBEDDING_PROVIDER === "gemini") {
    return new GeminiEmbeddingProvider(cfg.GEMINI_API_KEY, cfg.EMBEDDING_MODEL);
  }
  console.error(`[RAG] No Gemini key configured; using local hashing embeddings (keyword match only).`);
  return new HashingEmbeddingProvider(cfg.EMBEDDING_DIMENSION);
}

const embeddings = new Embeddings(createProvider(config), {
  batchSize: config.EMBEDDING_BATCH_SIZE,
  maxRetries: config.EMBEDDING_MAX_RETRIES,
  retryBaseMs: config.EMBEDDING_RETRY_BASE_MS,
  verbose: config.VERBOSE,
});
status.setModelName(embeddings.getModelName());
console.error(`[RAG] Embedding model: ${embeddings.getModelName()}`);

const session = new DocumentSessionStore();
const indexer = new DocumentIndexer({
  embeddings,
  session,
  chunkSize: config.CHUNK_SIZE,
  chunkOverlap: config.CHUNK_OVERLAP,
  persistence: config.INDEX_STORE_PATH
    ? new Persistence(config.INDEX_STORE_PATH, config.VERBOSE)
    : undefined,
  status,
  verbose: config.VERBOSE,
});
const ctx: ToolContext = {
  indexer,
  retriever: new Retriever(session, embeddings),
  pdf: new PdfExtractor(config.VERBOSE),
  status,
  topK: config.TOP_K,
  documentsRoot: config.DOCUMENTS_ROOT,
};

await indexer.restore();
status.markReady();

const useHttp = config.MCP_TRANSPORT === "http" || config.MCP_TRANSPORT === "streamable-http";

if (useHttp) {
  status.markTransport("http");
  await startHttpTransport(() => createServer(ctx), {
    port: config.MCP_PORT,
    host: config.HOST,
    allowedHosts: config.ALLOWED_HOSTS,
    enableDnsRebindingProtection: config.ENABLE_DNS_REBINDING_PROTECTION,
    status,
    documents: { indexer, pdf: ctx.pdf, maxUploadBytes: config.MAX_UPLOAD_BYTES },
  });
} else {
  status.markTransport("stdio");
  await startStdioTransport(() => createServer(ctx));
}
