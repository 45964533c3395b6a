import dotenv from "dotenv";
import fsSync from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
// Import version directly from package.json (requires tsconfig "resolveJsonModule": true)
import pkg from "../package.json" with { type: "json" };
import { assertChunkParams } from "./segmenter";

// Centralized single dotenv.config() call.
// Prefer the project-root .env (one level above src/); otherwise fall back to the cwd.
(() => {
  const __filename = fileURLToPath(import.meta.url);
  const rootEnv = path.resolve(path.dirname(__filename), "../.env");
  if (fsSync.existsSync(rootEnv)) {
    dotenv.config({ path: rootEnv });
    return;
  }
  dotenv.config();
})();

/** Application version sourced from package.json. */
export const APP_VERSION: string = pkg.version;

export type EmbeddingProviderName = "gemini" | "local";

export interface Config {
  EMBEDDING_PROVIDER: EmbeddingProviderName;
  GEMINI_API_KEY: string;
  EMBEDDING_MODEL: string;
  EMBEDDING_DIMENSION: number;
  EMBEDDING_BATCH_SIZE: number;
  EMBEDDING_MAX_RETRIES: number;
  EMBEDDING_RETRY_BASE_MS: number;
  CHUNK_SIZE: number;
  CHUNK_OVERLAP: number;
  TOP_K: number;
  DOCUMENTS_ROOT: string;
  INDEX_STORE_PATH: string | undefined;
  MAX_UPLOAD_BYTES: number;
  VERBOSE: boolean;
  MCP_TRANSPORT: string;
  MCP_PORT: number;
  HOST: string;
  ALLOWED_HOSTS: string[] | undefined;
  ENABLE_DNS_REBINDING_PROTECTION: boolean;
}

type Env = Record<string, string | undefined>;

/** Integer env var, clamped to [min, max]; unset or unparsable yields `fallback`. */
function intVar(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min ? Math.min(max, Math.floor(n)) : fallback;
}

/** Tolerant truthy parsing (1/true/yes/on). */
function boolVar(env: Env, name: string, fallback: boolean): boolean {
  const v = (env[name] ?? "").trim().toLowerCase();
  if (!v) return fallback;
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

/**
 * Normalize all runtime configuration from environment variables.
 *
 * @throws {InvalidConfigurationError} If CHUNK_OVERLAP >= CHUNK_SIZE.
 */
export function getConfig(env: Env = process.env): Config {
  const GEMINI_API_KEY = env.GEMINI_API_KEY?.trim() ?? "";

  // Provider defaults to Gemini only when a key is available.
  const EMBEDDING_PROVIDER: EmbeddingProviderName = (() => {
    const v = (env.EMBEDDING_PROVIDER ?? "").trim().toLowerCase();
    if (v === "gemini" || v === "local") return v;
    return GEMINI_API_KEY ? "gemini" : "local";
  })();

  const EMBEDDING_MODEL = env.EMBEDDING_MODEL?.trim() || "text-embedding-004";
  const EMBEDDING_DIMENSION = intVar(env, "EMBEDDING_DIMENSION", 256, 1, 4096);
  // Gemini batchEmbedContents accepts at most 100 requests.
  const EMBEDDING_BATCH_SIZE = intVar(env, "EMBEDDING_BATCH_SIZE", 100, 1, 100);
  const EMBEDDING_MAX_RETRIES = intVar(env, "EMBEDDING_MAX_RETRIES", 3, 0, 10);
  const EMBEDDING_RETRY_BASE_MS = intVar(env, "EMBEDDING_RETRY_BASE_MS", 250, 0, 60_000);

  // Chunk size impacts recall (too large) vs. precision (too small).
  const CHUNK_SIZE = intVar(env, "CHUNK_SIZE", 500, 1, 8000);
  const CHUNK_OVERLAP = intVar(env, "CHUNK_OVERLAP", 50, 0, 4000);
  assertChunkParams(CHUNK_SIZE, CHUNK_OVERLAP);

  const TOP_K = intVar(env, "TOP_K", 3, 1, 50);

  const DOCUMENTS_ROOT = path.resolve(env.DOCUMENTS_ROOT?.trim() || process.cwd());
  const INDEX_STORE_PATH = env.INDEX_STORE_PATH?.trim() || undefined;
  const MAX_UPLOAD_BYTES = intVar(env, "MAX_UPLOAD_BYTES", 10 * 1024 * 1024, 1, 200 * 1024 * 1024);

  const ALLOWED_HOSTS = env.ALLOWED_HOSTS?.split(",")
    .map((s) => s.trim())
    .filter(Boolean);

  return {
    EMBEDDING_PROVIDER,
    GEMINI_API_KEY,
    EMBEDDING_MODEL,
    EMBEDDING_DIMENSION,
    EMBEDDING_BATCH_SIZE,
    EMBEDDING_MAX_RETRIES,
    EMBEDDING_RETRY_BASE_MS,
    CHUNK_SIZE,
    CHUNK_OVERLAP,
    TOP_K,
    DOCUMENTS_ROOT,
    INDEX_STORE_PATH,
    MAX_UPLOAD_BYTES,
    VERBOSE: boolVar(env, "VERBOSE", false),
    // 'stdio' (default) or 'http'/'streamable-http'
    MCP_TRANSPORT: (env.MCP_TRANSPORT ?? "").trim().toLowerCase(),
    MCP_PORT: intVar(env, "MCP_PORT", 3000, 1, 65535),
    HOST: env.HOST?.trim() || "127.0.0.1",
    ALLOWED_HOSTS: ALLOWED_HOSTS?.length ? ALLOWED_HOSTS : undefined,
    ENABLE_DNS_REBINDING_PROTECTION: boolVar(env, "ENABLE_DNS_REBINDING_PROTECTION", true),
  };
}
