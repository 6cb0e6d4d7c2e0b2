import { InvalidConfigurationError } from "../errors.js";
import { isLogLevel, type LogLevel } from "../logging/logger.js";

export const DEFAULT_BASE_URL = "http://localhost:11434";
export const DEFAULT_EMBEDDING_MODEL = "nomic-embed-text";
export const DEFAULT_LLM_MODEL = "llama3.2";
export const DEFAULT_TOP_K = 3;
export const DEFAULT_CHUNK_SIZE = 200;
export const DEFAULT_CHUNK_OVERLAP = 20;
// Generation on a local model can take minutes.
export const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;

/** Per-operation configuration, owned by the caller. */
export type SessionConfig = {
  baseUrl: string;
  embeddingModel: string;
  llmModel: string;
  documentsFolder?: string;
  topK: number;
  chunkSize: number;
  chunkOverlap: number;
};

export type Settings = SessionConfig & {
  requestTimeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  embedConcurrency: number;
  logLevel: LogLevel;
};

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new InvalidConfigurationError(`${name} must be an integer, got: ${raw}`);
  }
  return parsed;
}

export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, "");
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const logLevelRaw = (env.DOCENT_LOG_LEVEL ?? "info").toLowerCase();
  if (!isLogLevel(logLevelRaw)) {
    throw new InvalidConfigurationError(`DOCENT_LOG_LEVEL is not a log level: ${logLevelRaw}`);
  }

  const documentsFolder = env.DOCENT_DOCUMENTS_DIR?.trim();

  return {
    baseUrl: normalizeBaseUrl(env.DOCENT_BASE_URL || DEFAULT_BASE_URL),
    embeddingModel: env.DOCENT_EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL,
    llmModel: env.DOCENT_LLM_MODEL || DEFAULT_LLM_MODEL,
    documentsFolder: documentsFolder ? documentsFolder : undefined,
    topK: intFromEnv(env, "DOCENT_TOP_K", DEFAULT_TOP_K),
    chunkSize: intFromEnv(env, "DOCENT_CHUNK_SIZE", DEFAULT_CHUNK_SIZE),
    chunkOverlap: intFromEnv(env, "DOCENT_CHUNK_OVERLAP", DEFAULT_CHUNK_OVERLAP),
    requestTimeoutMs: intFromEnv(env, "DOCENT_TIMEOUT_MS", DEFAULT_TIMEOUT_MS),
    maxAttempts: intFromEnv(env, "DOCENT_MAX_ATTEMPTS", 1),
    retryDelayMs: intFromEnv(env, "DOCENT_RETRY_DELAY_MS", 500),
    embedConcurrency: intFromEnv(env, "DOCENT_EMBED_CONCURRENCY", 1),
    logLevel: logLevelRaw
  };
}

export function toSessionConfig(settings: Settings, overrides: Partial<SessionConfig> = {}): SessionConfig {
  return {
    baseUrl: settings.baseUrl,
    embeddingModel: settings.embeddingModel,
    llmModel: settings.llmModel,
    documentsFolder: settings.documentsFolder,
    topK: settings.topK,
    chunkSize: settings.chunkSize,
    chunkOverlap: settings.chunkOverlap,
    ...overrides
  };
}
