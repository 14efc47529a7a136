import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: booleanFlag.optional(),
  DB_POOL_MAX: z.coerce.number().int().positive().default(5),
  STORE_MAX_RETRIES: z.coerce.number().int().min(0).default(2),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  GENERATION_PROVIDER: z.enum(["openai", "ollama"]).default("openai"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  LLM_MODEL: z.string().min(1).default("gpt-3.5-turbo"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  EMBEDDING_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(100),
  RETRIEVAL_K: z.coerce.number().int().positive().default(3),
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(200),
  PROVIDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
  FRONTEND_URL: z.string().default("*"),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
});

export type ProviderName = "openai" | "ollama";

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  dbPoolMax: number;
  storeMaxRetries: number;
  embeddingProvider: ProviderName;
  generationProvider: ProviderName;
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  llmModel: string;
  ollamaBaseUrl: string;
  embeddingDimension: number;
  embeddingBatchSize: number;
  retrievalK: number;
  chunkSize: number;
  chunkOverlap: number;
  providerTimeoutMs: number;
  logLevel: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
  frontendUrl: string;
  maxUploadBytes: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = envSchema.parse(env);
  const databaseUrl = parsed.DATABASE_URL?.trim() || null;
  const enablePgvector = parsed.ENABLE_PGVECTOR ?? databaseUrl !== null;

  if (enablePgvector && !databaseUrl) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const openaiApiKey = parsed.OPENAI_API_KEY?.trim() || null;
  const usesOpenAi =
    parsed.EMBEDDING_PROVIDER === "openai" || parsed.GENERATION_PROVIDER === "openai";
  if (usesOpenAi && !openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required when an openai provider is selected.");
  }

  return Object.freeze({
    enablePgvector,
    databaseUrl,
    dbPoolMax: parsed.DB_POOL_MAX,
    storeMaxRetries: parsed.STORE_MAX_RETRIES,
    embeddingProvider: parsed.EMBEDDING_PROVIDER,
    generationProvider: parsed.GENERATION_PROVIDER,
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    embeddingModel: parsed.EMBEDDING_MODEL,
    llmModel: parsed.LLM_MODEL,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    embeddingDimension: parsed.EMBEDDING_DIMENSION,
    embeddingBatchSize: parsed.EMBEDDING_BATCH_SIZE,
    retrievalK: parsed.RETRIEVAL_K,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    providerTimeoutMs: parsed.PROVIDER_TIMEOUT_MS,
    logLevel: parsed.LOG_LEVEL,
    transport: parsed.TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
    frontendUrl: parsed.FRONTEND_URL,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
  });
}
