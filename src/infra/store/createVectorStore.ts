import { AppConfig } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export interface VectorStoreBootstrapResult {
  store: VectorStore;
  close: () => Promise<void>;
}

export async function createVectorStore(
  config: Pick<
    AppConfig,
    "enablePgvector" | "databaseUrl" | "dbPoolMax" | "storeMaxRetries" | "embeddingDimension"
  >,
): Promise<VectorStoreBootstrapResult> {
  if (!config.enablePgvector) {
    const store = new InMemoryVectorStore();
    return {
      store,
      close: async () => {
        await store.close();
      },
    };
  }

  if (!config.databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl, { max: config.dbPoolMax });
  const store = new PgVectorStore(pool, {
    dimension: config.embeddingDimension,
    maxRetries: config.storeMaxRetries,
  });

  try {
    await store.initialize();
  } catch (error) {
    await pool.end();
    throw error;
  }

  return {
    store,
    close: async () => {
      await store.close();
    },
  };
}
