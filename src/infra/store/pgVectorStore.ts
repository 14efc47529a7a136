import { z } from "zod";
import { UpsertChunksResult, VectorStore } from "../../domain/vectorStore.js";
import { NewVectorRecord, ScoredRecord, SourceSummary } from "../../domain/types.js";
import { ConfigurationError, StoreError, describeError, isRagError } from "../../domain/errors.js";
import { isTransientStoreError, withRetry } from "../../utils/retry.js";
import { parseVectorLiteral, toVectorLiteral } from "../../utils/vector.js";
import { componentLogger } from "../logging/logger.js";

const log = componentLogger("pgvector-store");

export interface PgQueryResult {
  rows: unknown[];
  rowCount: number | null;
}

export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<PgQueryResult>;
}

export interface PgPoolClient extends PgQueryable {
  release(destroy?: Error | boolean): void;
}

/** The subset of `pg.Pool` the store relies on. */
export interface PgPool extends PgQueryable {
  connect(): Promise<PgPoolClient>;
  end(): Promise<void>;
}

export interface PgVectorStoreOptions {
  dimension: number;
  maxRetries: number;
  tableName?: string;
  retryBackoffMs?: number[];
}

const metadataSchema = z.object({
  fingerprint: z.string(),
  chunk_index: z.coerce.number().int(),
  source: z.string(),
  total_chunks: z.coerce.number().int(),
});

const searchRowSchema = z.object({
  uuid: z.string(),
  document: z.string(),
  embedding: z.string(),
  cmetadata: metadataSchema,
  source: z.string(),
  created_at: z.coerce.date(),
  // Zero-norm vectors give a NaN distance; score them 0 like the in-memory store.
  score: z
    .union([z.number(), z.string()])
    .transform((value) => Number(value))
    .transform((value) => (Number.isNaN(value) ? 0 : value)),
});

const sourceRowSchema = z.object({
  fingerprint: z.string(),
  source: z.string(),
  chunk_count: z.coerce.number().int(),
  ingested_at: z.coerce.date(),
});

const existsRowSchema = z.object({ exists: z.boolean() });
const countRowSchema = z.object({ count: z.coerce.number().int() });
const dimensionRowSchema = z.object({ dimension: z.coerce.number().int() });

export class PgVectorStore implements VectorStore {
  private ready: Promise<void> | null = null;

  private readonly table: string;

  constructor(
    private readonly pool: PgPool,
    private readonly options: PgVectorStoreOptions,
  ) {
    this.table = options.tableName ?? "documents";
    if (!/^[a-z_][a-z0-9_]*$/.test(this.table)) {
      throw new ConfigurationError(`Invalid table name: ${this.table}`);
    }
  }

  /** Idempotent; concurrent first callers share one bootstrap. A failed bootstrap may be retried. */
  initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = this.bootstrap().catch((error: unknown) => {
        this.ready = null;
        throw error;
      });
    }
    return this.ready;
  }

  private async bootstrap(): Promise<void> {
    await this.run("initialize", async () => {
      await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          uuid UUID PRIMARY KEY DEFAULT gen_random_uuid(),
          document TEXT NOT NULL,
          embedding VECTOR(${this.options.dimension}) NOT NULL,
          cmetadata JSONB NOT NULL DEFAULT '{}',
          source TEXT,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
      `);
      await this.pool.query(`
        CREATE INDEX IF NOT EXISTS ${this.table}_embedding_idx
        ON ${this.table} USING hnsw (embedding vector_cosine_ops)
        WITH (m = 16, ef_construction = 64)
      `);
      await this.pool.query(
        `CREATE INDEX IF NOT EXISTS ${this.table}_source_idx ON ${this.table} (source)`,
      );
      await this.pool.query(
        `CREATE INDEX IF NOT EXISTS ${this.table}_metadata_idx ON ${this.table} USING GIN (cmetadata)`,
      );
      await this.pool.query(`
        CREATE UNIQUE INDEX IF NOT EXISTS ${this.table}_fingerprint_chunk_idx
        ON ${this.table} ((cmetadata->>'fingerprint'), (cmetadata->>'chunk_index'))
      `);
    });

    await this.assertColumnDimension();
    log.info({ table: this.table, dimension: this.options.dimension }, "vector store ready");
  }

  async existsFingerprint(fingerprint: string): Promise<boolean> {
    await this.initialize();
    return this.run("existsFingerprint", async () => {
      const result = await this.pool.query(
        `SELECT EXISTS (
           SELECT 1 FROM ${this.table} WHERE cmetadata->>'fingerprint' = $1
         ) AS exists`,
        [fingerprint],
      );
      return existsRowSchema.parse(result.rows[0]).exists;
    });
  }

  async upsertChunks(records: NewVectorRecord[]): Promise<UpsertChunksResult> {
    if (records.length === 0) {
      return { inserted: 0 };
    }
    await this.initialize();

    return this.run("upsertChunks", () =>
      withRetry(() => this.insertAll(records), {
        retries: this.options.maxRetries,
        operation: "upsertChunks",
        isRetryable: isTransientStoreError,
        backoffMs: this.options.retryBackoffMs,
      }),
    );
  }

  async similaritySearch(queryEmbedding: number[], k: number): Promise<ScoredRecord[]> {
    if (k <= 0) {
      return [];
    }
    await this.initialize();

    // `nearest` is served by the HNSW index. Rows tied with the k-th distance
    // are pulled back in so the created_at tie-break sees all of them.
    return this.run("similaritySearch", async () => {
      const result = await this.pool.query(
        `
          WITH nearest AS (
            SELECT embedding <=> $1::vector AS distance
            FROM ${this.table}
            ORDER BY embedding <=> $1::vector
            LIMIT $2
          ),
          cutoff AS (
            SELECT MAX(distance) AS distance FROM nearest
          )
          SELECT uuid::text AS uuid, document, embedding::text AS embedding, cmetadata,
                 source, created_at,
                 COALESCE(NULLIF(1 - candidates.distance, 'NaN'), 0) AS score
          FROM (
            SELECT uuid, document, embedding, cmetadata, source, created_at,
                   embedding <=> $1::vector AS distance
            FROM ${this.table}
          ) candidates, cutoff
          WHERE candidates.distance <= cutoff.distance
          ORDER BY candidates.distance ASC, created_at ASC
          LIMIT $2
        `,
        [toVectorLiteral(queryEmbedding), k],
      );

      return result.rows.map((raw) => {
        const row = searchRowSchema.parse(raw);
        return {
          record: {
            id: row.uuid,
            text: row.document,
            embedding: parseVectorLiteral(row.embedding),
            metadata: row.cmetadata,
            source: row.source,
            createdAt: row.created_at,
          },
          score: row.score,
        };
      });
    });
  }

  async listSources(): Promise<SourceSummary[]> {
    await this.initialize();
    return this.run("listSources", async () => {
      const result = await this.pool.query(`
        SELECT cmetadata->>'fingerprint' AS fingerprint,
               MIN(source) AS source,
               COUNT(*)::int AS chunk_count,
               MIN(created_at) AS ingested_at
        FROM ${this.table}
        GROUP BY cmetadata->>'fingerprint'
        ORDER BY MIN(source) ASC
      `);

      return result.rows.map((raw) => {
        const row = sourceRowSchema.parse(raw);
        return {
          source: row.source,
          fingerprint: row.fingerprint,
          chunkCount: row.chunk_count,
          ingestedAt: row.ingested_at.toISOString(),
        };
      });
    });
  }

  async countRecords(): Promise<number> {
    await this.initialize();
    return this.run("countRecords", async () => {
      const result = await this.pool.query(`SELECT COUNT(*)::int AS count FROM ${this.table}`);
      return countRowSchema.parse(result.rows[0]).count;
    });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async insertAll(records: NewVectorRecord[]): Promise<UpsertChunksResult> {
    const client = await this.pool.connect();
    let broken: Error | undefined;
    try {
      await client.query("BEGIN");

      let inserted = 0;
      for (const record of records) {
        const result = await client.query(
          `
            INSERT INTO ${this.table} (document, embedding, cmetadata, source)
            VALUES ($1, $2::vector, $3::jsonb, $4)
            ON CONFLICT DO NOTHING
          `,
          [
            record.text,
            toVectorLiteral(record.embedding),
            JSON.stringify(record.metadata),
            record.source,
          ],
        );
        inserted += result.rowCount ?? 0;
      }

      await client.query("COMMIT");
      return { inserted };
    } catch (error) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        // The connection is unusable; hand it back to be destroyed.
        broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
        log.warn({ err: rollbackError }, "rollback failed");
      }
      throw error;
    } finally {
      client.release(broken);
    }
  }

  private async assertColumnDimension(): Promise<void> {
    const dimension = await this.run("assertColumnDimension", async () => {
      const result = await this.pool.query(
        `
          SELECT atttypmod AS dimension
          FROM pg_attribute
          WHERE attrelid = $1::regclass AND attname = 'embedding'
        `,
        [this.table],
      );
      const row = result.rows[0];
      return row === undefined ? null : dimensionRowSchema.parse(row).dimension;
    });

    if (dimension !== null && dimension > 0 && dimension !== this.options.dimension) {
      throw new ConfigurationError(
        `Table ${this.table} stores ${dimension}-dimension vectors but EMBEDDING_DIMENSION is ${this.options.dimension}.`,
      );
    }
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isRagError(error)) {
        throw error;
      }
      log.error({ operation, err: error }, "store operation failed");
      throw new StoreError(`Store operation ${operation} failed: ${describeError(error)}`, error);
    }
  }
}
