import { IngestResult, NewVectorRecord } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { extractText } from "../infra/parsers/documentLoader.js";
import { componentLogger } from "../infra/logging/logger.js";
import { ChunkingOptions, splitIntoChunks } from "./chunking.js";
import { EmbeddingGateway } from "./embedding.js";
import { fingerprintDocument } from "./fingerprint.js";

const log = componentLogger("ingestion");

export type TextExtractor = (filename: string, bytes: Buffer) => Promise<string>;

export interface IngestionDependencies {
  gateway: EmbeddingGateway;
  store: VectorStore;
  chunking: ChunkingOptions;
  extract?: TextExtractor;
}

export interface IngestInput {
  filename: string;
  bytes: Buffer;
}

/**
 * extract → fingerprint → (skip if known) → chunk → embed → store.
 *
 * Nothing is written until every chunk has a validated embedding, so a
 * failure at any stage leaves the store untouched.
 */
export class IngestionPipeline {
  private readonly extract: TextExtractor;

  constructor(private readonly deps: IngestionDependencies) {
    this.extract = deps.extract ?? extractText;
  }

  async ingest({ filename, bytes }: IngestInput): Promise<IngestResult> {
    const startedAt = Date.now();
    const base = { filename, byteLength: bytes.length };
    log.info(base, "ingestion started");

    try {
      const extracted = await this.extract(filename, bytes);
      const { normalized, fingerprint } = fingerprintDocument(extracted);
      const fp = fingerprint.slice(0, 12);

      if (!normalized) {
        log.info(base, "no extractable text");
        return { ...base, fingerprint: null, chunkCount: 0, outcome: "no-content" };
      }

      if (await this.deps.store.existsFingerprint(fingerprint)) {
        log.info({ ...base, fingerprint: fp }, "content already ingested, skipping");
        return { ...base, fingerprint, chunkCount: 0, outcome: "already-processed" };
      }

      const chunks = splitIntoChunks(normalized, this.deps.chunking);
      const embeddings = await this.deps.gateway.embedDocuments(chunks.map((chunk) => chunk.text));

      const records: NewVectorRecord[] = chunks.map((chunk, i) => ({
        text: chunk.text,
        embedding: embeddings[i],
        source: filename,
        metadata: {
          fingerprint,
          chunk_index: chunk.index,
          source: filename,
          total_chunks: chunks.length,
        },
      }));

      const { inserted } = await this.deps.store.upsertChunks(records);
      if (inserted === 0) {
        log.info({ ...base, fingerprint: fp }, "concurrent ingestion stored this content first");
        return { ...base, fingerprint, chunkCount: 0, outcome: "already-processed" };
      }
      if (inserted < records.length) {
        log.warn(
          { ...base, fingerprint: fp, inserted, expected: records.length },
          "some chunks already existed",
        );
      }

      log.info(
        { ...base, fingerprint: fp, chunkCount: inserted, durationMs: Date.now() - startedAt },
        "ingestion finished",
      );
      return { ...base, fingerprint, chunkCount: inserted, outcome: "processed" };
    } catch (error) {
      log.error({ ...base, err: error }, "ingestion failed");
      throw error;
    }
  }
}
