import { ConfigurationError, DimensionMismatchError, ValidationError } from "../domain/errors.js";
import { RetrievalHit } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { componentLogger } from "../infra/logging/logger.js";
import { EmbeddingGateway } from "./embedding.js";

const log = componentLogger("retrieval");

export interface RetrievalOptions {
  defaultK: number;
}

export class RetrievalEngine {
  constructor(
    private readonly gateway: EmbeddingGateway,
    private readonly store: VectorStore,
    private readonly options: RetrievalOptions,
  ) {}

  async retrieve(query: string, k: number = this.options.defaultK): Promise<RetrievalHit[]> {
    const trimmed = query.trim();
    if (!trimmed) {
      throw new ValidationError("Query must not be empty.");
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new ValidationError(`k must be a positive integer, got ${k}.`, { k });
    }

    let queryEmbedding: number[];
    try {
      queryEmbedding = await this.gateway.embedQuery(trimmed);
    } catch (error) {
      // The query model disagrees with the stored vectors: an operator problem.
      if (error instanceof DimensionMismatchError) {
        throw new ConfigurationError(
          `Query embedding has ${error.actual} dimensions but the store holds ${error.expected}.`,
          error,
        );
      }
      throw error;
    }

    const scored = await this.store.similaritySearch(queryEmbedding, k);
    log.debug({ k, hits: scored.length }, "retrieved chunks");

    return scored.map(({ record, score }) => ({
      text: record.text,
      score,
      source: record.source,
      chunkIndex: record.metadata.chunk_index,
      fingerprint: record.metadata.fingerprint,
    }));
  }
}
