import {
  DimensionMismatchError,
  EmbeddingProviderError,
  describeError,
} from "../domain/errors.js";
import { EmbeddingProvider } from "../infra/ai/types.js";
import { componentLogger } from "../infra/logging/logger.js";

const log = componentLogger("embedding-gateway");

export interface EmbeddingGatewayOptions {
  dimension: number;
  batchSize: number;
}

/**
 * Sends text to the embedding provider in bounded batches and refuses any
 * vector whose length differs from the store's dimension.
 */
export class EmbeddingGateway {
  constructor(
    private readonly provider: EmbeddingProvider,
    private readonly options: EmbeddingGatewayOptions,
  ) {}

  get dimension(): number {
    return this.options.dimension;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.options.batchSize) {
      const batch = texts.slice(offset, offset + this.options.batchSize);
      vectors.push(...(await this.embedBatch(batch)));
    }
    return vectors;
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const startedAt = Date.now();
    let vectors: number[][];
    try {
      vectors = await this.provider.embed(batch);
    } catch (error) {
      log.warn(
        { provider: this.provider.name, batchSize: batch.length, err: error },
        "embedding request failed",
      );
      throw new EmbeddingProviderError(
        `${this.provider.name} embedding request failed: ${describeError(error)}`,
        error,
      );
    }

    if (vectors.length !== batch.length) {
      throw new EmbeddingProviderError(
        `${this.provider.name} returned ${vectors.length} embeddings for ${batch.length} inputs.`,
      );
    }

    for (const vector of vectors) {
      if (vector.length !== this.options.dimension) {
        log.fatal(
          { provider: this.provider.name, expected: this.options.dimension, actual: vector.length },
          "embedding dimension mismatch",
        );
        throw new DimensionMismatchError(this.options.dimension, vector.length);
      }
    }

    log.debug(
      { provider: this.provider.name, batchSize: batch.length, durationMs: Date.now() - startedAt },
      "embedded batch",
    );
    return vectors;
  }
}
