import path from "node:path";
import { AppConfig } from "../config/env.js";
import { ValidationError } from "../domain/errors.js";
import { IngestResult, SourceSummary } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import { EmbeddingProvider, GenerationProvider } from "../infra/ai/types.js";
import { Citation, composeAnswer } from "../pipelines/answering.js";
import { EmbeddingGateway } from "../pipelines/embedding.js";
import { IngestionPipeline, TextExtractor } from "../pipelines/ingestion.js";
import { RetrievalEngine } from "../pipelines/retrieval.js";

export interface IngestDocumentInput {
  filename: string;
  bytes: Buffer;
}

export interface ChatInput {
  query: string;
  topK?: number;
}

export interface ChatResult {
  answer: string;
  citations: Citation[];
  latency_ms: number;
}

export interface SearchChunksResult {
  query: string;
  hits: Array<{
    score: number;
    source: string;
    chunk_index: number;
    fingerprint: string;
    snippet: string;
  }>;
}

export interface ServiceStatus {
  ok: true;
  record_count: number;
}

export interface RagServiceDependencies {
  store: VectorStore;
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
  extract?: TextExtractor;
}

type PipelineConfig = Pick<
  AppConfig,
  "embeddingDimension" | "embeddingBatchSize" | "retrievalK" | "chunkSize" | "chunkOverlap"
>;

/** Entry point shared by the REST routes and the MCP tools. */
export class RagService {
  private readonly ingestion: IngestionPipeline;

  private readonly retrieval: RetrievalEngine;

  constructor(
    private readonly deps: RagServiceDependencies,
    config: PipelineConfig,
  ) {
    const gateway = new EmbeddingGateway(deps.embedding, {
      dimension: config.embeddingDimension,
      batchSize: config.embeddingBatchSize,
    });
    this.ingestion = new IngestionPipeline({
      gateway,
      store: deps.store,
      chunking: { maxChunkSize: config.chunkSize, overlap: config.chunkOverlap },
      extract: deps.extract,
    });
    this.retrieval = new RetrievalEngine(gateway, deps.store, { defaultK: config.retrievalK });
  }

  async ingest(input: IngestDocumentInput): Promise<IngestResult> {
    const filename = path.basename(input.filename.trim());
    if (!filename) {
      throw new ValidationError("A filename is required.");
    }
    return this.ingestion.ingest({ filename, bytes: input.bytes });
  }

  async chat(input: ChatInput): Promise<ChatResult> {
    const startedAt = Date.now();
    const hits = await this.retrieval.retrieve(input.query, input.topK);
    const { answer, citations } = await composeAnswer(this.deps.generation, input.query, hits);
    return { answer, citations, latency_ms: Date.now() - startedAt };
  }

  async search(input: ChatInput): Promise<SearchChunksResult> {
    const hits = await this.retrieval.retrieve(input.query, input.topK);
    return {
      query: input.query,
      hits: hits.map((hit) => ({
        score: Number(hit.score.toFixed(4)),
        source: hit.source,
        chunk_index: hit.chunkIndex,
        fingerprint: hit.fingerprint,
        snippet: hit.text.slice(0, 240),
      })),
    };
  }

  async listSources(): Promise<SourceSummary[]> {
    return this.deps.store.listSources();
  }

  async status(): Promise<ServiceStatus> {
    return { ok: true, record_count: await this.deps.store.countRecords() };
  }
}
