import { NewVectorRecord, ScoredRecord, SourceSummary } from "./types.js";

export interface UpsertChunksResult {
  inserted: number;
}

/**
 * Persistence port for chunk vectors.
 *
 * `upsertChunks` writes a whole document as one unit. Rows that collide on
 * (fingerprint, chunk_index) are skipped, so a second writer of the same
 * content observes `inserted === 0`.
 */
export interface VectorStore {
  initialize(): Promise<void>;
  existsFingerprint(fingerprint: string): Promise<boolean>;
  upsertChunks(records: NewVectorRecord[]): Promise<UpsertChunksResult>;
  /** Cosine similarity, best first; ties go to the earliest record. */
  similaritySearch(queryEmbedding: number[], k: number): Promise<ScoredRecord[]>;
  listSources(): Promise<SourceSummary[]>;
  countRecords(): Promise<number>;
  close(): Promise<void>;
}
