export interface Chunk {
  index: number;
  text: string;
  /** Offset of the first character in the normalized document text. */
  start: number;
  /** Offset one past the last character. */
  end: number;
}

export interface ChunkMetadata {
  fingerprint: string;
  chunk_index: number;
  source: string;
  total_chunks: number;
}

export interface VectorRecord {
  id: string;
  text: string;
  embedding: number[];
  metadata: ChunkMetadata;
  source: string;
  createdAt: Date;
}

/** A record ready to be written; the store assigns id and timestamp. */
export type NewVectorRecord = Omit<VectorRecord, "id" | "createdAt">;

export interface ScoredRecord {
  record: VectorRecord;
  score: number;
}

export interface RetrievalHit {
  text: string;
  score: number;
  source: string;
  chunkIndex: number;
  fingerprint: string;
}

export interface SourceSummary {
  source: string;
  fingerprint: string;
  chunkCount: number;
  ingestedAt: string;
}

export type IngestOutcome = "processed" | "already-processed" | "no-content";

export interface IngestResult {
  filename: string;
  byteLength: number;
  fingerprint: string | null;
  chunkCount: number;
  outcome: IngestOutcome;
}
