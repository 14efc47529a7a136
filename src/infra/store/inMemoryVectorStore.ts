import { randomUUID } from "node:crypto";
import { UpsertChunksResult, VectorStore } from "../../domain/vectorStore.js";
import {
  NewVectorRecord,
  ScoredRecord,
  SourceSummary,
  VectorRecord,
} from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

interface StoredRecord {
  record: VectorRecord;
  seq: number;
}

/**
 * Process-local store with the same uniqueness and ordering rules as the
 * pgvector table. Search is an exact scan.
 */
export class InMemoryVectorStore implements VectorStore {
  private readonly records: StoredRecord[] = [];

  private readonly keys = new Set<string>();

  private seq = 0;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async initialize(): Promise<void> {}

  async existsFingerprint(fingerprint: string): Promise<boolean> {
    return this.records.some((item) => item.record.metadata.fingerprint === fingerprint);
  }

  async upsertChunks(records: NewVectorRecord[]): Promise<UpsertChunksResult> {
    const createdAt = this.now();
    const fresh: StoredRecord[] = [];
    const batchKeys = new Set<string>();

    for (const input of records) {
      const key = uniqueKey(input.metadata.fingerprint, input.metadata.chunk_index);
      if (this.keys.has(key) || batchKeys.has(key)) {
        continue;
      }
      batchKeys.add(key);
      fresh.push({
        record: {
          ...input,
          id: randomUUID(),
          embedding: [...input.embedding],
          metadata: { ...input.metadata },
          createdAt,
        },
        seq: this.seq + fresh.length,
      });
    }

    // Commit all rows together.
    for (const item of fresh) {
      this.records.push(item);
      this.keys.add(uniqueKey(item.record.metadata.fingerprint, item.record.metadata.chunk_index));
    }
    this.seq += fresh.length;

    return { inserted: fresh.length };
  }

  async similaritySearch(queryEmbedding: number[], k: number): Promise<ScoredRecord[]> {
    if (k <= 0) {
      return [];
    }

    return this.records
      .map((item) => ({
        item,
        score: cosineSimilarity(queryEmbedding, item.record.embedding),
      }))
      .sort(
        (a, b) =>
          b.score - a.score ||
          a.item.record.createdAt.getTime() - b.item.record.createdAt.getTime() ||
          a.item.seq - b.item.seq,
      )
      .slice(0, k)
      .map(({ item, score }) => ({ record: item.record, score }));
  }

  async listSources(): Promise<SourceSummary[]> {
    const byFingerprint = new Map<string, SourceSummary>();
    for (const { record } of this.records) {
      const existing = byFingerprint.get(record.metadata.fingerprint);
      if (existing) {
        existing.chunkCount += 1;
        continue;
      }
      byFingerprint.set(record.metadata.fingerprint, {
        source: record.source,
        fingerprint: record.metadata.fingerprint,
        chunkCount: 1,
        ingestedAt: record.createdAt.toISOString(),
      });
    }

    return [...byFingerprint.values()].sort((a, b) => a.source.localeCompare(b.source));
  }

  async countRecords(): Promise<number> {
    return this.records.length;
  }

  async close(): Promise<void> {}
}

function uniqueKey(fingerprint: string, chunkIndex: number): string {
  return `${fingerprint}:${chunkIndex}`;
}
