import { describe, expect, it } from "vitest";
import {
  DimensionMismatchError,
  ExtractionError,
  StoreError,
} from "../src/domain/errors.js";
import { InMemoryVectorStore } from "../src/infra/store/inMemoryVectorStore.js";
import { EmbeddingGateway } from "../src/pipelines/embedding.js";
import { IngestionPipeline } from "../src/pipelines/ingestion.js";
import { fingerprintText } from "../src/pipelines/fingerprint.js";
import { FakeEmbeddingProvider } from "./helpers/fakeProviders.js";

const DOCUMENT = "a".repeat(2500);

function setup(store = new InMemoryVectorStore()) {
  const provider = new FakeEmbeddingProvider(16);
  const pipeline = new IngestionPipeline({
    gateway: new EmbeddingGateway(provider, { dimension: 16, batchSize: 4 }),
    store,
    chunking: { maxChunkSize: 500, overlap: 50 },
  });
  return { provider, pipeline, store };
}

function upload(filename: string, text: string) {
  return { filename, bytes: Buffer.from(text, "utf-8") };
}

describe("IngestionPipeline", () => {
  it("stores 2500 characters as 6 chunks under one fingerprint", async () => {
    const { pipeline, store, provider } = setup();

    const result = await pipeline.ingest(upload("report.txt", DOCUMENT));

    expect(result).toEqual({
      filename: "report.txt",
      byteLength: 2500,
      fingerprint: fingerprintText(DOCUMENT),
      chunkCount: 6,
      outcome: "processed",
    });
    expect(await store.countRecords()).toBe(6);
    expect(provider.calls.map((batch) => batch.length)).toEqual([4, 2]);

    const hits = await store.similaritySearch(provider.vectorFor(""), 10);
    expect(hits.map((hit) => hit.record.metadata.chunk_index).sort()).toEqual([0, 1, 2, 3, 4, 5]);
    expect(new Set(hits.map((hit) => hit.record.metadata.total_chunks))).toEqual(new Set([6]));
    expect(new Set(hits.map((hit) => hit.record.source))).toEqual(new Set(["report.txt"]));
  });

  it("skips a re-upload before any embedding work", async () => {
    const { pipeline, store, provider } = setup();
    await pipeline.ingest(upload("report.txt", DOCUMENT));
    const embeddedBefore = provider.embeddedTextCount;

    const again = await pipeline.ingest(upload("report.txt", DOCUMENT));

    expect(again.outcome).toBe("already-processed");
    expect(again.chunkCount).toBe(0);
    expect(provider.embeddedTextCount).toBe(embeddedBefore);
    expect(await store.countRecords()).toBe(6);
  });

  it("deduplicates the same content under another filename or spacing", async () => {
    const { pipeline, store } = setup();
    await pipeline.ingest(upload("original.txt", "Shipping takes five days.\n\nReturns are free."));

    const renamed = await pipeline.ingest(
      upload("copy.md", "Shipping  takes five days.\r\n\r\n\r\nReturns are free.\n"),
    );

    expect(renamed.outcome).toBe("already-processed");
    const sources = await store.listSources();
    expect(sources).toHaveLength(1);
    expect(sources[0].source).toBe("original.txt");
  });

  it("stores at most one row set for concurrent identical uploads", async () => {
    const { pipeline, store } = setup();

    const results = await Promise.all([
      pipeline.ingest(upload("a.txt", DOCUMENT)),
      pipeline.ingest(upload("b.txt", DOCUMENT)),
    ]);

    expect(results.map((result) => result.outcome).sort()).toEqual([
      "already-processed",
      "processed",
    ]);
    expect(await store.countRecords()).toBe(6);
  });

  it("aborts with zero stored rows on a dimension mismatch", async () => {
    const store = new InMemoryVectorStore();
    const pipeline = new IngestionPipeline({
      gateway: new EmbeddingGateway(
        { name: "small", embed: async (texts) => texts.map(() => new Array<number>(768).fill(0.1)) },
        { dimension: 1536, batchSize: 100 },
      ),
      store,
      chunking: { maxChunkSize: 500, overlap: 50 },
    });

    await expect(pipeline.ingest(upload("report.txt", DOCUMENT))).rejects.toBeInstanceOf(
      DimensionMismatchError,
    );
    expect(await store.countRecords()).toBe(0);
  });

  it("reports no-content for a file without text", async () => {
    const { pipeline, provider, store } = setup();

    const result = await pipeline.ingest(upload("blank.txt", "  \n\t \r\n"));

    expect(result).toEqual({
      filename: "blank.txt",
      byteLength: 7,
      fingerprint: null,
      chunkCount: 0,
      outcome: "no-content",
    });
    expect(provider.calls).toHaveLength(0);
    expect(await store.countRecords()).toBe(0);
  });

  it("propagates extraction failures", async () => {
    const { pipeline } = setup();

    await expect(pipeline.ingest(upload("table.xlsx", "PK"))).rejects.toBeInstanceOf(
      ExtractionError,
    );
  });

  it("propagates store failures without reporting success", async () => {
    class FailingStore extends InMemoryVectorStore {
      override async upsertChunks(): Promise<never> {
        throw new StoreError("Store operation upsertChunks failed: connection refused");
      }
    }
    const { pipeline } = setup(new FailingStore());

    await expect(pipeline.ingest(upload("report.txt", DOCUMENT))).rejects.toBeInstanceOf(
      StoreError,
    );
  });
});
