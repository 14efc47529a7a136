import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/domain/errors.js";
import { HANDBOOK, createTestService } from "./helpers/testService.js";

describe("RagService", () => {
  it("answers from ingested content with citations, passing the question through verbatim", async () => {
    const { service, generation } = createTestService();
    await service.ingest({ filename: "handbook.md", bytes: Buffer.from(HANDBOOK) });

    const result = await service.chat({ query: "  When are expense reports due?  " });

    expect(result.answer).toBe("Stub answer.");
    expect(result.citations.length).toBeGreaterThan(0);
    expect(result.citations.length).toBeLessThanOrEqual(2);
    expect(result.citations[0].source).toBe("handbook.md");
    expect(generation.prompts[0]).toMatch(/Question:   When are expense reports due\?  $/);
  });

  it("keeps only the base name of an uploaded file", async () => {
    const { service } = createTestService();

    const result = await service.ingest({
      filename: "../../uploads/handbook.md",
      bytes: Buffer.from(HANDBOOK),
    });

    expect(result.filename).toBe("handbook.md");
    await expect(service.listSources()).resolves.toMatchObject([{ source: "handbook.md" }]);
  });

  it("requires a filename", async () => {
    const { service } = createTestService();

    await expect(service.ingest({ filename: "  ", bytes: Buffer.from("x") })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it("searches without generating", async () => {
    const { service, generation } = createTestService();
    await service.ingest({ filename: "handbook.md", bytes: Buffer.from(HANDBOOK) });

    const result = await service.search({ query: "laptops replaced", topK: 1 });

    expect(result.hits).toHaveLength(1);
    expect(result.hits[0].source).toBe("handbook.md");
    expect(generation.prompts).toHaveLength(0);
  });

  it("reports the stored chunk count", async () => {
    const { service, store } = createTestService();
    await service.ingest({ filename: "handbook.md", bytes: Buffer.from(HANDBOOK) });

    await expect(service.status()).resolves.toEqual({
      ok: true,
      record_count: await store.countRecords(),
    });
  });
});
