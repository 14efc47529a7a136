import { describe, expect, it, vi } from "vitest";
import { isTransientStoreError, withRetry } from "../src/utils/retry.js";

const transient = () => Object.assign(new Error("reset"), { code: "ECONNRESET" });

describe("withRetry", () => {
  it("re-runs a transient failure until it succeeds", async () => {
    const fn = vi.fn<() => Promise<string>>();
    fn.mockRejectedValueOnce(transient()).mockResolvedValueOnce("ok");

    await expect(
      withRetry(fn, { retries: 2, operation: "test", isRetryable: isTransientStoreError, backoffMs: [0] }),
    ).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("does not retry permanent failures", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("syntax error"));

    await expect(
      withRetry(fn, { retries: 3, operation: "test", isRetryable: isTransientStoreError, backoffMs: [0] }),
    ).rejects.toThrow("syntax error");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("stops after the configured retries", async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(transient());

    await expect(
      withRetry(fn, { retries: 2, operation: "test", isRetryable: isTransientStoreError, backoffMs: [0] }),
    ).rejects.toThrow("reset");
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe("isTransientStoreError", () => {
  it("recognises connection-level failures", () => {
    expect(isTransientStoreError(Object.assign(new Error("x"), { code: "57P01" }))).toBe(true);
    expect(isTransientStoreError(new Error("Connection terminated unexpectedly"))).toBe(true);
    expect(isTransientStoreError(Object.assign(new Error("x"), { code: "23505" }))).toBe(false);
    expect(isTransientStoreError("ECONNRESET")).toBe(false);
  });
});
