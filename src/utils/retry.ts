import { componentLogger } from "../infra/logging/logger.js";

const log = componentLogger("retry");

export interface RetryOptions {
  retries: number;
  operation: string;
  isRetryable: (error: unknown) => boolean;
  backoffMs?: number[];
}

const DEFAULT_BACKOFF_MS = [200, 500, 1000];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Re-runs `fn` as a whole while the failure is retryable and attempts remain. */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const backoff = options.backoffMs ?? DEFAULT_BACKOFF_MS;

  for (let attempt = 0; ; attempt += 1) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= options.retries || !options.isRetryable(error)) {
        throw error;
      }

      const waitMs = backoff[Math.min(attempt, backoff.length - 1)] ?? 0;
      log.warn(
        { operation: options.operation, attempt: attempt + 1, waitMs, err: error },
        "retrying after transient failure",
      );
      await delay(waitMs);
    }
  }
}

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "57P01", // admin_shutdown
  "08000", // connection_exception
  "08003", // connection_does_not_exist
  "08006", // connection_failure
  "40001", // serialization_failure
  "40P01", // deadlock_detected
]);

export function isTransientStoreError(error: unknown): boolean {
  if (!error || typeof error !== "object") {
    return false;
  }
  const code = "code" in error ? error.code : undefined;
  if (typeof code === "string" && TRANSIENT_CODES.has(code)) {
    return true;
  }
  return error instanceof Error && /Connection terminated|timeout exceeded when trying to connect/i.test(error.message);
}
