export type RagErrorCode =
  | "EXTRACTION_ERROR"
  | "EMBEDDING_PROVIDER_ERROR"
  | "GENERATION_PROVIDER_ERROR"
  | "DIMENSION_MISMATCH"
  | "STORE_ERROR"
  | "CONFIGURATION_ERROR"
  | "VALIDATION_ERROR"
  | "PAYLOAD_TOO_LARGE";

export interface RagErrorDetails {
  [key: string]: unknown;
}

interface RagErrorOptions {
  statusCode: number;
  retryable: boolean;
  userMessage: string;
  details?: RagErrorDetails;
  cause?: unknown;
}

/**
 * Base class for every failure the pipeline reports.
 *
 * `message` is for server logs; `userMessage` is the only text a caller
 * should render.
 */
export class RagError extends Error {
  readonly code: RagErrorCode;
  readonly statusCode: number;
  readonly retryable: boolean;
  readonly userMessage: string;
  readonly details: RagErrorDetails;

  constructor(code: RagErrorCode, message: string, options: RagErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable;
    this.userMessage = options.userMessage;
    this.details = options.details ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class ExtractionError extends RagError {
  constructor(filename: string, reason: string, cause?: unknown) {
    super("EXTRACTION_ERROR", `Failed to extract text from ${filename}: ${reason}`, {
      statusCode: 422,
      retryable: false,
      userMessage: `The file "${filename}" could not be read: ${reason}.`,
      details: { filename },
      cause,
    });
  }
}

export class EmbeddingProviderError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("EMBEDDING_PROVIDER_ERROR", message, {
      statusCode: 502,
      retryable: true,
      userMessage: "The embedding service is unavailable. Please try again later.",
      cause,
    });
  }
}

export class GenerationProviderError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("GENERATION_PROVIDER_ERROR", message, {
      statusCode: 502,
      retryable: true,
      userMessage: "The answer service is unavailable. Please try again later.",
      cause,
    });
  }
}

export class DimensionMismatchError extends RagError {
  constructor(
    readonly expected: number,
    readonly actual: number,
  ) {
    super(
      "DIMENSION_MISMATCH",
      `Embedding dimension mismatch: expected ${expected}, got ${actual}.`,
      {
        statusCode: 500,
        retryable: false,
        userMessage: "The document could not be indexed due to a server configuration problem.",
        details: { expected, actual },
      },
    );
  }
}

export class StoreError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("STORE_ERROR", message, {
      statusCode: 503,
      retryable: true,
      userMessage: "The document store is temporarily unavailable. Please try again later.",
      cause,
    });
  }
}

export class ConfigurationError extends RagError {
  constructor(message: string, cause?: unknown) {
    super("CONFIGURATION_ERROR", message, {
      statusCode: 500,
      retryable: false,
      userMessage: "The service is misconfigured. Please contact the administrator.",
      cause,
    });
  }
}

export class ValidationError extends RagError {
  constructor(message: string, details?: RagErrorDetails) {
    super("VALIDATION_ERROR", message, {
      statusCode: 400,
      retryable: false,
      userMessage: message,
      details,
    });
  }
}

export class PayloadTooLargeError extends RagError {
  constructor(readonly limitBytes: number) {
    super("PAYLOAD_TOO_LARGE", `Request body exceeds ${limitBytes} bytes.`, {
      statusCode: 413,
      retryable: false,
      userMessage: `The upload is larger than the ${limitBytes}-byte limit.`,
      details: { limitBytes },
    });
  }
}

export function isRagError(error: unknown): error is RagError {
  return error instanceof RagError;
}

export interface ErrorResponseBody {
  error: {
    code: RagErrorCode | "INTERNAL_ERROR";
    message: string;
    retryable: boolean;
  };
}

export function toErrorResponse(error: unknown): { status: number; body: ErrorResponseBody } {
  if (isRagError(error)) {
    return {
      status: error.statusCode,
      body: {
        error: {
          code: error.code,
          message: error.userMessage,
          retryable: error.retryable,
        },
      },
    };
  }

  return {
    status: 500,
    body: {
      error: {
        code: "INTERNAL_ERROR",
        message: "Something went wrong. Please try again later.",
        retryable: false,
      },
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
