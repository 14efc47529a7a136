import { Chunk } from "../domain/types.js";
import { ConfigurationError } from "../domain/errors.js";

export interface ChunkingOptions {
  maxChunkSize: number;
  overlap: number;
}

export const DEFAULT_CHUNKING: ChunkingOptions = {
  maxChunkSize: 1000,
  overlap: 200,
};

// Preferred cut points, strongest first. A cut lands right after the separator.
const BOUNDARY_SEPARATORS = ["\n\n", "\n", ". ", "! ", "? ", "; ", ", ", " "];

// A boundary earlier than this fraction of the window wastes too much of it.
const MIN_BOUNDARY_RATIO = 0.55;

/**
 * Splits `text` into overlapping windows of at most `maxChunkSize`
 * UTF-16 code units. Consecutive chunks share exactly `overlap` units, one
 * more or less where that would split a surrogate pair, and `mergeChunks`
 * recovers the input.
 */
export function splitIntoChunks(
  text: string,
  options: ChunkingOptions = DEFAULT_CHUNKING,
): Chunk[] {
  assertChunkingOptions(options);
  const { maxChunkSize, overlap } = options;
  if (text.length === 0) {
    return [];
  }

  const chunks: Chunk[] = [];
  let start = 0;

  while (start < text.length) {
    const hardEnd = Math.min(start + maxChunkSize, text.length);
    let end = hardEnd;

    if (hardEnd < text.length) {
      const minimum = Math.max(Math.floor(maxChunkSize * MIN_BOUNDARY_RATIO), overlap + 1);
      const boundary = findBoundary(text.slice(start, hardEnd), minimum);
      if (boundary > 0) {
        end = start + boundary;
      } else if (isLowSurrogate(text, end)) {
        // Never split a surrogate pair; a one-unit window must still take the whole character.
        end = end - 1 > start ? end - 1 : end + 1;
      }
    }

    chunks.push({
      index: chunks.length,
      text: text.slice(start, end),
      start,
      end,
    });

    if (end >= text.length) {
      break;
    }
    const previousStart = start;
    start = end - overlap;
    if (isLowSurrogate(text, start)) {
      start = start - 1 > previousStart ? start - 1 : start + 1;
    }
  }

  return chunks;
}

/** Concatenates chunks, dropping the prefix each one shares with its predecessor. */
export function mergeChunks(chunks: Chunk[]): string {
  let merged = "";
  let covered = 0;
  for (const chunk of chunks) {
    const shared = Math.max(0, covered - chunk.start);
    merged += chunk.text.slice(shared);
    covered = chunk.end;
  }
  return merged;
}

function isLowSurrogate(text: string, index: number): boolean {
  const code = text.charCodeAt(index);
  return code >= 0xdc00 && code <= 0xdfff;
}

function findBoundary(window: string, minimum: number): number {
  for (const separator of BOUNDARY_SEPARATORS) {
    const idx = window.lastIndexOf(separator);
    if (idx >= 0 && idx + separator.length >= minimum) {
      return idx + separator.length;
    }
  }
  return -1;
}

function assertChunkingOptions({ maxChunkSize, overlap }: ChunkingOptions): void {
  if (!Number.isInteger(maxChunkSize) || maxChunkSize < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${maxChunkSize}.`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= maxChunkSize) {
    throw new ConfigurationError(
      `Chunk overlap must be between 0 and ${maxChunkSize - 1}, got ${overlap}.`,
    );
  }
}
