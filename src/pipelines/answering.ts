import { GenerationProviderError, describeError } from "../domain/errors.js";
import { RetrievalHit } from "../domain/types.js";
import { GenerationProvider } from "../infra/ai/types.js";
import { componentLogger } from "../infra/logging/logger.js";

const log = componentLogger("answering");

const SNIPPET_CHARS = 280;

export interface Citation {
  source: string;
  chunk_index: number;
  score: number;
  snippet: string;
}

export interface ComposedAnswer {
  answer: string;
  citations: Citation[];
}

const INSTRUCTION = [
  "Answer the following question based only on the provided context.",
  "If the context does not contain enough information to answer the question,",
  "say that you don't have enough information.",
].join("\n");

const EMPTY_CONTEXT =
  "No documents are available. You must reply that you don't have enough information to answer.";

export function buildGroundedPrompt(query: string, hits: RetrievalHit[]): string {
  const context =
    hits.length === 0
      ? EMPTY_CONTEXT
      : hits
          .map((hit, i) => `[${i + 1}] source=${hit.source}#${hit.chunkIndex}\n${hit.text}`)
          .join("\n\n");

  return `${INSTRUCTION}\n\n<context>\n${context}\n</context>\n\nQuestion: ${query}`;
}

export function toCitations(hits: RetrievalHit[]): Citation[] {
  return hits.map((hit) => ({
    source: hit.source,
    chunk_index: hit.chunkIndex,
    score: Number(hit.score.toFixed(4)),
    snippet: hit.text.slice(0, SNIPPET_CHARS),
  }));
}

/** One generation call per question; failures are reported, never retried. */
export async function composeAnswer(
  provider: GenerationProvider,
  query: string,
  hits: RetrievalHit[],
): Promise<ComposedAnswer> {
  const prompt = buildGroundedPrompt(query, hits);
  const startedAt = Date.now();

  let answer: string;
  try {
    answer = await provider.generate(prompt);
  } catch (error) {
    log.warn({ provider: provider.name, err: error }, "generation failed");
    throw new GenerationProviderError(
      `${provider.name} generation failed: ${describeError(error)}`,
      error,
    );
  }

  log.debug(
    { provider: provider.name, contextChunks: hits.length, durationMs: Date.now() - startedAt },
    "generated answer",
  );
  return { answer, citations: toCitations(hits) };
}
