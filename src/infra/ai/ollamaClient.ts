import { z } from "zod";
import { EmbeddingProvider, GenerationProvider, ProviderHttpError } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
  timeoutMs: number;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedOne(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async generate(prompt: string): Promise<string> {
    const data = chatResponseSchema.parse(
      await this.post("/api/chat", {
        model: this.options.chatModel,
        stream: false,
        options: { temperature: 0 },
        messages: [{ role: "user", content: prompt }],
      }),
    );

    const content = data.message?.content?.trim();
    if (!content) {
      throw new Error("Ollama chat returned an empty message.");
    }
    return content;
  }

  private async embedOne(text: string): Promise<number[]> {
    const data = embeddingsResponseSchema.parse(
      await this.post("/api/embeddings", {
        model: this.options.embeddingModel,
        prompt: text,
      }),
    );

    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new ProviderHttpError("Ollama", response.status, await response.text());
    }
    return response.json();
  }
}
