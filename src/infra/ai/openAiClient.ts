import { z } from "zod";
import { EmbeddingProvider, GenerationProvider, ProviderHttpError } from "./types.js";

interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export class OpenAiClient implements EmbeddingProvider, GenerationProvider {
  readonly name = "openai";

  constructor(private readonly options: OpenAiClientOptions) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const data = embeddingResponseSchema.parse(
      await this.post("/embeddings", {
        model: this.options.embeddingModel,
        input: texts,
      }),
    );

    return [...data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }

  async generate(prompt: string): Promise<string> {
    const data = chatResponseSchema.parse(
      await this.post("/chat/completions", {
        model: this.options.chatModel,
        temperature: 0,
        messages: [{ role: "user", content: prompt }],
      }),
    );

    const content = data.choices[0]?.message.content?.trim();
    if (!content) {
      throw new Error("OpenAI chat returned an empty completion.");
    }
    return content;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const response = await fetch(`${this.options.baseUrl}${path}`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new ProviderHttpError("OpenAI", response.status, await response.text());
    }
    return response.json();
  }
}
