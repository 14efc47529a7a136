export interface EmbeddingProvider {
  readonly name: string;
  embed(texts: string[]): Promise<number[][]>;
}

export interface GenerationProvider {
  readonly name: string;
  generate(prompt: string): Promise<string>;
}

/** Error raised by a provider client for a non-2xx upstream response. */
export class ProviderHttpError extends Error {
  constructor(
    readonly provider: string,
    readonly status: number,
    body: string,
  ) {
    super(`${provider} request failed (${status}): ${body.slice(0, 500)}`);
    this.name = "ProviderHttpError";
  }
}
