import { AppConfig, ProviderName } from "../../config/env.js";
import { ConfigurationError } from "../../domain/errors.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { EmbeddingProvider, GenerationProvider } from "./types.js";

export interface Providers {
  embedding: EmbeddingProvider;
  generation: GenerationProvider;
}

type ProviderConfig = Pick<
  AppConfig,
  | "embeddingProvider"
  | "generationProvider"
  | "openaiApiKey"
  | "openaiBaseUrl"
  | "embeddingModel"
  | "llmModel"
  | "ollamaBaseUrl"
  | "providerTimeoutMs"
>;

export function createProviders(config: ProviderConfig): Providers {
  const clients = new Map<ProviderName, OpenAiClient | OllamaClient>();

  const resolve = (name: ProviderName): OpenAiClient | OllamaClient => {
    const cached = clients.get(name);
    if (cached) {
      return cached;
    }
    const client = name === "openai" ? createOpenAi(config) : createOllama(config);
    clients.set(name, client);
    return client;
  };

  return {
    embedding: resolve(config.embeddingProvider),
    generation: resolve(config.generationProvider),
  };
}

function createOpenAi(config: ProviderConfig): OpenAiClient {
  if (!config.openaiApiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required for OpenAI operations.");
  }
  return new OpenAiClient({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    embeddingModel: config.embeddingModel,
    chatModel: config.llmModel,
    timeoutMs: config.providerTimeoutMs,
  });
}

function createOllama(config: ProviderConfig): OllamaClient {
  return new OllamaClient({
    baseUrl: config.ollamaBaseUrl,
    embeddingModel: config.embeddingModel,
    chatModel: config.llmModel,
    timeoutMs: config.providerTimeoutMs,
  });
}
