import type { AppConfig } from "@tally/shared";
import { FakeEmbedder, type Embedder, type Fetcher } from "./embedder";
import { OpenAICompatEmbedder } from "./openaiCompat";

export type CreateEmbedderOptions = {
  fetcher?: Fetcher;
};

export function createEmbedder(
  config: AppConfig["embedder"],
  options: CreateEmbedderOptions = {}
): Embedder {
  if (config.useFake) {
    return new FakeEmbedder({ dims: config.dims });
  }

  if (!config.apiKey) {
    throw new Error("Embedder api key missing");
  }

  return new OpenAICompatEmbedder({
    baseUrl: config.baseUrl,
    apiKey: config.apiKey,
    model: config.model,
    dims: config.dims,
    fetcher: options.fetcher,
  });
}
