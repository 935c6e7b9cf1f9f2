import {
  BaseEmbedder,
  EmbeddingError,
  EmbeddingResponseZ,
  fetchJson,
  normalizeBaseUrl,
  type EmbedOptions,
  type EmbedderConfigBase,
  type Fetcher,
  type Vector,
} from "./embedder";

export type OpenAICompatConfig = EmbedderConfigBase;

export class OpenAICompatEmbedder extends BaseEmbedder {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly model: string;
  private readonly dims?: number;
  private readonly fetcher?: Fetcher;

  constructor(config: OpenAICompatConfig) {
    super();
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.dims = config.dims;
    this.fetcher = config.fetcher;
  }

  async embed(text: string, options?: EmbedOptions): Promise<Vector> {
    const body: Record<string, unknown> = {
      input: text,
      model: this.model,
    };

    if (this.dims) {
      body.dimensions = this.dims;
    }

    const data = await fetchJson(
      `${this.baseUrl}/embeddings`,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(body),
        signal: options?.signal,
      },
      this.fetcher
    );

    const payload = EmbeddingResponseZ.safeParse(data);
    if (!payload.success) {
      throw new EmbeddingError("request_failed", "embedding request failed: malformed response");
    }

    const first = payload.data.data[0];
    if (!first) {
      throw new EmbeddingError("no_data", "no embedding data");
    }
    return first.embedding;
  }
}
