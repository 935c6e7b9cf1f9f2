import crypto from "node:crypto";
import { z } from "zod";

export type Vector = number[];

export type EmbedOptions = {
  signal?: AbortSignal;
};

export type Fetcher = typeof fetch;

export type EmbedderConfigBase = {
  baseUrl: string;
  apiKey?: string;
  model: string;
  dims?: number;
  fetcher?: Fetcher;
};

export interface Embedder {
  /** One provider call per invocation; no retry, batching or caching. */
  embed(text: string, options?: EmbedOptions): Promise<Vector>;
  /** Returns null for absent or blank text instead of calling the provider. */
  maybeEmbed(text: string | null | undefined, options?: EmbedOptions): Promise<Vector | null>;
}

export type EmbeddingErrorKind = "request_failed" | "no_data";

export class EmbeddingError extends Error {
  public readonly kind: EmbeddingErrorKind;
  public readonly status?: number;

  constructor(kind: EmbeddingErrorKind, message: string, status?: number) {
    super(message);
    this.name = "EmbeddingError";
    this.kind = kind;
    this.status = status;
  }
}

export abstract class BaseEmbedder implements Embedder {
  abstract embed(text: string, options?: EmbedOptions): Promise<Vector>;

  async maybeEmbed(
    text: string | null | undefined,
    options?: EmbedOptions
  ): Promise<Vector | null> {
    if (text === null || text === undefined) return null;
    const trimmed = text.trim();
    if (trimmed.length === 0) return null;
    return this.embed(trimmed, options);
  }
}

export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, "");
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function fetchJson(
  url: string,
  init: RequestInit,
  fetcher?: Fetcher
): Promise<unknown> {
  const fetchImpl = fetcher ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url, init);
  } catch (err) {
    throw new EmbeddingError("request_failed", `embedding request failed: ${describeError(err)}`);
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    throw new EmbeddingError(
      "request_failed",
      `embedding request failed (${response.status}): ${errorText}`,
      response.status
    );
  }

  try {
    return await response.json();
  } catch (err) {
    throw new EmbeddingError(
      "request_failed",
      `embedding request failed: invalid JSON (${describeError(err)})`,
      response.status
    );
  }
}

export type FakeEmbedderConfig = {
  dims?: number;
};

export class FakeEmbedder extends BaseEmbedder {
  private readonly dims: number;

  constructor(config: FakeEmbedderConfig = {}) {
    super();
    this.dims = config.dims ?? 8;
  }

  async embed(text: string, options?: EmbedOptions): Promise<Vector> {
    options?.signal?.throwIfAborted();
    return deterministicVector(text, this.dims);
  }
}

function deterministicVector(text: string, dims: number): Vector {
  const normalized = text
    .toLowerCase()
    .split(/[^a-z0-9]+/g)
    .filter(Boolean)
    .sort()
    .join(" ");
  const hash = crypto.createHash("sha256").update(normalized).digest();
  const vector: Vector = [];
  for (let i = 0; i < dims; i += 1) {
    const value = hash[i % hash.length] / 127.5 - 1;
    vector.push(Number(value.toFixed(6)));
  }
  return vector;
}

export const EmbeddingResponseZ = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});
