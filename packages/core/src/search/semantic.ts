import type { CallOptions, RowStoreClient, Vector } from "@tally/clients";
import type { Row } from "@tally/shared";

export const DEFAULT_MATCH_COUNT = 5;
export const MIN_MATCH_COUNT = 1;
export const MAX_MATCH_COUNT = 25;

export const SimilarityFunctions = {
  transactions: "search_similar_transactions",
  categories: "search_similar_categories",
} as const;

export type SimilarityTarget = keyof typeof SimilarityFunctions;

/** Caller-supplied result count, defaulted to 5, floored and clamped to 1..25. */
export function resolveLimit(requested?: number | null): number {
  const value =
    requested === null || requested === undefined || !Number.isFinite(requested)
      ? DEFAULT_MATCH_COUNT
      : Math.floor(requested);
  return Math.min(Math.max(value, MIN_MATCH_COUNT), MAX_MATCH_COUNT);
}

export async function searchSimilar(
  client: RowStoreClient,
  target: SimilarityTarget,
  embedding: Vector,
  limit?: number | null,
  options: CallOptions = {}
): Promise<Row[]> {
  return client.rpc(
    SimilarityFunctions[target],
    { query_embedding: embedding, match_count: resolveLimit(limit) },
    options
  );
}
