import type { CallOptions, RowStoreClient, Vector } from "@tally/clients";
import type { Row, UpsertCategoryInput } from "@tally/shared";
import { upsertByNaturalKey, type UpsertResult } from "../db/rows";

export const CATEGORIES_TABLE = "categories";
export const DEFAULT_CATEGORY_KIND = "expense";

/** Text a category is embedded from: its description when given (even blank), otherwise its name. */
export function categoryEmbeddingSource(input: UpsertCategoryInput): string {
  return input.description ?? input.name;
}

export function buildCategoryPayload(input: UpsertCategoryInput, embedding: Vector | null): Row {
  return {
    name: input.name,
    kind: input.kind ?? DEFAULT_CATEGORY_KIND,
    description: categoryEmbeddingSource(input),
    embedding,
  };
}

export async function upsertCategory(
  client: RowStoreClient,
  input: UpsertCategoryInput,
  embedding: Vector | null,
  options: CallOptions = {}
): Promise<UpsertResult> {
  return upsertByNaturalKey(
    client,
    CATEGORIES_TABLE,
    [{ column: "name", value: input.name }],
    buildCategoryPayload(input, embedding),
    options
  );
}
