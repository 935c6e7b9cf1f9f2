import { z } from "zod";
import { ToolNames } from "./tool-names";

/**
 * Input and output schemas for every tool.
 *
 * Inputs are registered with the MCP server and parsed again by the handlers.
 * Outputs describe the one-key result envelope; rows stay opaque apart from `id`.
 *
 * Notes:
 * - Only type-correctness is enforced here. Semantic checks (blank queries)
 *   live in the handlers so they can name the offending field.
 * - Optional fields accept `null` as "absent" because agents often send it.
 */

export const NonEmptyZ = z.string().min(1);

export const AccountTypeZ = z.enum(["onchain", "offchain"]);
export type AccountType = z.infer<typeof AccountTypeZ>;

export const CategoryKindZ = z.enum(["income", "expense", "transfer"]);
export type CategoryKind = z.infer<typeof CategoryKindZ>;

export const TransactionDirectionZ = z.enum(["income", "expense", "transfer"]);
export type TransactionDirection = z.infer<typeof TransactionDirectionZ>;

const OptionalTextZ = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const RowZ = z.record(z.unknown());
export type Row = z.infer<typeof RowZ>;

export const PersistedRowZ = RowZ.refine(
  (row) => (typeof row.id === "string" && row.id.length > 0) || typeof row.id === "number",
  { message: "row is missing an id" }
);

/* =============================================================================
 * create_transaction
 * ============================================================================= */

export const CreateTransactionInputShape = {
  account_id: z.string(),
  amount: z.number().finite(),
  currency: z.string(),
  direction: TransactionDirectionZ,
  occurred_at: z.string(),
  description: OptionalTextZ,
  raw_source: OptionalTextZ,
};
export const CreateTransactionInputZ = z.object(CreateTransactionInputShape);
export type CreateTransactionInput = z.output<typeof CreateTransactionInputZ>;

export const CreateTransactionOutputShape = { transaction: PersistedRowZ };
export const CreateTransactionOutputZ = z.object(CreateTransactionOutputShape);

/* =============================================================================
 * search_similar_transactions / search_similar_categories
 * ============================================================================= */

export const SearchSimilarInputShape = {
  query: z.string(),
  limit: z.number().int().nullish().transform((value) => value ?? undefined),
};
export const SearchSimilarInputZ = z.object(SearchSimilarInputShape);
export type SearchSimilarInput = z.output<typeof SearchSimilarInputZ>;

export const SearchSimilarOutputShape = { matches: z.array(RowZ) };
export const SearchSimilarOutputZ = z.object(SearchSimilarOutputShape);

/* =============================================================================
 * upsert_category
 * ============================================================================= */

export const UpsertCategoryInputShape = {
  name: NonEmptyZ,
  kind: CategoryKindZ.nullish().transform((value) => value ?? undefined),
  description: OptionalTextZ,
};
export const UpsertCategoryInputZ = z.object(UpsertCategoryInputShape);
export type UpsertCategoryInput = z.output<typeof UpsertCategoryInputZ>;

export const UpsertCategoryOutputShape = { category: PersistedRowZ };
export const UpsertCategoryOutputZ = z.object(UpsertCategoryOutputShape);

/* =============================================================================
 * list_accounts
 * ============================================================================= */

export const ListAccountsInputShape = {
  type: AccountTypeZ.nullish().transform((value) => value ?? undefined),
  search: OptionalTextZ,
};
export const ListAccountsInputZ = z.object(ListAccountsInputShape);
export type ListAccountsInput = z.output<typeof ListAccountsInputZ>;

export const ListAccountsOutputShape = { accounts: z.array(RowZ) };
export const ListAccountsOutputZ = z.object(ListAccountsOutputShape);

/* =============================================================================
 * upsert_account
 * ============================================================================= */

export const UpsertAccountInputShape = {
  name: NonEmptyZ,
  type: AccountTypeZ,
  currency: NonEmptyZ,
  network: OptionalTextZ,
  institution: OptionalTextZ,
};
export const UpsertAccountInputZ = z.object(UpsertAccountInputShape);
export type UpsertAccountInput = z.output<typeof UpsertAccountInputZ>;

export const UpsertAccountOutputShape = { account: PersistedRowZ };
export const UpsertAccountOutputZ = z.object(UpsertAccountOutputShape);

/* =============================================================================
 * Tool registry helper
 * ============================================================================= */

export const ToolSchemas = {
  [ToolNames.createTransaction]: {
    input: CreateTransactionInputZ,
    inputShape: CreateTransactionInputShape,
    output: CreateTransactionOutputZ,
    outputShape: CreateTransactionOutputShape,
  },
  [ToolNames.searchSimilarTransactions]: {
    input: SearchSimilarInputZ,
    inputShape: SearchSimilarInputShape,
    output: SearchSimilarOutputZ,
    outputShape: SearchSimilarOutputShape,
  },
  [ToolNames.upsertCategory]: {
    input: UpsertCategoryInputZ,
    inputShape: UpsertCategoryInputShape,
    output: UpsertCategoryOutputZ,
    outputShape: UpsertCategoryOutputShape,
  },
  [ToolNames.searchSimilarCategories]: {
    input: SearchSimilarInputZ,
    inputShape: SearchSimilarInputShape,
    output: SearchSimilarOutputZ,
    outputShape: SearchSimilarOutputShape,
  },
  [ToolNames.listAccounts]: {
    input: ListAccountsInputZ,
    inputShape: ListAccountsInputShape,
    output: ListAccountsOutputZ,
    outputShape: ListAccountsOutputShape,
  },
  [ToolNames.upsertAccount]: {
    input: UpsertAccountInputZ,
    inputShape: UpsertAccountInputShape,
    output: UpsertAccountOutputZ,
    outputShape: UpsertAccountOutputShape,
  },
} as const;

export type ToolSchemaRegistry = typeof ToolSchemas;
