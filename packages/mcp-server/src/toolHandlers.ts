import type { ToolSchemaRegistry } from "@tally/shared";
import type { z } from "zod";

export type ToolCallOptions = {
  /** Forwarded to every embedding and row store request made by the call. */
  signal?: AbortSignal;
};

export type TextContent = { type: "text"; text: string };

export type ToolResult<TName extends keyof ToolSchemaRegistry> = {
  content: TextContent[];
  structuredContent: z.output<ToolSchemaRegistry[TName]["output"]>;
};

/**
 * ToolHandlers is the narrow interface expected by registerTools().
 * Each handler:
 * - parses its raw arguments with the tool's input schema
 * - performs at most one embedding call and one store operation
 * - returns the one-key result envelope, both as structured content and as JSON text
 */
export type HandlerFor<TName extends keyof ToolSchemaRegistry> = (
  rawInput: unknown,
  options?: ToolCallOptions
) => Promise<ToolResult<TName>>;

export type ToolHandlers = {
  createTransaction: HandlerFor<"create_transaction">;
  searchSimilarTransactions: HandlerFor<"search_similar_transactions">;
  upsertCategory: HandlerFor<"upsert_category">;
  searchSimilarCategories: HandlerFor<"search_similar_categories">;
  listAccounts: HandlerFor<"list_accounts">;
  upsertAccount: HandlerFor<"upsert_account">;
};
