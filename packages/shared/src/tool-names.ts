// Centralized tool names so the MCP server and tests share the same strings.
// Keep these stable to avoid breaking agent configs.

export const ToolNames = {
  createTransaction: "create_transaction",
  searchSimilarTransactions: "search_similar_transactions",
  upsertCategory: "upsert_category",
  searchSimilarCategories: "search_similar_categories",
  listAccounts: "list_accounts",
  upsertAccount: "upsert_account",
} as const;

export type ToolName = (typeof ToolNames)[keyof typeof ToolNames];
