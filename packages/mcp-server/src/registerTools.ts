import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { ToolNames, ToolSchemas, type ToolName } from "@tally/shared";
import type { ZodRawShape } from "zod";
import type { ToolCallOptions, ToolHandlers } from "./toolHandlers";

export const SERVER_INSTRUCTIONS = `Personal finance ledger with semantic search.
Set up accounts (upsert_account) and categories (upsert_category) before recording transactions (create_transaction).
Use search_similar_transactions / search_similar_categories to find rows by meaning; list_accounts to look accounts up by type or name.`;

// Toolcards for MCP tools/list. Keep these short; they are injected early.
export const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  [ToolNames.createTransaction]:
    `Record a transaction against an account (append-only; never updates an existing row).
Inputs: account_id, amount (signed), currency, direction (income|expense|transfer), occurred_at (ISO timestamp), optional description and raw_source.
A non-blank description is embedded so the transaction can be found with search_similar_transactions.
Output: { transaction } with the stored row including id.`,

  [ToolNames.searchSimilarTransactions]:
    `Find transactions whose description is semantically close to a free-text query.
Inputs: query (non-empty), limit (1-25, default 5).
Output: { matches } ordered by ascending distance.`,

  [ToolNames.upsertCategory]:
    `Create or update a category by name (idempotent).
Inputs: name, optional kind (income|expense|transfer, default expense), optional description (defaults to the name).
Output: { category } with the stored row including id.`,

  [ToolNames.searchSimilarCategories]:
    `Find categories semantically close to a free-text query, e.g. to pick a category for a new transaction.
Inputs: query (non-empty), limit (1-25, default 5).
Output: { matches } ordered by ascending distance.`,

  [ToolNames.listAccounts]:
    `List accounts ordered by name.
Inputs: optional type (onchain|offchain), optional search (case-insensitive substring of the name).
Output: { accounts }.`,

  [ToolNames.upsertAccount]:
    `Create or update an account keyed by (name, type) (idempotent).
Inputs: name, type (onchain|offchain), currency, optional network and institution.
Output: { account } with the stored row including id; use its id as account_id for create_transaction.`,
};

const TOOL_TITLES: Record<ToolName, string> = {
  [ToolNames.createTransaction]: "Create transaction",
  [ToolNames.searchSimilarTransactions]: "Search similar transactions",
  [ToolNames.upsertCategory]: "Upsert category",
  [ToolNames.searchSimilarCategories]: "Search similar categories",
  [ToolNames.listAccounts]: "List accounts",
  [ToolNames.upsertAccount]: "Upsert account",
};

function registerTool<TInput extends ZodRawShape, TOutput extends ZodRawShape>(
  server: McpServer,
  name: ToolName,
  shapes: { inputShape: TInput; outputShape: TOutput },
  handler: (rawInput: unknown, options: ToolCallOptions) => Promise<CallToolResult>
) {
  server.registerTool<ZodRawShape, ZodRawShape>(
    name,
    {
      title: TOOL_TITLES[name],
      description: TOOL_DESCRIPTIONS[name],
      inputSchema: shapes.inputShape,
      outputSchema: shapes.outputShape,
    },
    (args, extra) => handler(args, { signal: extra.signal })
  );
}

/**
 * Registers every tool with its zod input and output shapes. The SDK validates
 * arguments against the shape; handlers parse them again so they can be called
 * directly in tests.
 */
export function registerTools(server: McpServer, handlers: ToolHandlers) {
  registerTool(
    server,
    ToolNames.createTransaction,
    ToolSchemas[ToolNames.createTransaction],
    handlers.createTransaction
  );
  registerTool(
    server,
    ToolNames.searchSimilarTransactions,
    ToolSchemas[ToolNames.searchSimilarTransactions],
    handlers.searchSimilarTransactions
  );
  registerTool(
    server,
    ToolNames.upsertCategory,
    ToolSchemas[ToolNames.upsertCategory],
    handlers.upsertCategory
  );
  registerTool(
    server,
    ToolNames.searchSimilarCategories,
    ToolSchemas[ToolNames.searchSimilarCategories],
    handlers.searchSimilarCategories
  );
  registerTool(server, ToolNames.listAccounts, ToolSchemas[ToolNames.listAccounts], handlers.listAccounts);
  registerTool(server, ToolNames.upsertAccount, ToolSchemas[ToolNames.upsertAccount], handlers.upsertAccount);
}
