import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Embedder } from "@tally/clients";
import {
  IntegrityError,
  ValidationError,
  categoryEmbeddingSource,
  toToolError,
  type Store,
} from "@tally/core";
import { ToolNames, ToolSchemas, silentLogger, type Logger, type ToolName } from "@tally/shared";
import { ZodError, type z } from "zod";
import type { TextContent, ToolCallOptions, ToolHandlers } from "./toolHandlers";

export type HandlerDependencies = {
  store: Store;
  embedder: Embedder;
  logger?: Logger;
  /** Caps concurrently running tool calls; unlimited when unset. */
  maxConcurrentTools?: number;
};

class Semaphore {
  private readonly limit: number;
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(limit: number) {
    this.limit = limit;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active += 1;
      return () => this.release();
    }
    return new Promise((resolve) => {
      this.queue.push(() => {
        this.active += 1;
        resolve(() => this.release());
      });
    });
  }

  private release() {
    this.active = Math.max(0, this.active - 1);
    const next = this.queue.shift();
    if (next) next();
  }
}

type CallContext = {
  signal?: AbortSignal;
  logger: Logger;
};

type ToolSchemaPair<TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny> = {
  input: TInput;
  output: TOutput;
};

function describeError(err: unknown): string {
  return toToolError(err).message;
}

function zodField(err: ZodError): string | undefined {
  const path = err.issues[0]?.path;
  return path && path.length > 0 ? path.join(".") : undefined;
}

function zodMessage(err: ZodError): string {
  return err.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Maps any failure to one of the two caller-visible kinds: invalid params
 * (caller can correct the input) or an internal error naming the action that failed.
 * The SDK reports only the message to clients, so the payload is serialised into it.
 */
export function toMcpError(err: unknown, action: string): McpError {
  if (err instanceof McpError) return err;

  if (err instanceof ZodError || err instanceof ValidationError) {
    const message = err instanceof ZodError ? zodMessage(err) : err.message;
    const field = err instanceof ZodError ? zodField(err) : err.field;
    const data = field ? { field } : undefined;
    return new McpError(ErrorCode.InvalidParams, JSON.stringify({ code: "validation", message, ...data }), data);
  }

  const data = { details: describeError(err) };
  return new McpError(
    ErrorCode.InternalError,
    JSON.stringify({ code: "internal", message: `Failed to ${action}`, ...data }),
    data
  );
}

async function step<T>(action: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw toMcpError(err, action);
  }
}

function requireQuery(query: string): string {
  const trimmed = query.trim();
  if (trimmed.length === 0) {
    throw new ValidationError("query must not be empty", "query");
  }
  return trimmed;
}

function resultFields(output: unknown): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  if (typeof output !== "object" || output === null) return fields;
  for (const [key, value] of Object.entries(output)) {
    if (Array.isArray(value)) {
      fields[`${key}_count`] = value.length;
    } else if (typeof value === "object" && value !== null && "id" in value) {
      fields[`${key}_id`] = value.id;
    }
  }
  return fields;
}

export function createHandlers(deps: HandlerDependencies): ToolHandlers {
  const { store, embedder } = deps;
  const logger = (deps.logger ?? silentLogger).child({ component: "tools" });
  const semaphore = new Semaphore(deps.maxConcurrentTools ?? Infinity);

  const wrapTool = <TInput extends z.ZodTypeAny, TOutput extends z.ZodTypeAny>(
    toolName: ToolName,
    schemas: ToolSchemaPair<TInput, TOutput>,
    fn: (input: z.output<TInput>, context: CallContext) => Promise<z.input<TOutput>>
  ) => {
    return async (
      rawInput: unknown,
      options: ToolCallOptions = {}
    ): Promise<{ content: TextContent[]; structuredContent: z.output<TOutput> }> => {
      const release = await semaphore.acquire();
      const log = logger.child({ tool: toolName });
      const start = Date.now();
      try {
        log.debug("tool.started");
        const input = schemas.input.parse(rawInput);
        const output = await fn(input, { signal: options.signal, logger: log });

        const checked = schemas.output.safeParse(output);
        if (!checked.success) {
          throw new IntegrityError(`${toolName} produced an invalid result: ${zodMessage(checked.error)}`);
        }

        log.info("tool.completed", {
          duration_ms: Date.now() - start,
          ...resultFields(checked.data),
        });
        return {
          content: [{ type: "text", text: JSON.stringify(checked.data) }],
          structuredContent: checked.data,
        };
      } catch (err) {
        const mcpError = toMcpError(err, `run ${toolName}`);
        log.error("tool.failed", {
          duration_ms: Date.now() - start,
          code: mcpError.code,
          error_message: mcpError.message,
          data: mcpError.data,
        });
        throw mcpError;
      } finally {
        release();
      }
    };
  };

  return {
    createTransaction: wrapTool(
      ToolNames.createTransaction,
      ToolSchemas[ToolNames.createTransaction],
      async (input, { signal }) => {
        const embedding = await step("generate transaction embedding", () =>
          embedder.maybeEmbed(input.description, { signal })
        );
        const transaction = await step("insert transaction", () =>
          store.insertTransaction(input, embedding, { signal })
        );
        return { transaction };
      }
    ),

    searchSimilarTransactions: wrapTool(
      ToolNames.searchSimilarTransactions,
      ToolSchemas[ToolNames.searchSimilarTransactions],
      async (input, { signal }) => {
        const query = requireQuery(input.query);
        const embedding = await step("embed query text", () => embedder.embed(query, { signal }));
        const matches = await step("search similar transactions", () =>
          store.searchSimilarTransactions(embedding, input.limit, { signal })
        );
        return { matches };
      }
    ),

    upsertCategory: wrapTool(
      ToolNames.upsertCategory,
      ToolSchemas[ToolNames.upsertCategory],
      async (input, { signal }) => {
        const embedding = await step("generate category embedding", () =>
          embedder.embed(categoryEmbeddingSource(input), { signal })
        );
        const category = await step("upsert category", () =>
          store.upsertCategory(input, embedding, { signal })
        );
        return { category };
      }
    ),

    searchSimilarCategories: wrapTool(
      ToolNames.searchSimilarCategories,
      ToolSchemas[ToolNames.searchSimilarCategories],
      async (input, { signal }) => {
        const query = requireQuery(input.query);
        const embedding = await step("embed query text", () => embedder.embed(query, { signal }));
        const matches = await step("search similar categories", () =>
          store.searchSimilarCategories(embedding, input.limit, { signal })
        );
        return { matches };
      }
    ),

    listAccounts: wrapTool(
      ToolNames.listAccounts,
      ToolSchemas[ToolNames.listAccounts],
      async (input, { signal }) => {
        const accounts = await step("list accounts", () => store.listAccounts(input, { signal }));
        return { accounts };
      }
    ),

    upsertAccount: wrapTool(
      ToolNames.upsertAccount,
      ToolSchemas[ToolNames.upsertAccount],
      async (input, { signal, logger: log }) => {
        // Accounts have no embedding column; the vector is computed and dropped.
        const nameEmbedding = await step("generate account embedding", () =>
          embedder.embed(input.name, { signal })
        );
        log.debug("account.embedding_discarded", { dims: nameEmbedding.length });

        const account = await step("upsert account", () => store.upsertAccount(input, { signal }));
        return { account };
      }
    ),
  };
}
