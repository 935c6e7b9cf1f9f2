import type { CallOptions, RowStoreClient, Vector } from "@tally/clients";
import {
  silentLogger,
  type CreateTransactionInput,
  type ListAccountsInput,
  type Logger,
  type Row,
  type UpsertAccountInput,
  type UpsertCategoryInput,
} from "@tally/shared";
import type { UpsertResult } from "./db/rows";
import { listAccounts, upsertAccount } from "./repos/accounts";
import { upsertCategory } from "./repos/categories";
import { insertTransaction } from "./repos/transactions";
import { resolveLimit, searchSimilar } from "./search/semantic";

/**
 * Domain-level persistence used by the tool handlers. Implementations are
 * immutable after construction and safe to share across concurrent calls.
 */
export interface Store {
  insertTransaction(
    input: CreateTransactionInput,
    embedding: Vector | null,
    options?: CallOptions
  ): Promise<Row>;
  upsertCategory(
    input: UpsertCategoryInput,
    embedding: Vector | null,
    options?: CallOptions
  ): Promise<Row>;
  upsertAccount(input: UpsertAccountInput, options?: CallOptions): Promise<Row>;
  listAccounts(params: ListAccountsInput, options?: CallOptions): Promise<Row[]>;
  searchSimilarTransactions(
    embedding: Vector,
    limit?: number,
    options?: CallOptions
  ): Promise<Row[]>;
  searchSimilarCategories(
    embedding: Vector,
    limit?: number,
    options?: CallOptions
  ): Promise<Row[]>;
}

export class RestStore implements Store {
  private readonly client: RowStoreClient;
  private readonly logger: Logger;

  constructor(client: RowStoreClient, logger: Logger = silentLogger) {
    this.client = client;
    this.logger = logger.child({ component: "store" });
  }

  async insertTransaction(
    input: CreateTransactionInput,
    embedding: Vector | null,
    options?: CallOptions
  ): Promise<Row> {
    const start = Date.now();
    const row = await insertTransaction(this.client, input, embedding, options);
    this.logger.debug("store.transaction.inserted", {
      account_id: input.account_id,
      embedded: embedding !== null,
      duration_ms: Date.now() - start,
    });
    return row;
  }

  async upsertCategory(
    input: UpsertCategoryInput,
    embedding: Vector | null,
    options?: CallOptions
  ): Promise<Row> {
    const start = Date.now();
    const result = await upsertCategory(this.client, input, embedding, options);
    this.logUpsert("categories", result, start, { name: input.name });
    return result.row;
  }

  async upsertAccount(input: UpsertAccountInput, options?: CallOptions): Promise<Row> {
    const start = Date.now();
    const result = await upsertAccount(this.client, input, options);
    this.logUpsert("accounts", result, start, { name: input.name, type: input.type });
    return result.row;
  }

  async listAccounts(params: ListAccountsInput, options?: CallOptions): Promise<Row[]> {
    const rows = await listAccounts(this.client, params, options);
    this.logger.debug("store.accounts.listed", {
      type: params.type ?? null,
      search: params.search ?? null,
      count: rows.length,
    });
    return rows;
  }

  async searchSimilarTransactions(
    embedding: Vector,
    limit?: number,
    options?: CallOptions
  ): Promise<Row[]> {
    return this.search("transactions", embedding, limit, options);
  }

  async searchSimilarCategories(
    embedding: Vector,
    limit?: number,
    options?: CallOptions
  ): Promise<Row[]> {
    return this.search("categories", embedding, limit, options);
  }

  private async search(
    target: "transactions" | "categories",
    embedding: Vector,
    limit: number | undefined,
    options: CallOptions | undefined
  ): Promise<Row[]> {
    const start = Date.now();
    const rows = await searchSimilar(this.client, target, embedding, limit, options);
    this.logger.debug("store.search.completed", {
      target,
      embedding_dims: embedding.length,
      match_count: resolveLimit(limit),
      count: rows.length,
      duration_ms: Date.now() - start,
    });
    return rows;
  }

  private logUpsert(
    table: string,
    result: UpsertResult,
    start: number,
    fields: Record<string, unknown>
  ): void {
    this.logger.debug(`store.upsert.${result.outcome}`, {
      table,
      ...fields,
      duration_ms: Date.now() - start,
    });
  }
}
