import type { CallOptions, RowStoreClient, Vector } from "@tally/clients";
import type { CreateTransactionInput, Row } from "@tally/shared";
import { insertAndFetch } from "../db/rows";

export const TRANSACTIONS_TABLE = "transactions";

export function buildTransactionPayload(input: CreateTransactionInput, embedding: Vector | null): Row {
  return {
    account_id: input.account_id,
    amount: input.amount,
    currency: input.currency,
    direction: input.direction,
    occurred_at: input.occurred_at,
    description: input.description ?? null,
    raw_source: input.raw_source ?? null,
    embedding,
  };
}

// Transactions are append-only; there is no update path.
export async function insertTransaction(
  client: RowStoreClient,
  input: CreateTransactionInput,
  embedding: Vector | null,
  options: CallOptions = {}
): Promise<Row> {
  return insertAndFetch(client, TRANSACTIONS_TABLE, buildTransactionPayload(input, embedding), options);
}
