import type { CallOptions, RowStoreClient } from "@tally/clients";
import type { ListAccountsInput, Row, UpsertAccountInput } from "@tally/shared";
import { upsertByNaturalKey, type UpsertResult } from "../db/rows";
import { filterRowsByName } from "../search/filters";

export const ACCOUNTS_TABLE = "accounts";

export function buildAccountPayload(input: UpsertAccountInput): Row {
  return {
    name: input.name,
    type: input.type,
    currency: input.currency,
    network: input.network ?? null,
    institution: input.institution ?? null,
  };
}

/** Keyed by (name, type): the same name may exist once on-chain and once off-chain. */
export async function upsertAccount(
  client: RowStoreClient,
  input: UpsertAccountInput,
  options: CallOptions = {}
): Promise<UpsertResult> {
  return upsertByNaturalKey(
    client,
    ACCOUNTS_TABLE,
    [
      { column: "name", value: input.name },
      { column: "type", value: input.type },
    ],
    buildAccountPayload(input),
    options
  );
}

export async function listAccounts(
  client: RowStoreClient,
  params: ListAccountsInput,
  options: CallOptions = {}
): Promise<Row[]> {
  const rows = await client.select(ACCOUNTS_TABLE, {
    filters: params.type ? [{ column: "type", value: params.type }] : [],
    order: { column: "name", ascending: true },
    signal: options.signal,
  });

  return filterRowsByName(rows, params.search);
}
