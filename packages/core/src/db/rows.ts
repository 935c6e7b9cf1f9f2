import type { CallOptions, EqualityFilter, RowStoreClient } from "@tally/clients";
import type { Row } from "@tally/shared";
import { IntegrityError, NotFoundError } from "./errors";

export type UpsertOutcome = "inserted" | "updated";

export type UpsertResult = {
  row: Row;
  outcome: UpsertOutcome;
};

export function extractId(row: Row): string {
  const id = row.id;
  if (typeof id === "string" && id.length > 0) return id;
  if (typeof id === "number" && Number.isFinite(id)) return String(id);
  throw new IntegrityError("row missing id column");
}

export async function fetchFirst(
  client: RowStoreClient,
  table: string,
  filters: EqualityFilter[],
  options: CallOptions = {}
): Promise<Row | null> {
  const rows = await client.select(table, { filters, limit: 1, signal: options.signal });
  return rows[0] ?? null;
}

export async function fetchById(
  client: RowStoreClient,
  table: string,
  id: string,
  options: CallOptions = {}
): Promise<Row> {
  const row = await fetchFirst(client, table, [{ column: "id", value: id }], options);
  if (!row) {
    throw new NotFoundError(`${table} record ${id} was not found`, { table, id });
  }
  extractId(row);
  return row;
}

/** Inserts and re-reads the row, since the backend only hands back the id. */
export async function insertAndFetch(
  client: RowStoreClient,
  table: string,
  payload: Row,
  options: CallOptions = {}
): Promise<Row> {
  const id = await client.insert(table, payload, options);
  return fetchById(client, table, id, options);
}

/**
 * Create-or-update keyed by a natural key: look the row up by its key
 * columns, update it in place when found, insert otherwise, and return the
 * row as stored.
 *
 * Read-then-write with no lock or transaction. Two concurrent calls for the
 * same key can both miss and both insert, or overwrite each other's update.
 */
export async function upsertByNaturalKey(
  client: RowStoreClient,
  table: string,
  naturalKey: EqualityFilter[],
  payload: Row,
  options: CallOptions = {}
): Promise<UpsertResult> {
  const existing = await fetchFirst(client, table, naturalKey, options);

  if (existing) {
    const id = extractId(existing);
    await client.update(table, id, payload, options);
    return { row: await fetchById(client, table, id, options), outcome: "updated" };
  }

  return { row: await insertAndFetch(client, table, payload, options), outcome: "inserted" };
}
