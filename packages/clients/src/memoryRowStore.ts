import crypto from "node:crypto";
import type { Row } from "@tally/shared";
import {
  RowStoreError,
  type CallOptions,
  type RowStoreClient,
  type SelectOptions,
} from "./rowStore";

export type RpcFunction = (
  tables: ReadonlyMap<string, readonly Row[]>,
  body: Record<string, unknown>
) => Row[];

export type RowStoreCall =
  | { op: "select"; table: string; options: Omit<SelectOptions, "signal"> }
  | { op: "insert"; table: string; payload: Row }
  | { op: "update"; table: string; id: string; payload: Row }
  | { op: "rpc"; fn: string; body: Record<string, unknown> };

export type MemoryRowStoreOptions = {
  functions?: Record<string, RpcFunction>;
  generateId?: () => string;
};

function readVector(value: unknown): number[] | null {
  if (!Array.isArray(value)) return null;
  const vector: number[] = [];
  for (const entry of value) {
    if (typeof entry !== "number") return null;
    vector.push(entry);
  }
  return vector;
}

export function cosineDistance(a: number[], b: number[]): number {
  const size = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < size; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / Math.sqrt(normA * normB);
}

/**
 * Nearest-neighbour search over the `embedding` column of a table, mirroring
 * the stored functions in packages/core/sql. Rows without an embedding are skipped.
 */
export function vectorSearchFunction(table: string): RpcFunction {
  return (tables, body) => {
    const query = readVector(body.query_embedding);
    if (!query) {
      throw new RowStoreError("query_embedding must be a numeric array", { status: 400 });
    }
    const matchCount = typeof body.match_count === "number" ? body.match_count : 5;

    const scored: Array<{ row: Row; distance: number }> = [];
    for (const row of tables.get(table) ?? []) {
      const embedding = readVector(row.embedding);
      if (!embedding) continue;
      scored.push({ row, distance: cosineDistance(embedding, query) });
    }

    return scored
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.max(0, matchCount))
      .map(({ row, distance }) => {
        const { embedding: _embedding, ...rest } = row;
        return { ...rest, distance };
      });
  };
}

export const DEFAULT_RPC_FUNCTIONS: Record<string, RpcFunction> = {
  search_similar_transactions: vectorSearchFunction("transactions"),
  search_similar_categories: vectorSearchFunction("categories"),
};

function compareValues(a: unknown, b: unknown): number {
  const left = a === null || a === undefined ? "" : String(a);
  const right = b === null || b === undefined ? "" : String(b);
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * In-process row store with the same primitives as the REST client.
 * Backs local development runs (`DATABASE_URL=memory://`) and tests.
 */
export class MemoryRowStoreClient implements RowStoreClient {
  private readonly tables = new Map<string, Row[]>();
  private readonly functions: Map<string, RpcFunction>;
  private readonly generateId: () => string;
  public readonly calls: RowStoreCall[] = [];

  constructor(options: MemoryRowStoreOptions = {}) {
    this.functions = new Map(Object.entries(options.functions ?? DEFAULT_RPC_FUNCTIONS));
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  seed(table: string, rows: Row[]): void {
    const existing = this.tables.get(table) ?? [];
    this.tables.set(table, [...existing, ...rows.map((row) => ({ ...row }))]);
  }

  rows(table: string): Row[] {
    return (this.tables.get(table) ?? []).map((row) => ({ ...row }));
  }

  callsOf<TOp extends RowStoreCall["op"]>(op: TOp): Array<Extract<RowStoreCall, { op: TOp }>> {
    return this.calls.filter((call): call is Extract<RowStoreCall, { op: TOp }> => call.op === op);
  }

  async select(table: string, options: SelectOptions = {}): Promise<Row[]> {
    options.signal?.throwIfAborted();
    const { signal: _signal, ...recorded } = options;
    this.calls.push({ op: "select", table, options: recorded });

    let rows = (this.tables.get(table) ?? []).filter((row) =>
      (options.filters ?? []).every((filter) => {
        const value = row[filter.column];
        return value !== null && value !== undefined && String(value) === filter.value;
      })
    );

    const order = options.order;
    if (order) {
      rows = [...rows].sort((a, b) => {
        const result = compareValues(a[order.column], b[order.column]);
        return order.ascending ? result : -result;
      });
    }
    if (options.limit !== undefined) {
      rows = rows.slice(0, options.limit);
    }
    return rows.map((row) => ({ ...row }));
  }

  async insert(table: string, payload: Row, options: CallOptions = {}): Promise<string> {
    options.signal?.throwIfAborted();
    this.calls.push({ op: "insert", table, payload: { ...payload } });

    const id = this.generateId();
    const rows = this.tables.get(table) ?? [];
    rows.push({ id, ...payload });
    this.tables.set(table, rows);
    return id;
  }

  async update(table: string, id: string, payload: Row, options: CallOptions = {}): Promise<void> {
    options.signal?.throwIfAborted();
    this.calls.push({ op: "update", table, id, payload: { ...payload } });

    const rows = this.tables.get(table) ?? [];
    const index = rows.findIndex((row) => String(row.id) === id);
    // Matching nothing is not an error, same as a PATCH with an empty result.
    if (index === -1) return;
    rows[index] = { ...rows[index], ...payload, id: rows[index].id };
  }

  async rpc(fn: string, body: Record<string, unknown>, options: CallOptions = {}): Promise<Row[]> {
    options.signal?.throwIfAborted();
    this.calls.push({ op: "rpc", fn, body: { ...body } });

    const impl = this.functions.get(fn);
    if (!impl) {
      throw new RowStoreError(`RPC ${fn} failed (404): function not found`, { status: 404 });
    }
    return impl(this.tables, body);
  }
}
