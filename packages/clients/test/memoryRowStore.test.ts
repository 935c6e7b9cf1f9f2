import { describe, expect, it } from "vitest";
import { MemoryRowStoreClient, cosineDistance } from "../src/memoryRowStore";
import { RowStoreError } from "../src/rowStore";

function sequentialIds() {
  let next = 0;
  return () => {
    next += 1;
    return `row-${next}`;
  };
}

describe("cosineDistance", () => {
  it("is zero for parallel vectors and one for orthogonal ones", () => {
    expect(cosineDistance([1, 0], [2, 0])).toBe(0);
    expect(cosineDistance([1, 0], [0, 3])).toBe(1);
  });

  it("treats zero vectors as maximally distant", () => {
    expect(cosineDistance([0, 0], [1, 1])).toBe(1);
  });
});

describe("MemoryRowStoreClient", () => {
  it("assigns ids on insert and returns copies on select", async () => {
    const client = new MemoryRowStoreClient({ generateId: sequentialIds() });

    const id = await client.insert("categories", { name: "Food" });
    const rows = await client.select("categories");
    rows[0].name = "mutated";

    expect(id).toBe("row-1");
    expect(client.rows("categories")).toEqual([{ id: "row-1", name: "Food" }]);
  });

  it("applies equality filters, ordering and limit", async () => {
    const client = new MemoryRowStoreClient();
    client.seed("accounts", [
      { id: "1", name: "Zeta", type: "offchain" },
      { id: "2", name: "Alpha", type: "onchain" },
      { id: "3", name: "Beta", type: "offchain" },
    ]);

    const offchain = await client.select("accounts", {
      filters: [{ column: "type", value: "offchain" }],
      order: { column: "name", ascending: true },
    });
    const firstDescending = await client.select("accounts", {
      order: { column: "name", ascending: false },
      limit: 1,
    });

    expect(offchain.map((row) => row.name)).toEqual(["Beta", "Zeta"]);
    expect(firstDescending.map((row) => row.name)).toEqual(["Zeta"]);
  });

  it("merges updates into the existing row and keeps its id", async () => {
    const client = new MemoryRowStoreClient();
    client.seed("categories", [{ id: "c1", name: "Food", description: "Food" }]);

    await client.update("categories", "c1", { name: "Food", description: "Groceries", id: "other" });

    expect(client.rows("categories")).toEqual([{ id: "c1", name: "Food", description: "Groceries" }]);
  });

  it("records every call in order", async () => {
    const client = new MemoryRowStoreClient({ generateId: sequentialIds() });

    await client.select("accounts", { limit: 1 });
    await client.insert("accounts", { name: "Checking" });
    await client.update("accounts", "row-1", { currency: "USD" });

    expect(client.calls.map((call) => call.op)).toEqual(["select", "insert", "update"]);
    expect(client.callsOf("insert")).toEqual([
      { op: "insert", table: "accounts", payload: { name: "Checking" } },
    ]);
  });

  it("ranks rows by cosine distance and drops the embedding column", async () => {
    const client = new MemoryRowStoreClient();
    client.seed("transactions", [
      { id: "far", description: "Rent", embedding: [0, 1] },
      { id: "near", description: "Coffee", embedding: [1, 0] },
      { id: "none", description: "Cash", embedding: null },
    ]);

    const rows = await client.rpc("search_similar_transactions", {
      query_embedding: [1, 0],
      match_count: 5,
    });

    expect(rows).toEqual([
      { id: "near", description: "Coffee", distance: 0 },
      { id: "far", description: "Rent", distance: 1 },
    ]);
  });

  it("honours match_count", async () => {
    const client = new MemoryRowStoreClient();
    client.seed("categories", [
      { id: "a", embedding: [1, 0] },
      { id: "b", embedding: [1, 1] },
    ]);

    const rows = await client.rpc("search_similar_categories", { query_embedding: [1, 0], match_count: 1 });

    expect(rows.map((row) => row.id)).toEqual(["a"]);
  });

  it("fails unknown functions like the REST backend does", async () => {
    const client = new MemoryRowStoreClient();

    const error = await client.rpc("missing_fn", {}).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RowStoreError);
    expect(error).toMatchObject({ message: "RPC missing_fn failed (404): function not found", status: 404 });
  });

  it("rejects calls whose signal is aborted", async () => {
    const client = new MemoryRowStoreClient();
    const controller = new AbortController();
    controller.abort();

    await expect(client.select("accounts", { signal: controller.signal })).rejects.toThrow();
    expect(client.calls).toEqual([]);
  });
});
