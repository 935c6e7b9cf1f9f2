import { MemoryRowStoreClient } from "@tally/clients";
import { describe, expect, it } from "vitest";
import { buildTransactionPayload, insertTransaction } from "../../src/repos/transactions";

const input = {
  account_id: "acct-1",
  amount: 42,
  currency: "USD",
  direction: "expense" as const,
  occurred_at: "2024-03-01T09:30:00Z",
};

describe("buildTransactionPayload", () => {
  it("persists absent optionals as null", () => {
    expect(buildTransactionPayload(input, null)).toEqual({
      ...input,
      description: null,
      raw_source: null,
      embedding: null,
    });
  });
});

describe("insertTransaction", () => {
  it("always inserts, even for identical payloads", async () => {
    const client = new MemoryRowStoreClient();
    const withDescription = { ...input, description: "Coffee", raw_source: "card ****" };

    const first = await insertTransaction(client, withDescription, [0.5]);
    const second = await insertTransaction(client, withDescription, [0.5]);

    expect(first.id).not.toBe(second.id);
    expect(first).toMatchObject({ description: "Coffee", raw_source: "card ****", embedding: [0.5] });
    expect(client.callsOf("insert")).toHaveLength(2);
    expect(client.callsOf("update")).toEqual([]);
  });
});
