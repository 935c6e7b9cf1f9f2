import { describe, expect, it } from "vitest";
import {
  CreateTransactionInputZ,
  ListAccountsInputZ,
  SearchSimilarInputZ,
  ToolNames,
  ToolSchemas,
  UpsertAccountInputZ,
  UpsertCategoryInputZ,
  UpsertCategoryOutputZ,
} from "../src";

describe("shared schemas", () => {
  it("registers input and output schemas for every tool", () => {
    expect(Object.keys(ToolSchemas).sort()).toEqual(Object.values(ToolNames).sort());
  });

  it("accepts a minimal transaction and maps null optionals to undefined", () => {
    const parsed = CreateTransactionInputZ.parse({
      account_id: "acct-1",
      amount: -12.5,
      currency: "USD",
      direction: "expense",
      occurred_at: "2024-03-01T09:30:00Z",
      description: null,
    });

    expect(parsed).toEqual({
      account_id: "acct-1",
      amount: -12.5,
      currency: "USD",
      direction: "expense",
      occurred_at: "2024-03-01T09:30:00Z",
      description: undefined,
      raw_source: undefined,
    });
  });

  it("rejects a transaction without an amount", () => {
    const result = CreateTransactionInputZ.safeParse({
      account_id: "acct-1",
      currency: "USD",
      direction: "expense",
      occurred_at: "2024-03-01T09:30:00Z",
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues[0].path).toEqual(["amount"]);
  });

  it("rejects unknown directions and account types", () => {
    expect(
      CreateTransactionInputZ.safeParse({
        account_id: "a",
        amount: 1,
        currency: "USD",
        direction: "refund",
        occurred_at: "2024-03-01",
      }).success
    ).toBe(false);
    expect(UpsertAccountInputZ.safeParse({ name: "Wallet", type: "savings", currency: "ETH" }).success).toBe(
      false
    );
  });

  it("leaves blank queries to the handlers", () => {
    expect(SearchSimilarInputZ.parse({ query: "   " })).toEqual({ query: "   ", limit: undefined });
  });

  it("requires an integer limit when one is given", () => {
    expect(SearchSimilarInputZ.safeParse({ query: "coffee", limit: 2.5 }).success).toBe(false);
    expect(SearchSimilarInputZ.parse({ query: "coffee", limit: null }).limit).toBeUndefined();
  });

  it("accepts an empty list_accounts payload", () => {
    expect(ListAccountsInputZ.parse({})).toEqual({ type: undefined, search: undefined });
  });

  it("requires a category name", () => {
    expect(UpsertCategoryInputZ.safeParse({ name: "" }).success).toBe(false);
  });

  it("requires an id on persisted rows", () => {
    expect(UpsertCategoryOutputZ.safeParse({ category: { name: "Food" } }).success).toBe(false);
    expect(UpsertCategoryOutputZ.safeParse({ category: { id: 3, name: "Food" } }).success).toBe(true);
  });
});
