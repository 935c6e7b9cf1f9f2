/**
 * Row store access for the gateway. The tables and the two similarity
 * functions these modules call are defined in `sql/001_schema.sql`.
 */
export * from "./db/client";
export * from "./db/errors";
export * from "./db/rows";
export * from "./repos/accounts";
export * from "./repos/categories";
export * from "./repos/transactions";
export * from "./search/filters";
export * from "./search/semantic";
export * from "./store";
