export * from "./config";
export * from "./logger";
export * from "./schemas";
export * from "./tool-names";
