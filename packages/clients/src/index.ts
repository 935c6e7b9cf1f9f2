export * from "./createEmbedder";
export * from "./embedder";
export * from "./memoryRowStore";
export * from "./openaiCompat";
export * from "./rowStore";
export * from "./transport";
