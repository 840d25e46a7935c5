export * from "./rrf.js";
export * from "./retriever.js";
