export * from "./embedder.js";
export * from "./ollama.js";
