export * from "./ignore.js";
export * from "./folderLoader.js";
export * from "./textChunker.js";
export * from "./ingestDocuments.js";
