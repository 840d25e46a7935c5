export * from "./capabilities.js";
export * from "./ocrPolicy.js";
export * from "./cache.js";
export * from "./extractor.js";
export * from "./summary.js";
export * from "./pdfjsReader.js";
export * from "./tesseractOcr.js";
