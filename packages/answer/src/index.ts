export * from "./context.js";
export * from "./prompt.js";
export * from "./languageModel.js";
export * from "./generation.js";
export * from "./synthesizer.js";
export * from "./answerQuestion.js";
