import { answerQuestion } from "@docqa/answer";
import { loadConfig } from "@docqa/core";
import { getArg, getArgNumber, hasFlag, truncateText, parseMode } from "./args.js";
import { createLogger, createQueryPipeline, openIndex } from "./runtime.js";

const config = loadConfig();
const q = getArg("q");
const collection = getArg("collection") ?? config.collection;
const dbPath = getArg("db") ?? config.dbPath;
const debug = hasFlag("debug");

if (!q) {
  console.error(`Usage:
npm run ask -- --q "..." \\
  [--mode hybrid|keyword|vector] \\
  [--size 5] \\
  [--k 60] \\
  [--collection <id>] \\
  [--db .data/docqa.sqlite] \\
  [--no-llm] \\
  [--debug]`);
  process.exit(1);
}

const logger = createLogger(config, "ask");
const index = await openIndex(dbPath);

try {
  const pipeline = createQueryPipeline(config, index, collection, logger);
  const result = await answerQuestion(pipeline, {
    question: q,
    mode: parseMode(getArg("mode")),
    size: getArgNumber("size", 5),
    k: getArgNumber("k", config.retrieval.rrfK),
    useLlm: !hasFlag("no-llm"),
  });

  if (debug) {
    console.log("\n=== RETRIEVED (debug) ===\n");
    result.results.forEach((r, i) => {
      console.log(`[${i + 1}] ${r.filename} (score=${r.score.toFixed(4)}, ${r.matchType})`);
      console.log(truncateText(r.chunk.text, 400));
    });
  }

  console.log("\n=== ANSWER ===\n");
  console.log(result.answer);

  console.log("\n=== SOURCES USED ===\n");
  result.citations.forEach((c, i) => console.log(`[${i + 1}] ${c}`));

  logger.info("done", {
    generationMethod: result.generationMethod,
    ...(result.fallbackReason && { fallbackReason: result.fallbackReason }),
    sourcesUsed: result.sourcesUsed,
    ...(result.degraded.length > 0 && { degraded: result.degraded }),
  });
} finally {
  await index.close();
}
