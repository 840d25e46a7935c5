import { parseQueryContext } from "@docqa/answer";
import { loadConfig } from "@docqa/core";
import { getArg, getArgNumber, truncateText, parseMode } from "./args.js";
import { createLogger, createQueryPipeline, openIndex } from "./runtime.js";

const config = loadConfig();
const q = getArg("q");
const collection = getArg("collection") ?? config.collection;
const dbPath = getArg("db") ?? config.dbPath;

if (!q) {
  console.error(
    "Usage: npm run query -- --q <question> [--mode hybrid|keyword|vector] [--size 5] [--k 60] [--collection <id>] [--db <sqlitePath>]"
  );
  process.exit(1);
}

const context = parseQueryContext({
  question: q,
  mode: parseMode(getArg("mode")),
  size: getArgNumber("size", 5),
  k: getArgNumber("k", config.retrieval.rrfK),
  useLlm: false,
});

const logger = createLogger(config, "query");
logger.info("start", { collection, dbPath, mode: context.mode, size: context.size, k: context.k });

const index = await openIndex(dbPath);
try {
  const { retriever } = createQueryPipeline(config, index, collection, logger);
  const { results, degraded } = await retriever.retrieve(context);

  for (const d of degraded) logger.warn("search degraded", d);
  logger.info("results", { count: results.length });

  for (const r of results) {
    console.log("—".repeat(80));
    console.log(`score: ${r.score.toFixed(4)}  match: ${r.matchType}  ranks: ${JSON.stringify(r.ranks)}`);
    console.log(`source: ${r.filename}  pages: ${r.chunk.pages.map((p) => p + 1).join(", ")}`);
    console.log("");
    console.log(truncateText(r.chunk.text, 600));
  }

  console.log("—".repeat(80));
} finally {
  await index.close();
}
