import { loadFolderDocuments, ingestDocuments } from "@docqa/ingestion";
import { loadConfig } from "@docqa/core";
import { getArg, getArgNumber } from "./args.js";
import { createEmbedder, createExtractor, createLogger, openIndex } from "./runtime.js";

const config = loadConfig();
const folderPath = getArg("folder");
const collection = getArg("collection") ?? config.collection;
const dbPath = getArg("db") ?? config.dbPath;
const concurrency = getArgNumber("concurrency", config.ingestConcurrency);

if (!folderPath) {
  console.error("Usage: npm run ingest -- --folder <path> [--collection <id>] [--db <sqlitePath>] [--concurrency 4]");
  process.exit(1);
}

const logger = createLogger(config, "ingest");
logger.info("start", { folderPath, collection, dbPath, concurrency });

const sources = await loadFolderDocuments({ folderPath });
logger.info("found documents", { count: sources.length });

const index = await openIndex(dbPath);
const { extractor, ocr } = createExtractor(config, logger);

try {
  const report = await ingestDocuments({
    sources,
    extractor,
    embedder: createEmbedder(config, logger),
    index,
    collection,
    chunking: config.chunking,
    concurrency,
    logger,
  });

  for (const file of report.files) {
    if (!file.success) logger.warn("skipped", { filename: file.filename, link: file.link, error: file.error });
  }
  logger.info("done", { ...report.totals, stats: await index.stats(collection) });
  if (report.totals.succeeded === 0 && report.totals.files > 0) process.exitCode = 1;
} finally {
  await ocr.terminate();
  await index.close();
}
