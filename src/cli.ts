#!/usr/bin/env node
import "dotenv/config";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { Command } from "commander";
import {
  createEmbedder,
  createGenerator,
  loadConfig,
  parseEmbedderKind,
  parseGeneratorKind,
  parseInteger,
  type AppConfig
} from "./config.js";
import { ConsoleLogger, parseLogLevel, type Logger } from "./logger.js";
import { formatStatus, Pipeline } from "./pipeline.js";
import { createHandler, createServer } from "./server.js";
import type { IngestSource } from "./types.js";

const program = new Command();

interface SharedOptions {
  chunkSize?: number;
  chunkOverlap?: number;
  topK?: number;
  maxContextChars?: number;
  embedder?: AppConfig["embedder"];
  embedModel?: string;
  generator?: AppConfig["generator"];
  generateModel?: string;
  ollamaUrl?: string;
  logLevel?: AppConfig["logLevel"];
}

function withSharedOptions(command: Command): Command {
  return command
    .option("--chunk-size <chars>", "passage size in characters", (v) => parseInteger(v, "--chunk-size"))
    .option("--chunk-overlap <chars>", "characters shared by consecutive passages", (v) =>
      parseInteger(v, "--chunk-overlap")
    )
    .option("--top-k <count>", "passages retrieved per question", (v) => parseInteger(v, "--top-k"))
    .option("--max-context-chars <count>", "passage characters allowed in a prompt", (v) =>
      parseInteger(v, "--max-context-chars")
    )
    .option("--embedder <kind>", "embedder: hashing or ollama", parseEmbedderKind)
    .option("--embed-model <name>", "Ollama embedding model")
    .option("--generator <kind>", "generator: extractive, ollama or remote", parseGeneratorKind)
    .option("--generate-model <name>", "Ollama generation model")
    .option("--ollama-url <url>", "Ollama base URL")
    .option("--log-level <level>", "debug, info, warn or error", parseLogLevel);
}

function createPipeline(options: SharedOptions, extra: Partial<AppConfig> = {}): {
  config: AppConfig;
  logger: Logger;
  pipeline: Pipeline;
} {
  const config = loadConfig(process.env, { ...options, ...extra });
  const logger = new ConsoleLogger(config.logLevel);
  const pipeline = new Pipeline(
    {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
      topK: config.topK,
      maxContextChars: config.maxContextChars,
      downloadTimeoutMs: config.downloadTimeoutMs
    },
    {
      embedder: createEmbedder(config),
      generator: createGenerator(config),
      logger
    }
  );
  return { config, logger, pipeline };
}

async function loadSources(files: string[], urls: string[]): Promise<IngestSource[]> {
  const sources: IngestSource[] = [];
  for (const file of files) {
    const absPath = path.resolve(file);
    sources.push({ kind: "file", name: path.basename(absPath), bytes: await readFile(absPath) });
  }
  for (const url of urls) {
    sources.push({ kind: "url", url });
  }
  return sources;
}

function collect(value: string, current: string[]): string[] {
  return [...current, value];
}

program
  .name("doc-qa")
  .description("Answer questions about PDF and text documents with retrieval-augmented generation")
  .version("0.1.0");

withSharedOptions(
  program
    .command("serve")
    .description("Start the HTTP API")
    .option("--port <port>", "port to listen on", (v) => parseInteger(v, "--port"))
).action((options: SharedOptions & { port?: number }) => {
  const { port, ...shared } = options;
  const { config, logger, pipeline } = createPipeline(shared, port === undefined ? {} : { port });
  const server = createServer(createHandler({ pipeline, logger }), logger);
  server.listen(config.port, () => {
    logger.info(`Listening on http://localhost:${config.port}`, {
      embedder: config.embedder,
      generator: config.generator,
      topK: config.topK
    });
  });
});

withSharedOptions(
  program
    .command("ask")
    .description("Ingest documents and answer one question")
    .argument("[files...]", "PDF or text files to ingest")
    .requiredOption("--question <text>", "question to answer")
    .option("--url <url>", "document URL to ingest (repeatable)", collect, [] as string[])
    .option("--show-sources", "print the passages the answer is based on", false)
).action(async (files: string[], options: SharedOptions & { question: string; url: string[]; showSources: boolean }) => {
  const { question, url, showSources, ...shared } = options;
  const { pipeline } = createPipeline(shared);
  const status = await pipeline.ingest(await loadSources(files, url));
  console.log(formatStatus(status));
  if (!status.ok) {
    process.exitCode = 1;
    return;
  }

  const answer = await pipeline.answer(question);
  console.log(`\n${answer.text}`);

  if (showSources) {
    console.log("\nSources:");
    for (const item of answer.supportingPassages) {
      console.log(`- ${item.passage.sourceDocument}@${item.passage.offset} (score=${item.score.toFixed(4)})`);
    }
  }
});

withSharedOptions(
  program
    .command("search")
    .description("Debug retrieval: print the passages closest to a query")
    .argument("[files...]", "PDF or text files to ingest")
    .requiredOption("--query <text>", "search query")
    .option("--url <url>", "document URL to ingest (repeatable)", collect, [] as string[])
).action(async (files: string[], options: SharedOptions & { query: string; url: string[] }) => {
  const { query, url, ...shared } = options;
  const { config, pipeline } = createPipeline(shared);
  const status = await pipeline.ingest(await loadSources(files, url));
  if (!status.ok) {
    console.log(formatStatus(status));
    process.exitCode = 1;
    return;
  }

  const results = await pipeline.search(query, config.topK);
  for (const item of results) {
    const preview = item.passage.text.replace(/\s+/g, " ").slice(0, 180);
    console.log(`${item.score.toFixed(4)}  ${item.passage.sourceDocument}@${item.passage.offset}\n${preview}\n`);
  }
});

program.parseAsync(process.argv).catch((error) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exit(1);
});
