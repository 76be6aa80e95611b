import { Command, InvalidArgumentError } from "commander";
import type { AppConfig } from "../config";
import { loadConfigFromEnv, resolveChunkingConfig, resolveRetrievalConfig } from "../config";
import { FileIndexStore, createIndexStore } from "../db";
import { errorMessage, isRetrievalError } from "../errors";
import type { IEmbedder, IIndexStore } from "../interfaces";
import { KnowledgeBase } from "../KnowledgeBase";
import { OpenAIEmbedder } from "../modules/embedding";
import { IngestionPipeline } from "../modules/ingestion";
import { createLogger } from "../utils/logger";

const log = createLogger("cli");

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

export interface CliDependencies {
  loadConfig?: () => AppConfig;
  createEmbedder?: (config: AppConfig) => IEmbedder;
  print?: (line: string) => void;
}

interface IngestOptions {
  out?: string;
  chunkSize?: number;
  overlap?: number;
}

interface RetrieveOptions {
  index?: string;
  k?: number;
  method?: string;
}

function defaultEmbedder(config: AppConfig): IEmbedder {
  return new OpenAIEmbedder({
    apiKey: config.embedding?.apiKey,
    baseURL: config.embedding?.baseURL,
    models: config.models,
  });
}

function storeFor(config: AppConfig, dir?: string): IIndexStore {
  return dir ? new FileIndexStore(dir) : createIndexStore(config.storage);
}

function fail(error: unknown): never {
  const code = isRetrievalError(error) ? ` [${error.code}]` : "";
  log.error(`Command failed${code}: ${errorMessage(error)}`);
  process.exit(1);
}

export function createIngestCommand(deps: CliDependencies = {}): Command {
  const command = new Command("ingest");
  const print = deps.print ?? console.log;

  command
    .description("Build the retrieval index from PDF, text or markdown files")
    .argument("<files...>", "Documents to index")
    .option("-o, --out <dir>", "Write a file index to this directory")
    .option("--chunk-size <n>", "Characters per chunk", parseInteger)
    .option("--overlap <n>", "Characters shared by consecutive chunks", parseInteger)
    .action(async (files: string[], options: IngestOptions) => {
      try {
        const config = (deps.loadConfig ?? loadConfigFromEnv)();
        const chunking = resolveChunkingConfig({
          chunkSize: options.chunkSize ?? config.chunking?.chunkSize,
          chunkOverlap: options.overlap ?? config.chunking?.chunkOverlap,
          pageSeparator: config.chunking?.pageSeparator,
        });

        const pipeline = new IngestionPipeline({
          store: storeFor(config, options.out),
          embedder: (deps.createEmbedder ?? defaultEmbedder)(config),
          chunking,
          bm25: resolveRetrievalConfig(config.retrieval).bm25,
        });

        const result = await pipeline.ingestFiles(files, (progress) =>
          log.info(`[${progress.stage}] ${progress.message}`),
        );
        print(
          `Indexed ${result.chunkCount} chunks (${result.dimensions} dims, ${result.modelId}) from ${result.sources.join(", ")} into ${result.location} in ${result.processingTimeMs}ms`,
        );
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

export function createRetrieveCommand(deps: CliDependencies = {}): Command {
  const command = new Command("retrieve");
  const print = deps.print ?? console.log;

  command
    .description("Query the index and print the ranked passages")
    .argument("<query>", "Question to search for")
    .option("-i, --index <dir>", "Read a file index from this directory")
    .option("-k, --k <n>", "Number of results", parseInteger)
    .option("-m, --method <method>", "dense, sparse or hybrid")
    .action(async (query: string, options: RetrieveOptions) => {
      try {
        const config = (deps.loadConfig ?? loadConfigFromEnv)();
        const kb = await KnowledgeBase.open({
          store: storeFor(config, options.index),
          embedder: (deps.createEmbedder ?? defaultEmbedder)(config),
          retrieval: config.retrieval,
        });

        const results = await kb.retrieve(query, options.k, options.method);
        print(kb.selectContext(results) || "No results.");
        print(`\nSufficient: ${kb.isSufficient(results)}`);
      } catch (error) {
        fail(error);
      }
    });

  return command;
}

export function createProgram(deps: CliDependencies = {}): Command {
  return new Command("discharge-assist")
    .description("Hybrid retrieval knowledge base for post-discharge care")
    .version("1.0.0")
    .addCommand(createIngestCommand(deps))
    .addCommand(createRetrieveCommand(deps));
}
