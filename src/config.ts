import { HashingEmbedder, MIN_EMBED_DIMENSIONS, OllamaEmbedder, type Embedder } from "./embedder.js";
import { ConfigError } from "./errors.js";
import { ExtractiveGenerator, OllamaGenerator, RemoteGenerator, type Generator } from "./generator.js";
import { parseLogLevel, type LogLevel } from "./logger.js";
import type { FetchLike } from "./ollama.js";

export type EmbedderKind = "hashing" | "ollama";
export type GeneratorKind = "extractive" | "ollama" | "remote";

export interface AppConfig {
  port: number;
  chunkSize: number;
  chunkOverlap: number;
  topK: number;
  maxContextChars: number;
  embedder: EmbedderKind;
  embedModel: string;
  embedDimensions: number;
  generator: GeneratorKind;
  generateModel: string;
  ollamaUrl: string;
  answerApiUrl?: string;
  answerApiKey?: string;
  embedTimeoutMs: number;
  generationTimeoutMs: number;
  downloadTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 8000,
  chunkSize: 1000,
  chunkOverlap: 200,
  topK: 1,
  maxContextChars: 4000,
  embedder: "hashing",
  embedModel: "nomic-embed-text",
  embedDimensions: 512,
  generator: "extractive",
  generateModel: "qwen3:8b",
  ollamaUrl: "http://127.0.0.1:11434",
  embedTimeoutMs: 30_000,
  generationTimeoutMs: 60_000,
  downloadTimeoutMs: 10_000,
  logLevel: "info"
};

export function parseInteger(value: string, flag: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || String(parsed) !== value.trim()) {
    throw new ConfigError(`${flag} must be an integer`);
  }
  return parsed;
}

export function parseEmbedderKind(value: string): EmbedderKind {
  if (value === "hashing" || value === "ollama") {
    return value;
  }
  throw new ConfigError("embedder must be one of: hashing, ollama");
}

export function parseGeneratorKind(value: string): GeneratorKind {
  if (value === "extractive" || value === "ollama" || value === "remote") {
    return value;
  }
  throw new ConfigError("generator must be one of: extractive, ollama, remote");
}

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number): number {
  const value = env[key];
  return value === undefined || value === "" ? fallback : parseInteger(value, key);
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function validateConfig(config: AppConfig): AppConfig {
  if (config.chunkSize < 1) {
    throw new ConfigError("chunk size must be at least 1");
  }
  if (config.chunkOverlap < 0 || config.chunkOverlap >= config.chunkSize) {
    throw new ConfigError("chunk overlap must be between 0 and chunk size - 1");
  }
  if (config.topK < 1) {
    throw new ConfigError("top-k must be at least 1");
  }
  if (config.maxContextChars < 1) {
    throw new ConfigError("max context chars must be at least 1");
  }
  if (config.embedDimensions < MIN_EMBED_DIMENSIONS) {
    throw new ConfigError(`embedding dimensions must be at least ${MIN_EMBED_DIMENSIONS}`);
  }
  for (const [name, value] of [
    ["embedding timeout", config.embedTimeoutMs],
    ["generation timeout", config.generationTimeoutMs],
    ["download timeout", config.downloadTimeoutMs]
  ] as const) {
    if (value < 1) {
      throw new ConfigError(`${name} must be at least 1ms`);
    }
  }
  if (config.port < 0 || config.port > 65535) {
    throw new ConfigError("port must be between 0 and 65535");
  }
  if (config.generator === "remote" && !config.answerApiUrl) {
    throw new ConfigError("ANSWER_API_URL is required for the remote generator");
  }
  return config;
}

export function loadConfig(env: Env = process.env, overrides: Partial<AppConfig> = {}): AppConfig {
  const fromEnv: AppConfig = {
    port: readInteger(env, "DOC_QA_PORT", DEFAULT_CONFIG.port),
    chunkSize: readInteger(env, "DOC_QA_CHUNK_SIZE", DEFAULT_CONFIG.chunkSize),
    chunkOverlap: readInteger(env, "DOC_QA_CHUNK_OVERLAP", DEFAULT_CONFIG.chunkOverlap),
    topK: readInteger(env, "DOC_QA_TOP_K", DEFAULT_CONFIG.topK),
    maxContextChars: readInteger(env, "DOC_QA_MAX_CONTEXT_CHARS", DEFAULT_CONFIG.maxContextChars),
    embedder: parseEmbedderKind(readString(env, "DOC_QA_EMBEDDER") ?? DEFAULT_CONFIG.embedder),
    embedModel: readString(env, "DOC_QA_EMBED_MODEL") ?? DEFAULT_CONFIG.embedModel,
    embedDimensions: readInteger(env, "DOC_QA_EMBED_DIMENSIONS", DEFAULT_CONFIG.embedDimensions),
    generator: parseGeneratorKind(readString(env, "DOC_QA_GENERATOR") ?? DEFAULT_CONFIG.generator),
    generateModel: readString(env, "DOC_QA_GENERATE_MODEL") ?? DEFAULT_CONFIG.generateModel,
    ollamaUrl: readString(env, "OLLAMA_BASE_URL") ?? DEFAULT_CONFIG.ollamaUrl,
    answerApiUrl: readString(env, "ANSWER_API_URL"),
    answerApiKey: readString(env, "ANSWER_API_KEY"),
    embedTimeoutMs: readInteger(env, "DOC_QA_EMBED_TIMEOUT_MS", DEFAULT_CONFIG.embedTimeoutMs),
    generationTimeoutMs: readInteger(env, "DOC_QA_GENERATION_TIMEOUT_MS", DEFAULT_CONFIG.generationTimeoutMs),
    downloadTimeoutMs: readInteger(env, "DOC_QA_DOWNLOAD_TIMEOUT_MS", DEFAULT_CONFIG.downloadTimeoutMs),
    logLevel: parseLogLevel(readString(env, "DOC_QA_LOG_LEVEL") ?? DEFAULT_CONFIG.logLevel)
  };

  const merged: AppConfig = { ...fromEnv };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return validateConfig(merged);
}

export function createEmbedder(config: AppConfig, fetchImpl?: FetchLike): Embedder {
  if (config.embedder === "ollama") {
    return new OllamaEmbedder({
      baseUrl: config.ollamaUrl,
      model: config.embedModel,
      timeoutMs: config.embedTimeoutMs,
      fetch: fetchImpl
    });
  }
  return new HashingEmbedder(config.embedDimensions);
}

export function createGenerator(config: AppConfig, fetchImpl?: FetchLike): Generator {
  switch (config.generator) {
    case "ollama":
      return new OllamaGenerator({
        baseUrl: config.ollamaUrl,
        model: config.generateModel,
        timeoutMs: config.generationTimeoutMs,
        fetch: fetchImpl
      });
    case "remote":
      if (!config.answerApiUrl) {
        throw new ConfigError("ANSWER_API_URL is required for the remote generator");
      }
      return new RemoteGenerator({
        baseUrl: config.answerApiUrl,
        apiKey: config.answerApiKey,
        timeoutMs: config.generationTimeoutMs,
        fetch: fetchImpl
      });
    case "extractive":
      return new ExtractiveGenerator();
  }
}
