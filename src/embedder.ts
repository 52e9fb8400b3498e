import { abortReason, timeoutScope } from "./abort.js";
import { EmbeddingError, toDocQaError } from "./errors.js";
import { sha256 } from "./hash.js";
import { OllamaClient, type FetchLike } from "./ollama.js";
import type { Vector } from "./types.js";

/**
 * Maps passages and queries into one vector space. Implementations must be
 * deterministic for a fixed configuration and must reject blank input.
 */
export interface Embedder {
  readonly model: string;
  embed(text: string): Promise<Vector>;
  embedMany(texts: string[]): Promise<Vector[]>;
}

function assertEmbeddable(text: string): void {
  if (text.trim().length === 0) {
    throw new EmbeddingError("Cannot embed empty text");
  }
}

function assertVector(vector: Vector, dimensions?: number): void {
  if (vector.length === 0 || !vector.every((value) => Number.isFinite(value))) {
    throw new EmbeddingError("Embedding backend returned an invalid vector");
  }
  if (dimensions !== undefined && vector.length !== dimensions) {
    throw new EmbeddingError(`Embedding has ${vector.length} dimensions, expected ${dimensions}`);
  }
}

export const MIN_EMBED_DIMENSIONS = 8;

export function normalizeVector(vector: Vector): Vector {
  let norm = 0;
  for (const value of vector) {
    norm += value * value;
  }
  if (norm === 0) {
    return vector.map(() => 0);
  }
  const length = Math.sqrt(norm);
  return vector.map((value) => value / length);
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * In-process embedder using signed feature hashing over word unigrams and
 * bigrams. Needs no model download; similarity reflects shared vocabulary.
 */
export class HashingEmbedder implements Embedder {
  readonly model: string;

  constructor(readonly dimensions = 512) {
    if (!Number.isInteger(dimensions) || dimensions < MIN_EMBED_DIMENSIONS) {
      throw new RangeError(`dimensions must be an integer >= ${MIN_EMBED_DIMENSIONS}`);
    }
    this.model = `hashing-${dimensions}`;
  }

  async embed(text: string): Promise<Vector> {
    assertEmbeddable(text);
    const tokens = tokenize(text);
    if (tokens.length === 0) {
      throw new EmbeddingError("Text contains no embeddable tokens");
    }

    const vector = new Array<number>(this.dimensions).fill(0);
    const features = [...tokens];
    for (let i = 1; i < tokens.length; i += 1) {
      features.push(`${tokens[i - 1]} ${tokens[i]}`);
    }

    for (const feature of features) {
      const digest = sha256(feature);
      const bucket = Number.parseInt(digest.slice(0, 8), 16) % this.dimensions;
      const sign = Number.parseInt(digest.slice(8, 9), 16) < 8 ? 1 : -1;
      // Bigrams weigh half as much as the words they join.
      const weight = feature.includes(" ") ? 0.5 : 1;
      vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
    }

    return normalizeVector(vector);
  }

  async embedMany(texts: string[]): Promise<Vector[]> {
    const vectors: Vector[] = [];
    for (const text of texts) {
      vectors.push(await this.embed(text));
    }
    return vectors;
  }
}

export interface OllamaEmbedderOptions {
  baseUrl: string;
  model: string;
  batchSize?: number;
  /** Bound on each embedding call; retrieval holds the session's shared lock meanwhile. */
  timeoutMs?: number;
  fetch?: FetchLike;
}

export const DEFAULT_EMBED_TIMEOUT_MS = 30_000;

export class OllamaEmbedder implements Embedder {
  readonly model: string;
  private readonly client: OllamaClient;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private dimensions?: number;

  constructor(options: OllamaEmbedderOptions) {
    this.model = options.model;
    this.batchSize = options.batchSize ?? 16;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_EMBED_TIMEOUT_MS;
    this.client = new OllamaClient({ baseUrl: options.baseUrl, fetch: options.fetch });
  }

  private accept(vector: Vector): Vector {
    assertVector(vector, this.dimensions);
    this.dimensions ??= vector.length;
    return normalizeVector(vector);
  }

  private async request(texts: string[]): Promise<Vector[]> {
    const timeoutMs = this.timeoutMs;
    const scope = timeoutScope(timeoutMs, () => new EmbeddingError(`Embedding timed out after ${timeoutMs}ms`));
    try {
      return await this.client.embed(this.model, texts, { batchSize: this.batchSize, signal: scope.signal });
    } catch (error) {
      throw toDocQaError(abortReason(scope.signal, error), (message, cause) => new EmbeddingError(message, { cause }));
    } finally {
      scope.dispose();
    }
  }

  async embed(text: string): Promise<Vector> {
    assertEmbeddable(text);
    const [vector] = await this.request([text]);
    if (!vector) {
      throw new EmbeddingError("Embedding backend returned no vector");
    }
    return this.accept(vector);
  }

  async embedMany(texts: string[]): Promise<Vector[]> {
    texts.forEach(assertEmbeddable);
    if (texts.length === 0) {
      return [];
    }
    const vectors = await this.request(texts);
    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Embedding count mismatch: expected ${texts.length} embeddings, received ${vectors.length}`
      );
    }
    return vectors.map((vector) => this.accept(vector));
  }
}
