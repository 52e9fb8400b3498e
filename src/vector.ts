import { normalizeVector } from "./embedder.js";
import { EmbeddingError, NotIngestedError } from "./errors.js";
import type { IndexEntry, Passage, RetrievalResult, Vector } from "./types.js";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) {
    return 0;
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i += 1) {
    const ai = a[i] ?? 0;
    const bi = b[i] ?? 0;
    dot += ai * bi;
    normA += ai * ai;
    normB += bi * bi;
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Immutable flat index scored by cosine similarity. Stored vectors are
 * L2-normalised on the way in.
 */
export class VectorIndex {
  private constructor(
    private readonly entries: readonly IndexEntry[],
    readonly dimensions: number
  ) {}

  static build(entries: IndexEntry[]): VectorIndex {
    const first = entries[0];
    if (!first) {
      throw new EmbeddingError("Cannot build an index without entries");
    }

    const dimensions = first.vector.length;
    const stored = entries.map((entry) => {
      if (entry.vector.length !== dimensions) {
        throw new EmbeddingError(
          `Passage ${entry.passage.id} has ${entry.vector.length} dimensions, expected ${dimensions}`
        );
      }
      return Object.freeze({
        passage: Object.freeze({ ...entry.passage }),
        vector: normalizeVector(entry.vector)
      });
    });

    return new VectorIndex(Object.freeze(stored), dimensions);
  }

  get size(): number {
    return this.entries.length;
  }

  passages(): Passage[] {
    return this.entries.map((entry) => entry.passage);
  }

  search(queryVector: Vector, k: number): RetrievalResult[] {
    if (queryVector.length !== this.dimensions) {
      throw new EmbeddingError(`Query has ${queryVector.length} dimensions, index expects ${this.dimensions}`);
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new RangeError("k must be a positive integer");
    }

    const results = this.entries.map((entry) => ({
      passage: entry.passage,
      score: cosineSimilarity(queryVector, entry.vector)
    }));

    results.sort((a, b) => b.score - a.score || a.passage.id - b.passage.id);
    return results.slice(0, k);
  }
}

export function retrieveTopK(index: VectorIndex | null | undefined, queryVector: Vector, k: number): RetrievalResult[] {
  if (!index) {
    throw new NotIngestedError();
  }
  return index.search(queryVector, k);
}
