import { ReadWriteLock } from "./lock.js";
import type { CorpusInfo, SessionState } from "./types.js";
import type { VectorIndex } from "./vector.js";

export interface Corpus {
  index: VectorIndex;
  documents: string[];
  embeddingModel: string;
  ingestedAt: string;
}

/**
 * Holder of at most one corpus. Reads of the corpus happen under the shared
 * lock; `replace` must only be called while holding the exclusive lock.
 */
export class Session {
  readonly lock = new ReadWriteLock();
  private corpus: Corpus | null = null;
  private ingesting = false;

  get state(): SessionState {
    if (this.ingesting) {
      return "ingesting";
    }
    return this.corpus ? "ready" : "empty";
  }

  get current(): Corpus | null {
    return this.corpus;
  }

  beginIngest(): void {
    if (!this.lock.writeLocked) {
      throw new Error("beginIngest requires the exclusive session lock");
    }
    this.ingesting = true;
  }

  endIngest(): void {
    this.ingesting = false;
  }

  replace(corpus: Corpus): void {
    if (!this.lock.writeLocked) {
      throw new Error("replace requires the exclusive session lock");
    }
    this.corpus = corpus;
  }

  snapshot(): CorpusInfo {
    const corpus = this.corpus;
    if (!corpus) {
      return { state: this.state, passages: 0, documents: [] };
    }
    return {
      state: this.state,
      passages: corpus.index.size,
      documents: [...corpus.documents],
      embeddingModel: corpus.embeddingModel,
      ingestedAt: corpus.ingestedAt
    };
  }
}
