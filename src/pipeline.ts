import { chunkText } from "./chunker.js";
import { DEFAULT_DOWNLOAD_TIMEOUT_MS, downloadDocument } from "./download.js";
import { tokenize, type Embedder } from "./embedder.js";
import {
  DocQaError,
  DownloadError,
  EmbeddingError,
  EmptyCorpusError,
  ExtractionError,
  GenerationError,
  InvalidQuestionError,
  NotIngestedError,
  toDocQaError
} from "./errors.js";
import { extractText, type Extractor } from "./extractor.js";
import type { Generator } from "./generator.js";
import { NullLogger, type Logger } from "./logger.js";
import type { FetchLike } from "./ollama.js";
import { buildPrompt } from "./prompt.js";
import { sanitizeAnswer } from "./sanitizer.js";
import { Session } from "./session.js";
import type { Answer, DocumentSource, IndexEntry, IngestSource, IngestStatus, Passage, RetrievalResult } from "./types.js";
import { retrieveTopK, VectorIndex } from "./vector.js";

export const INGEST_SUCCESS_LINE = "Documents processed successfully. Ask your questions!";

export interface PipelineOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Passages retrieved per question. One passage gives the generator no second opinion. */
  topK: number;
  maxContextChars: number;
  downloadTimeoutMs?: number;
}

export interface PipelineDeps {
  embedder: Embedder;
  generator: Generator;
  extractor?: Extractor;
  session?: Session;
  logger?: Logger;
  fetch?: FetchLike;
}

type IngestStage = "download" | "extract" | "chunk" | "embed" | "index";

const STAGE_ERRORS: Record<IngestStage, (message: string, cause: unknown) => DocQaError> = {
  download: (message, cause) => new DownloadError(message, { cause }),
  extract: (message, cause) => new ExtractionError(message, { cause }),
  chunk: (message, cause) => new ExtractionError(message, { cause }),
  embed: (message, cause) => new EmbeddingError(message, { cause }),
  index: (message, cause) => new EmbeddingError(message, { cause })
};

export function formatStatus(status: IngestStatus): string {
  return status.trail.join("\n");
}

export class Pipeline {
  readonly session: Session;
  private readonly embedder: Embedder;
  private readonly generator: Generator;
  private readonly extractor: Extractor;
  private readonly logger: Logger;
  private readonly fetchImpl?: FetchLike;

  constructor(
    private readonly options: PipelineOptions,
    deps: PipelineDeps
  ) {
    this.embedder = deps.embedder;
    this.generator = deps.generator;
    this.extractor = deps.extractor ?? extractText;
    this.session = deps.session ?? new Session();
    this.logger = deps.logger ?? new NullLogger();
    this.fetchImpl = deps.fetch;
  }

  /**
   * Builds a new corpus from `sources` and swaps it in. Never throws: the
   * returned status carries the error, and on failure the previous corpus
   * stays in place.
   */
  async ingest(sources: IngestSource[]): Promise<IngestStatus> {
    const trail: string[] = [];
    let stage: IngestStage = "download";
    let source = "";

    const fail = (error: unknown): IngestStatus => {
      const classified = toDocQaError(error, STAGE_ERRORS[stage]);
      this.logger.error(`Ingestion failed: ${classified.message}`, { stage, source, code: classified.code });
      trail.push(`Error: ${classified.message}`);
      return { ok: false, trail, passages: 0, documents: [], error: classified };
    };

    if (sources.length === 0) {
      return fail(new EmptyCorpusError("No documents were provided."));
    }

    const documents: DocumentSource[] = [];
    try {
      for (const item of sources) {
        if (item.kind === "file") {
          documents.push(item);
          continue;
        }
        source = item.url;
        trail.push(`Downloading ${item.url}...`);
        const document = await downloadDocument(item.url, {
          timeoutMs: this.options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS,
          fetch: this.fetchImpl
        });
        trail.push(`Downloaded ${document.name} (${document.bytes.length} bytes)`);
        documents.push(document);
      }
    } catch (error) {
      return fail(error);
    }

    return this.session.lock.withWrite(async () => {
      this.session.beginIngest();
      try {
        stage = "extract";
        trail.push("Processing uploaded files...");
        const passages: Passage[] = [];
        const processed: string[] = [];
        let firstFailure: ExtractionError | undefined;
        let skipped = 0;

        for (const document of documents) {
          source = document.name;
          let text: string;
          try {
            text = await this.extractor(document);
          } catch (error) {
            const classified = toDocQaError(error, STAGE_ERRORS.extract);
            if (!(classified instanceof ExtractionError)) {
              throw classified;
            }
            firstFailure ??= classified;
            skipped += 1;
            this.logger.warn(`Skipping document: ${classified.message}`, { stage, source });
            trail.push(`Skipped ${document.name}: ${classified.message}`);
            continue;
          }

          stage = "chunk";
          const parts = chunkText(text, { chunkSize: this.options.chunkSize, overlap: this.options.chunkOverlap });
          let kept = 0;
          for (const part of parts) {
            // Rules and dot leaders carry no words to embed.
            if (tokenize(part.content).length === 0) {
              continue;
            }
            passages.push({ id: passages.length, text: part.content, sourceDocument: document.name, offset: part.offset });
            kept += 1;
          }
          stage = "extract";

          if (kept === 0) {
            trail.push(`No text found in ${document.name}`);
            continue;
          }
          processed.push(document.name);
          trail.push(`Processed file: ${document.name}`);
        }

        source = "";
        if (passages.length === 0) {
          throw firstFailure && skipped === documents.length ? firstFailure : new EmptyCorpusError();
        }
        trail.push(`Split ${processed.length} document(s) into ${passages.length} passage(s)`);

        stage = "embed";
        const vectors = await this.embedder.embedMany(passages.map((passage) => passage.text));
        if (vectors.length !== passages.length) {
          throw new EmbeddingError(`Expected ${passages.length} embeddings, received ${vectors.length}`);
        }
        trail.push(`Embedded ${passages.length} passage(s) with ${this.embedder.model}`);

        stage = "index";
        const entries: IndexEntry[] = passages.map((passage, i) => ({ passage, vector: vectors[i] ?? [] }));
        const index = VectorIndex.build(entries);
        this.session.replace({
          index,
          documents: processed,
          embeddingModel: this.embedder.model,
          ingestedAt: new Date().toISOString()
        });

        trail.push(INGEST_SUCCESS_LINE);
        this.logger.info("Corpus replaced", { documents: processed.length, passages: index.size });
        return { ok: true, trail, passages: index.size, documents: processed };
      } catch (error) {
        return fail(error);
      } finally {
        this.session.endIngest();
      }
    });
  }

  /** Embeds the question and returns the top passages under the shared lock. */
  async search(question: string, k = this.options.topK): Promise<RetrievalResult[]> {
    if (tokenize(question).length === 0) {
      throw new InvalidQuestionError();
    }
    return this.session.lock.withRead(async () => {
      const corpus = this.session.current;
      if (!corpus) {
        throw new NotIngestedError();
      }
      const queryVector = await this.embedder.embed(question);
      return retrieveTopK(corpus.index, queryVector, k);
    });
  }

  async answer(question: string, signal?: AbortSignal): Promise<Answer> {
    let retrieved: RetrievalResult[];
    try {
      retrieved = await this.search(question);
    } catch (error) {
      const classified = toDocQaError(error, (message, cause) => new EmbeddingError(message, { cause }));
      if (classified instanceof NotIngestedError) {
        this.logger.warn("Question asked before ingestion", { stage: "retrieve" });
      } else if (classified instanceof InvalidQuestionError) {
        this.logger.warn("Rejected question without words", { stage: "retrieve", question });
      } else {
        this.logger.error(`Retrieval failed: ${classified.message}`, { stage: "retrieve", question });
      }
      throw classified;
    }

    // The session lock is released here; generation may be slow.
    const prompt = buildPrompt(question, retrieved, { maxContextChars: this.options.maxContextChars });
    if (prompt.dropped > 0) {
      this.logger.debug("Dropped passages over the context budget", { dropped: prompt.dropped });
    }

    let raw: string;
    try {
      raw = await this.generator.generate(prompt, signal);
    } catch (error) {
      const classified = toDocQaError(error, (message, cause) => new GenerationError(message, { cause }));
      this.logger.error(`Generation failed: ${classified.message}`, { stage: "generate", generator: this.generator.name });
      throw classified;
    }

    return {
      text: sanitizeAnswer(raw),
      supportingPassages: prompt.passages
    };
  }
}
