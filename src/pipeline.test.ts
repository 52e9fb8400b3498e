import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { HashingEmbedder, OllamaEmbedder, type Embedder } from "./embedder.js";
import { DownloadError, EmbeddingError, EmptyCorpusError, ExtractionError, GenerationError, InvalidQuestionError, NotIngestedError } from "./errors.js";
import { ExtractiveGenerator, type Generator } from "./generator.js";
import { formatStatus, INGEST_SUCCESS_LINE, Pipeline, type PipelineDeps } from "./pipeline.js";
import type { BuiltPrompt } from "./prompt.js";
import type { DocumentSource, Vector } from "./types.js";

const encoder = new TextEncoder();

function textDocument(name: string, text: string): DocumentSource {
  return { kind: "file", name, bytes: encoder.encode(text) };
}

const FRANCE = textDocument("france.txt", "The capital of France is Paris.");
const ITALY = textDocument("italy.txt", "The capital of Italy is Rome. Rome has many fountains.");
const QUESTION = "What is the capital of France?";

class FlakyEmbedder implements Embedder {
  readonly model = "flaky";
  failBatches = false;
  private readonly inner = new HashingEmbedder(128);

  embed(text: string): Promise<Vector> {
    return this.inner.embed(text);
  }

  async embedMany(texts: string[]): Promise<Vector[]> {
    if (this.failBatches) {
      throw new Error("embedding backend unavailable");
    }
    return this.inner.embedMany(texts);
  }
}

function createPipeline(deps: Partial<PipelineDeps> = {}, topK = 1): Pipeline {
  return new Pipeline(
    { chunkSize: 200, chunkOverlap: 20, topK, maxContextChars: 2000 },
    { embedder: new HashingEmbedder(128), generator: new ExtractiveGenerator(), ...deps }
  );
}

describe("Pipeline.ingest", () => {
  it("reports each stage of a successful ingestion", async () => {
    const pipeline = createPipeline();
    const status = await pipeline.ingest([FRANCE]);

    assert.equal(status.ok, true);
    assert.equal(status.passages, 1);
    assert.deepEqual(status.documents, ["france.txt"]);
    assert.deepEqual(status.trail, [
      "Processing uploaded files...",
      "Processed file: france.txt",
      "Split 1 document(s) into 1 passage(s)",
      "Embedded 1 passage(s) with hashing-128",
      INGEST_SUCCESS_LINE
    ]);
    assert.equal(pipeline.session.state, "ready");
  });

  it("fails with EmptyCorpusError when nothing is extractable", async () => {
    const pipeline = createPipeline();
    const status = await pipeline.ingest([{ kind: "file", name: "empty.pdf", bytes: new Uint8Array() }]);

    assert.equal(status.ok, false);
    assert.ok(status.error instanceof EmptyCorpusError);
    assert.equal(
      formatStatus(status),
      ["Processing uploaded files...", "No text found in empty.pdf", "Error: No text found in the documents."].join("\n")
    );
    assert.equal(pipeline.session.state, "empty");
  });

  it("skips a document that cannot be extracted", async () => {
    const pipeline = createPipeline();
    const status = await pipeline.ingest([
      { kind: "file", name: "image.bin", bytes: new Uint8Array([0, 1, 2, 3]) },
      FRANCE
    ]);

    assert.equal(status.ok, true);
    assert.deepEqual(status.documents, ["france.txt"]);
    assert.equal(status.trail[1], "Skipped image.bin: Unsupported binary document: image.bin");
  });

  it("reports the extraction error when every document fails", async () => {
    const pipeline = createPipeline();
    const status = await pipeline.ingest([{ kind: "file", name: "image.bin", bytes: new Uint8Array([0, 1, 2, 3]) }]);

    assert.equal(status.ok, false);
    assert.ok(status.error instanceof ExtractionError);
    assert.equal(status.trail.at(-1), "Error: Unsupported binary document: image.bin");
  });

  it("keeps the previous corpus when embedding fails", async () => {
    const embedder = new FlakyEmbedder();
    const pipeline = createPipeline({ embedder });
    assert.equal((await pipeline.ingest([FRANCE])).ok, true);

    embedder.failBatches = true;
    const status = await pipeline.ingest([ITALY]);

    assert.equal(status.ok, false);
    assert.ok(status.error instanceof EmbeddingError);
    assert.equal(status.trail.at(-1), "Error: embedding backend unavailable");
    assert.equal(pipeline.session.state, "ready");
    assert.deepEqual(pipeline.session.snapshot().documents, ["france.txt"]);

    const answer = await pipeline.answer(QUESTION);
    assert.equal(answer.text, "The capital of France is Paris.");
  });

  it("downloads URL sources before extracting them", async () => {
    const pipeline = createPipeline({
      fetch: async () => new Response("The capital of France is Paris.", { status: 200 })
    });
    const status = await pipeline.ingest([{ kind: "url", url: "https://docs.example.test/paris.txt" }]);

    assert.equal(status.ok, true);
    assert.deepEqual(status.trail.slice(0, 3), [
      "Downloading https://docs.example.test/paris.txt...",
      "Downloaded paris.txt (31 bytes)",
      "Processing uploaded files..."
    ]);
  });

  it("aborts the ingestion when a download fails", async () => {
    const pipeline = createPipeline({ fetch: async () => new Response("gone", { status: 404 }) });
    await pipeline.ingest([FRANCE]);

    const status = await pipeline.ingest([FRANCE, { kind: "url", url: "https://docs.example.test/missing.pdf" }]);

    assert.equal(status.ok, false);
    assert.ok(status.error instanceof DownloadError);
    assert.equal(status.trail.at(-1), "Error: Failed to download (Status 404)");
    assert.deepEqual(pipeline.session.snapshot().documents, ["france.txt"]);
  });

  it("rejects an empty source list", async () => {
    const status = await createPipeline().ingest([]);
    assert.equal(status.ok, false);
    assert.deepEqual(status.trail, ["Error: No documents were provided."]);
  });

  it("splits long documents into overlapping passages", async () => {
    const pipeline = createPipeline();
    const sentence = "Lyon sits where the Rhone meets the Saone. ";
    const status = await pipeline.ingest([textDocument("lyon.txt", sentence.repeat(12))]);

    assert.equal(status.ok, true);
    assert.ok(status.passages > 1);
    const passages = await pipeline.search("Rhone", status.passages);
    assert.ok(passages.every((result) => result.passage.text.length <= 200));
  });

  it("skips passages that contain no words", async () => {
    const pipeline = createPipeline();
    const status = await pipeline.ingest([textDocument("ruled.txt", `The capital of France is Paris.\n${"-".repeat(400)}`)]);

    assert.equal(status.ok, true);
    assert.equal(status.passages, 1);
    assert.deepEqual(status.trail, [
      "Processing uploaded files...",
      "Processed file: ruled.txt",
      "Split 1 document(s) into 1 passage(s)",
      "Embedded 1 passage(s) with hashing-128",
      INGEST_SUCCESS_LINE
    ]);
  });

  it("treats a document of dot leaders as having no text", async () => {
    const status = await createPipeline().ingest([textDocument("leaders.txt", ". . . . . . . .")]);

    assert.equal(status.ok, false);
    assert.ok(status.error instanceof EmptyCorpusError);
  });
});

describe("Pipeline.answer", () => {
  it("answers from the ingested document", async () => {
    const pipeline = createPipeline();
    await pipeline.ingest([FRANCE]);

    const answer = await pipeline.answer(QUESTION);

    assert.ok(answer.text.includes("Paris"));
    assert.equal(answer.supportingPassages[0]?.passage.sourceDocument, "france.txt");
  });

  it("fails with NotIngestedError before any ingestion", async () => {
    await assert.rejects(createPipeline().answer(QUESTION), NotIngestedError);
  });

  it("rejects a question without words", async () => {
    const pipeline = createPipeline();
    await pipeline.ingest([FRANCE]);

    await assert.rejects(pipeline.answer("???"), (error: unknown) => error instanceof InvalidQuestionError && error.status === 422);
  });

  it("answers only from the most recent corpus", async () => {
    const pipeline = createPipeline({}, 3);
    await pipeline.ingest([FRANCE]);
    assert.ok((await pipeline.answer(QUESTION)).text.includes("Paris"));

    await pipeline.ingest([ITALY]);
    const answer = await pipeline.answer(QUESTION);

    assert.equal(answer.text, "The capital of Italy is Rome.");
    assert.ok(answer.supportingPassages.every((result) => result.passage.sourceDocument === "italy.txt"));
  });

  it("reports generator failures and keeps the corpus", async () => {
    const failing: Generator = {
      name: "failing",
      generate: async () => {
        throw new Error("upstream returned 503");
      }
    };
    const pipeline = createPipeline({ generator: failing });
    await pipeline.ingest([FRANCE]);

    await assert.rejects(
      pipeline.answer(QUESTION),
      (error: unknown) => error instanceof GenerationError && error.message === "upstream returned 503"
    );
    assert.equal(pipeline.session.state, "ready");
  });

  it("sanitizes echoed prompt markers", async () => {
    const echoing: Generator = {
      name: "echoing",
      generate: async () => "Answer: Paris."
    };
    const pipeline = createPipeline({ generator: echoing });
    await pipeline.ingest([FRANCE]);

    assert.equal((await pipeline.answer(QUESTION)).text, "Paris.");
  });

  it("does not hold the session lock while generating", async () => {
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    let started = () => {};
    const generating = new Promise<void>((resolve) => {
      started = () => resolve();
    });
    const slow: Generator = {
      name: "slow",
      generate: async (prompt: BuiltPrompt) => {
        started();
        await gate;
        return prompt.passages[0]?.passage.text ?? "";
      }
    };
    const pipeline = createPipeline({ generator: slow });
    await pipeline.ingest([FRANCE]);

    const pending = pipeline.answer(QUESTION);
    await generating;
    const status = await pipeline.ingest([ITALY]);
    assert.equal(status.ok, true);

    release();
    const answer = await pending;
    assert.equal(answer.text, "The capital of France is Paris.");
    assert.deepEqual(pipeline.session.snapshot().documents, ["italy.txt"]);
  });

  it("releases the session lock when the query embedding times out", async () => {
    const embedder = new OllamaEmbedder({
      baseUrl: "http://ollama.test",
      model: "nomic-embed-text",
      timeoutMs: 20,
      fetch: (_url, init) => {
        if (!String(init?.body).includes(QUESTION)) {
          return Promise.resolve(Response.json({ embeddings: [[1, 0]] }));
        }
        return new Promise((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) {
            signal.addEventListener("abort", () => reject(signal.reason), { once: true });
          }
        });
      }
    });
    const pipeline = createPipeline({ embedder });
    await pipeline.ingest([FRANCE]);

    await assert.rejects(
      pipeline.answer(QUESTION),
      (error: unknown) => error instanceof EmbeddingError && error.message === "Embedding timed out after 20ms"
    );
    const status = await pipeline.ingest([ITALY]);
    assert.equal(status.ok, true);
    assert.deepEqual(pipeline.session.snapshot().documents, ["italy.txt"]);
  });
});
