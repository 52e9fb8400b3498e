import { abortReason, timeoutScope } from "./abort.js";
import { tokenize } from "./embedder.js";
import { GenerationError, errorMessage, toDocQaError } from "./errors.js";
import { OllamaClient, type FetchLike } from "./ollama.js";
import type { BuiltPrompt } from "./prompt.js";

export interface Generator {
  readonly name: string;
  generate(prompt: BuiltPrompt, signal?: AbortSignal): Promise<string>;
}

export const NO_ANSWER = "I could not find the answer in the provided documents.";

const SYSTEM_PROMPT = `
You answer questions about documents supplied by the user.
Use only the provided context. If it is insufficient, say so plainly.
`.trim();

const QUESTION_STOP_WORDS = new Set([
  "a", "an", "and", "are", "can", "did", "do", "does", "for", "how", "in", "is", "it",
  "of", "on", "or", "the", "to", "was", "were", "what", "when", "where", "which", "who",
  "why", "with"
]);

function generationTimeout(timeoutMs: number): () => GenerationError {
  return () => new GenerationError(`Generation timed out after ${timeoutMs}ms`);
}

function splitSentences(text: string): string[] {
  return (text.match(/[^.!?\n]+[.!?]*/g) ?? []).map((sentence) => sentence.trim()).filter(Boolean);
}

/**
 * In-process answerer: returns the context sentence that shares the most
 * content words with the question. Deterministic; earlier sentences win ties.
 */
export class ExtractiveGenerator implements Generator {
  readonly name = "extractive";

  async generate(prompt: BuiltPrompt, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new GenerationError("Generation was cancelled");
    }

    const keywords = new Set(tokenize(prompt.question).filter((token) => !QUESTION_STOP_WORDS.has(token)));
    let best = "";
    let bestScore = 0;

    for (const result of prompt.passages) {
      for (const sentence of splitSentences(result.passage.text)) {
        const words = new Set(tokenize(sentence));
        let score = 0;
        for (const keyword of keywords) {
          if (words.has(keyword)) {
            score += 1;
          }
        }
        if (score > bestScore) {
          best = sentence;
          bestScore = score;
        }
      }
    }

    return bestScore > 0 ? best : NO_ANSWER;
  }
}

export interface OllamaGeneratorOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

export class OllamaGenerator implements Generator {
  readonly name = "ollama";
  private readonly client: OllamaClient;

  constructor(private readonly options: OllamaGeneratorOptions) {
    this.client = new OllamaClient({ baseUrl: options.baseUrl, fetch: options.fetch });
  }

  async generate(prompt: BuiltPrompt, signal?: AbortSignal): Promise<string> {
    const scope = timeoutScope(this.options.timeoutMs, generationTimeout(this.options.timeoutMs), signal);
    try {
      return await this.client.generate(this.options.model, prompt.text, SYSTEM_PROMPT, scope.signal);
    } catch (error) {
      throw toDocQaError(abortReason(scope.signal, error), (message, cause) => new GenerationError(message, { cause }));
    } finally {
      scope.dispose();
    }
  }
}

export interface RemoteGeneratorOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  fetch?: FetchLike;
}

/** Client of an HTTP answering service exposing `POST /query`. */
export class RemoteGenerator implements Generator {
  readonly name = "remote";
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: RemoteGeneratorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  async generate(prompt: BuiltPrompt, signal?: AbortSignal): Promise<string> {
    const scope = timeoutScope(this.options.timeoutMs, generationTimeout(this.options.timeoutMs), signal);
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/query`, {
        method: "POST",
        headers,
        body: JSON.stringify({ query: prompt.question, documents: prompt.context, prompt: prompt.text }),
        signal: scope.signal
      });
      const payload = await response.text();

      if (response.status !== 200) {
        throw new GenerationError(`Error querying answer service (Status ${response.status}): ${payload}`);
      }

      let data: unknown;
      try {
        data = JSON.parse(payload);
      } catch (error) {
        throw new GenerationError(`Answer service returned malformed JSON: ${errorMessage(error)}`, { cause: error });
      }

      if (typeof data !== "object" || data === null || !("answer" in data) || typeof data.answer !== "string") {
        throw new GenerationError("Answer service response does not contain an answer");
      }
      return data.answer;
    } catch (error) {
      throw toDocQaError(abortReason(scope.signal, error), (message, cause) => new GenerationError(message, { cause }));
    } finally {
      scope.dispose();
    }
  }
}
