export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface OllamaOptions {
  baseUrl: string;
  fetch?: FetchLike;
}

export interface EmbedOptions {
  batchSize?: number;
  signal?: AbortSignal;
}

interface EmbedResponse {
  embeddings?: number[][];
  embedding?: number[];
}

export class OllamaRequestError extends Error {
  constructor(
    readonly endpoint: string,
    readonly status: number,
    payload: string
  ) {
    super(`Ollama request failed (${status}) ${endpoint}: ${payload}`);
    this.name = "OllamaRequestError";
  }
}

export class OllamaClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: OllamaOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async postJson<T>(endpoint: string, body: Record<string, unknown>, signal?: AbortSignal): Promise<T> {
    const response = await this.fetchImpl(`${this.baseUrl}${endpoint}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal
    });

    if (!response.ok) {
      const payload = await response.text();
      throw new OllamaRequestError(endpoint, response.status, payload);
    }

    return (await response.json()) as T;
  }

  /**
   * Embeds `inputs` with one `/api/embed` request per batch. A server that
   * answers 404 predates that endpoint and gets one `/api/embeddings`
   * request per input instead.
   */
  async embed(model: string, inputs: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const batchSize = Math.max(1, options.batchSize ?? inputs.length);
    const vectors: number[][] = [];
    for (let start = 0; start < inputs.length; start += batchSize) {
      const batch = inputs.slice(start, start + batchSize);
      vectors.push(...(await this.embedBatch(model, batch, options.signal)));
    }
    return vectors;
  }

  private async embedBatch(model: string, batch: string[], signal?: AbortSignal): Promise<number[][]> {
    let data: EmbedResponse;
    try {
      data = await this.postJson<EmbedResponse>("/api/embed", { model, input: batch }, signal);
    } catch (error) {
      if (error instanceof OllamaRequestError && error.status === 404) {
        return this.embedEach(model, batch, signal);
      }
      throw error;
    }
    if (!Array.isArray(data.embeddings)) {
      throw new Error("Ollama /api/embed response does not contain embeddings");
    }
    return data.embeddings;
  }

  private async embedEach(model: string, batch: string[], signal?: AbortSignal): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const prompt of batch) {
      const data = await this.postJson<EmbedResponse>("/api/embeddings", { model, prompt }, signal);
      if (!Array.isArray(data.embedding)) {
        throw new Error("Ollama /api/embeddings response does not contain embedding");
      }
      vectors.push(data.embedding);
    }
    return vectors;
  }

  async generate(model: string, prompt: string, system: string, signal?: AbortSignal): Promise<string> {
    const data = await this.postJson<{ response?: unknown }>(
      "/api/generate",
      {
        model,
        prompt,
        system,
        stream: false
      },
      signal
    );

    if (typeof data.response !== "string") {
      throw new Error("Ollama /api/generate response does not contain response");
    }
    return data.response.trim();
  }
}
