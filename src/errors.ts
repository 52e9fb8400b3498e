export type DocQaErrorCode =
  | "extraction_failed"
  | "empty_corpus"
  | "embedding_failed"
  | "download_failed"
  | "not_ingested"
  | "invalid_question"
  | "generation_failed"
  | "invalid_config";

export class DocQaError extends Error {
  readonly code: DocQaErrorCode;
  readonly status: number;

  constructor(code: DocQaErrorCode, message: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ExtractionError extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("extraction_failed", message, 422, options);
  }
}

export class EmptyCorpusError extends DocQaError {
  constructor(message = "No text found in the documents.") {
    super("empty_corpus", message, 422);
  }
}

export class EmbeddingError extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("embedding_failed", message, 500, options);
  }
}

export class DownloadError extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("download_failed", message, 502, options);
  }
}

export class NotIngestedError extends DocQaError {
  constructor(message = "Documents have not been processed yet.") {
    super("not_ingested", message, 400);
  }
}

export class InvalidQuestionError extends DocQaError {
  constructor(message = "The question must contain at least one word.") {
    super("invalid_question", message, 422);
  }
}

export class GenerationError extends DocQaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("generation_failed", message, 500, options);
  }
}

export class ConfigError extends DocQaError {
  constructor(message: string) {
    super("invalid_config", message, 500);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classifies anything thrown below the pipeline boundary. Errors that already
 * belong to the taxonomy pass through; everything else is wrapped by `wrap`.
 */
export function toDocQaError(error: unknown, wrap: (message: string, cause: unknown) => DocQaError): DocQaError {
  if (error instanceof DocQaError) {
    return error;
  }
  return wrap(errorMessage(error), error);
}
