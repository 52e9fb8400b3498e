export type Vector = number[];

export interface Passage {
  id: number;
  text: string;
  sourceDocument: string;
  offset: number;
}

export interface IndexEntry {
  passage: Passage;
  vector: Vector;
}

export interface RetrievalResult {
  score: number;
  passage: Passage;
}

export interface Answer {
  text: string;
  supportingPassages: RetrievalResult[];
}

export interface DocumentSource {
  kind: "file";
  name: string;
  bytes: Uint8Array;
  contentType?: string;
}

export interface UrlSource {
  kind: "url";
  url: string;
}

export type IngestSource = DocumentSource | UrlSource;

export interface IngestStatus {
  ok: boolean;
  trail: string[];
  passages: number;
  documents: string[];
  error?: Error;
}

export type SessionState = "empty" | "ingesting" | "ready";

export interface CorpusInfo {
  state: SessionState;
  passages: number;
  documents: string[];
  embeddingModel?: string;
  ingestedAt?: string;
}
