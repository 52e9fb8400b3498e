export interface ChunkOptions {
  chunkSize: number;
  overlap: number;
}

export interface ChunkPart {
  offset: number;
  content: string;
}

function assertChunkOptions(options: ChunkOptions): void {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
    throw new RangeError("chunkSize must be a positive integer");
  }
  if (!Number.isInteger(options.overlap) || options.overlap < 0) {
    throw new RangeError("overlap must be a non-negative integer");
  }
  if (options.overlap >= options.chunkSize) {
    throw new RangeError("overlap must be smaller than chunkSize");
  }
}

/**
 * Splits text into character windows of at most `chunkSize`, each sharing
 * exactly `overlap` characters with the previous one. Offsets point into the
 * trimmed text.
 */
export function chunkText(text: string, options: ChunkOptions): ChunkPart[] {
  assertChunkOptions(options);
  const normalized = text.trim();
  const chunks: ChunkPart[] = [];

  if (normalized.length === 0) {
    return chunks;
  }

  const step = options.chunkSize - options.overlap;
  let start = 0;
  while (true) {
    const end = Math.min(start + options.chunkSize, normalized.length);
    chunks.push({ offset: start, content: normalized.slice(start, end) });
    if (end >= normalized.length) {
      break;
    }
    start += step;
  }

  return chunks;
}

export function splitText(text: string, chunkSize: number, overlap: number): string[] {
  return chunkText(text, { chunkSize, overlap }).map((part) => part.content);
}

/** Inverse of `splitText`: drops the shared prefix of every chunk after the first. */
export function joinChunks(chunks: string[], overlap: number): string {
  return chunks.map((chunk, index) => (index === 0 ? chunk : chunk.slice(overlap))).join("");
}
