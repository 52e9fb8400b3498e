import { DownloadError, errorMessage } from "./errors.js";
import type { FetchLike } from "./ollama.js";
import type { DocumentSource } from "./types.js";

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10_000;

export interface DownloadOptions {
  timeoutMs?: number;
  fetch?: FetchLike;
}

export function documentNameFromUrl(url: URL): string {
  const segments = url.pathname.split("/").filter(Boolean);
  const last = segments[segments.length - 1];
  if (!last) {
    return url.hostname;
  }
  try {
    return decodeURIComponent(last);
  } catch {
    // A stray "%" that is not an escape; keep the segment as written.
    return last;
  }
}

export async function downloadDocument(rawUrl: string, options: DownloadOptions = {}): Promise<DocumentSource> {
  let url: URL;
  try {
    url = new URL(rawUrl);
  } catch {
    throw new DownloadError(`Invalid URL: ${rawUrl}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new DownloadError(`Unsupported URL scheme: ${url.protocol}`);
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  const fetchImpl = options.fetch ?? fetch;

  let response: Response;
  try {
    response = await fetchImpl(url.toString(), { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
  } catch (error) {
    const reason = error instanceof Error && error.name === "TimeoutError" ? `timed out after ${timeoutMs}ms` : errorMessage(error);
    throw new DownloadError(`Failed to download ${url.toString()}: ${reason}`, { cause: error });
  }

  if (response.status !== 200) {
    throw new DownloadError(`Failed to download (Status ${response.status})`);
  }

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await response.arrayBuffer());
  } catch (error) {
    throw new DownloadError(`Failed to read ${url.toString()}: ${errorMessage(error)}`, { cause: error });
  }

  return {
    kind: "file",
    name: documentNameFromUrl(url),
    bytes,
    contentType: response.headers.get("content-type") ?? undefined
  };
}
