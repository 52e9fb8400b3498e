import path from "node:path";
import { ExtractionError, errorMessage } from "./errors.js";

export interface ExtractInput {
  name: string;
  bytes: Uint8Array;
  contentType?: string;
}

export type Extractor = (input: ExtractInput) => Promise<string>;

const PDF_MAGIC = "%PDF-";

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".markdown", ".csv", ".tsv", ".json", ".html", ".htm", ".xml"]);

function hasPdfMagic(bytes: Uint8Array): boolean {
  const head = Buffer.from(bytes.subarray(0, 1024)).toString("latin1");
  return head.includes(PDF_MAGIC);
}

function isPdf(input: ExtractInput): boolean {
  if (hasPdfMagic(input.bytes)) {
    return true;
  }
  const contentType = input.contentType?.toLowerCase() ?? "";
  return contentType.includes("application/pdf") || path.extname(input.name).toLowerCase() === ".pdf";
}

function isDeclaredText(input: ExtractInput): boolean {
  const contentType = input.contentType?.toLowerCase() ?? "";
  return contentType.startsWith("text/") || TEXT_EXTENSIONS.has(path.extname(input.name).toLowerCase());
}

export function isProbablyBinary(bytes: Uint8Array): boolean {
  const sample = bytes.subarray(0, 4096);
  if (sample.length === 0) {
    return false;
  }

  let suspicious = 0;
  for (const byte of sample) {
    if (byte === 0) {
      return true;
    }
    if (byte < 9 || (byte > 13 && byte < 32)) {
      suspicious += 1;
    }
  }
  return suspicious / sample.length > 0.3;
}

export function normalizeExtractedText(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .replace(/[^\S\n]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

async function extractPdfPages(bytes: Uint8Array): Promise<string[]> {
  const pdfjs = await import("pdfjs-dist/legacy/build/pdf.mjs");
  // pdf.js takes ownership of the buffer it is given.
  const data = new Uint8Array(bytes);
  const loadingTask = pdfjs.getDocument({ data, isEvalSupported: false, useSystemFonts: false, verbosity: 0 });
  const doc = await loadingTask.promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber += 1) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      const text = content.items
        .map((item) => {
          if (!("str" in item)) {
            return "";
          }
          return item.hasEOL ? `${item.str}\n` : item.str;
        })
        .join("");
      pages.push(text);
      page.cleanup();
    }
    return pages;
  } finally {
    await loadingTask.destroy();
  }
}

/**
 * Converts a document to plain text. PDF pages are concatenated in order and
 * a page without a text layer contributes an empty string. An empty payload
 * yields an empty string rather than an error.
 */
export async function extractText(input: ExtractInput): Promise<string> {
  if (input.bytes.length === 0) {
    return "";
  }

  if (isPdf(input)) {
    let pages: string[];
    try {
      pages = await extractPdfPages(input.bytes);
    } catch (error) {
      throw new ExtractionError(`Error reading PDF ${input.name}: ${errorMessage(error)}`, { cause: error });
    }
    return normalizeExtractedText(pages.join("\n"));
  }

  if (!isDeclaredText(input) && isProbablyBinary(input.bytes)) {
    throw new ExtractionError(`Unsupported binary document: ${input.name}`);
  }

  try {
    const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: false });
    return normalizeExtractedText(decoder.decode(input.bytes));
  } catch (error) {
    throw new ExtractionError(`Document ${input.name} is not valid UTF-8 text`, { cause: error });
  }
}
