import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { DocQaError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { formatStatus, type Pipeline } from "./pipeline.js";
import type { DocumentSource } from "./types.js";

export const WELCOME_MESSAGE = "Welcome to the document question answering API";

const MAX_BODY_BYTES = 50 * 1024 * 1024;

export type Handler = (request: Request) => Promise<Response>;

export interface HandlerDeps {
  pipeline: Pipeline;
  logger: Logger;
}

function json(body: unknown, status = 200): Response {
  return Response.json(body, { status });
}

function detail(message: string, status: number): Response {
  return json({ detail: message }, status);
}

function routePath(url: URL): string {
  const trimmed = url.pathname.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}

async function readForm(request: Request): Promise<FormData | null> {
  const contentType = request.headers.get("content-type") ?? "";
  if (!contentType.includes("multipart/form-data") && !contentType.includes("application/x-www-form-urlencoded")) {
    return null;
  }
  try {
    return await request.formData();
  } catch {
    return null;
  }
}

async function readJsonField(request: Request, field: string): Promise<string | undefined> {
  if (!(request.headers.get("content-type") ?? "").includes("application/json")) {
    return undefined;
  }
  let body: unknown;
  try {
    body = await request.json();
  } catch {
    return undefined;
  }
  if (typeof body === "object" && body !== null && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}

/** Looks for a text field in the query string, then a form body, then a JSON body. */
async function readTextField(request: Request, url: URL, field: string): Promise<string | undefined> {
  const fromQuery = url.searchParams.get(field);
  if (fromQuery !== null) {
    return fromQuery;
  }
  const form = await readForm(request.clone());
  if (form) {
    const value = form.get(field);
    return typeof value === "string" ? value : undefined;
  }
  return readJsonField(request, field);
}

async function uploadedDocuments(form: FormData): Promise<DocumentSource[]> {
  const documents: DocumentSource[] = [];
  for (const field of ["uploaded_files", "files", "file"]) {
    for (const entry of form.getAll(field)) {
      if (typeof entry === "string") {
        continue;
      }
      documents.push({
        kind: "file",
        name: entry.name || "upload",
        bytes: new Uint8Array(await entry.arrayBuffer()),
        contentType: entry.type || undefined
      });
    }
  }
  return documents;
}

export function createHandler({ pipeline, logger }: HandlerDeps): Handler {
  async function uploadDocuments(request: Request): Promise<Response> {
    const form = await readForm(request);
    const documents = form ? await uploadedDocuments(form) : [];
    if (documents.length === 0) {
      return detail("No files were uploaded.", 422);
    }
    logger.info("Ingesting uploaded files", { files: documents.map((doc) => doc.name) });
    const status = await pipeline.ingest(documents);
    return json({ status: formatStatus(status) });
  }

  async function processUrl(request: Request, url: URL): Promise<Response> {
    const target = (await readTextField(request, url, "url"))?.trim();
    if (!target) {
      return detail("Missing url.", 422);
    }
    logger.info("Ingesting URL", { url: target });
    const status = await pipeline.ingest([{ kind: "url", url: target }]);
    return json({ status: formatStatus(status) });
  }

  async function askQuestion(request: Request, url: URL): Promise<Response> {
    const question = (await readTextField(request, url, "question"))?.trim();
    if (!question) {
      return detail("Missing question.", 422);
    }
    try {
      const answer = await pipeline.answer(question, request.signal);
      if (url.searchParams.get("debug") === "1") {
        return json({ response: answer.text, sources: answer.supportingPassages });
      }
      return json({ response: answer.text });
    } catch (error) {
      if (error instanceof DocQaError && error.status < 500) {
        return detail(error.message, error.status);
      }
      logger.error(`Error answering question: ${errorMessage(error)}`, { stage: "answer" });
      return detail(`Error: ${errorMessage(error)}`, 500);
    }
  }

  async function describeUpload(request: Request): Promise<Response> {
    const form = await readForm(request);
    const file = form?.get("file");
    const description = form?.get("description");
    if (!file || typeof file === "string" || typeof description !== "string") {
      return detail("Fields file and description are required.", 422);
    }
    return json({ filename: file.name, description });
  }

  return async (request) => {
    const url = new URL(request.url);
    const path = routePath(url);

    try {
      if (path === "/" && request.method === "GET") {
        return json({ message: WELCOME_MESSAGE });
      }
      if (path === "/status" && request.method === "GET") {
        return json(pipeline.session.snapshot());
      }
      if (request.method === "POST") {
        switch (path) {
          case "/upload_documents":
            return await uploadDocuments(request);
          case "/process_url":
            return await processUrl(request, url);
          case "/ask_question":
            return await askQuestion(request, url);
          case "/uploadfile":
            return await describeUpload(request);
        }
      }
      return detail("Not Found", 404);
    } catch (error) {
      logger.error(`Unhandled error: ${errorMessage(error)}`, { path });
      return detail("Internal Server Error", 500);
    }
  };
}

class PayloadTooLargeError extends Error {}

async function toRequest(req: IncomingMessage, signal: AbortSignal): Promise<Request> {
  const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [key, value] of Object.entries(req.headers)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        headers.append(key, item);
      }
    } else if (value !== undefined) {
      headers.set(key, value);
    }
  }

  const method = req.method ?? "GET";
  if (method === "GET" || method === "HEAD") {
    return new Request(url, { method, headers, signal });
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new PayloadTooLargeError();
    }
    chunks.push(buffer);
  }
  return new Request(url, { method, headers, body: Buffer.concat(chunks), signal });
}

async function writeResponse(res: ServerResponse, response: Response): Promise<void> {
  res.statusCode = response.status;
  response.headers.forEach((value, key) => {
    res.setHeader(key, value);
  });
  res.end(Buffer.from(await response.arrayBuffer()));
}

export function createServer(handler: Handler, logger: Logger): http.Server {
  return http.createServer((req, res) => {
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    toRequest(req, controller.signal)
      .then(handler)
      .catch((error: unknown) => {
        if (error instanceof PayloadTooLargeError) {
          return detail("Request body too large.", 413);
        }
        logger.error(`Request failed: ${errorMessage(error)}`, { url: req.url });
        return detail("Internal Server Error", 500);
      })
      .then((response) => writeResponse(res, response))
      .catch((error: unknown) => {
        logger.error(`Failed to write response: ${errorMessage(error)}`, { url: req.url });
        res.destroy();
      });
  });
}
