import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { documentNameFromUrl, downloadDocument } from "./download.js";
import { DownloadError } from "./errors.js";

describe("downloadDocument", () => {
  it("returns the body with a name taken from the URL", async () => {
    const seen: Array<string | undefined> = [];
    const source = await downloadDocument("https://docs.example.test/files/guide%20v2.txt", {
      fetch: async (url, init) => {
        seen.push(url, init?.method);
        return new Response("The capital of France is Paris.", {
          status: 200,
          headers: { "content-type": "text/plain; charset=utf-8" }
        });
      }
    });

    assert.deepEqual(seen, ["https://docs.example.test/files/guide%20v2.txt", "GET"]);
    assert.equal(source.name, "guide v2.txt");
    assert.equal(source.contentType, "text/plain; charset=utf-8");
    assert.equal(new TextDecoder().decode(source.bytes), "The capital of France is Paris.");
  });

  it("reports the status of a failed download", async () => {
    await assert.rejects(
      downloadDocument("https://docs.example.test/missing.pdf", {
        fetch: async () => new Response("not found", { status: 404 })
      }),
      (error: unknown) => error instanceof DownloadError && error.message === "Failed to download (Status 404)"
    );
  });

  it("wraps network failures", async () => {
    await assert.rejects(
      downloadDocument("https://docs.example.test/a.pdf", {
        fetch: async () => {
          throw new TypeError("fetch failed");
        }
      }),
      (error: unknown) =>
        error instanceof DownloadError && error.message === "Failed to download https://docs.example.test/a.pdf: fetch failed"
    );
  });

  it("rejects URLs that are not http or https", async () => {
    await assert.rejects(downloadDocument("file:///etc/passwd"), DownloadError);
    await assert.rejects(downloadDocument("not a url"), DownloadError);
  });
});

describe("documentNameFromUrl", () => {
  it("falls back to the host name", () => {
    assert.equal(documentNameFromUrl(new URL("https://example.test/")), "example.test");
  });

  it("keeps a segment with a malformed escape as written", () => {
    assert.equal(documentNameFromUrl(new URL("https://docs.example.test/report%zz.txt")), "report%zz.txt");
  });
});

describe("downloadDocument with a malformed escape", () => {
  it("still fetches the document", async () => {
    const source = await downloadDocument("https://docs.example.test/report%zz.txt", {
      fetch: async () => new Response("Quarterly figures.", { status: 200 })
    });

    assert.equal(source.name, "report%zz.txt");
    assert.equal(new TextDecoder().decode(source.bytes), "Quarterly figures.");
  });
});
