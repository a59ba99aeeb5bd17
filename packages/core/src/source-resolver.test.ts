import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ExternalServiceError, ValidationError } from "@docsift/errors";
import { resolveSource } from "./source-resolver.js";

function respond(body: string, init?: ResponseInit): typeof fetch {
  return () => Promise.resolve(new Response(body, init));
}

describe("resolveSource", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  it("takes the extension and title from the file name of a buffer", async () => {
    const resolved = await resolveSource({ kind: "buffer", data: new Uint8Array([1]), fileName: "Report.PDF" });

    expect(resolved).toEqual({
      kind: "binary",
      data: new Uint8Array([1]),
      extension: "pdf",
      fileName: "Report.PDF",
      title: "Report.PDF",
      source: "upload",
    });
  });

  it("reads file sources from disk", async () => {
    const dir = mkdtempSync(join(tmpdir(), "docsift-source-"));
    dirs.push(dir);
    const path = join(dir, "upload.bin");
    writeFileSync(path, "hello");

    const resolved = await resolveSource({ kind: "file", path, fileName: "hello.txt", title: "Greeting" });

    expect(resolved.kind === "binary" && new TextDecoder().decode(resolved.data)).toBe("hello");
    expect(resolved.title).toBe("Greeting");
  });

  it("uses the default source for sources that name none", async () => {
    const resolved = await resolveSource({ kind: "text", text: "body", title: "Pasted" }, { defaultSource: "batch" });

    expect(resolved.source).toBe("batch");
  });

  it("keeps a text source's own origin and metadata", async () => {
    const resolved = await resolveSource({
      kind: "text",
      text: "transcript",
      title: "Talk",
      source: "video",
      metadata: { language: "en" },
    });

    expect(resolved).toEqual({
      kind: "text",
      text: "transcript",
      title: "Talk",
      source: "video",
      metadata: { language: "en" },
    });
  });

  it("rejects empty text", async () => {
    await expect(resolveSource({ kind: "text", text: " \n ", title: "Blank" })).rejects.toThrow("Text is empty");
  });

  it("rejects URLs that are not http(s)", async () => {
    await expect(resolveSource({ kind: "url", url: "ftp://example.com/a.txt" })).rejects.toThrow(ValidationError);
    await expect(resolveSource({ kind: "url", url: "not a url" })).rejects.toThrow("Invalid URL: not a url");
  });

  it("names a fetched page after the host when the path has no file name", async () => {
    const resolved = await resolveSource(
      { kind: "url", url: "https://example.com/about" },
      { fetch: respond("<p>About us</p>", { headers: { "content-type": "text/html" } }) },
    );

    expect(resolved).toMatchObject({
      kind: "binary",
      extension: "html",
      fileName: "example.com.html",
      title: "example.com.html",
      source: "url",
      sourceUrl: "https://example.com/about",
      mimeType: "text/html",
    });
  });

  it("turns HTTP errors into ExternalServiceError", async () => {
    const request = resolveSource(
      { kind: "url", url: "https://example.com/missing.pdf" },
      { fetch: respond("", { status: 404, statusText: "Not Found" }) },
    );

    await expect(request).rejects.toThrow(ExternalServiceError);
    await expect(request).rejects.toThrow("Fetching https://example.com/missing.pdf failed: 404 Not Found");
  });

  it("wraps network failures", async () => {
    const failing: typeof fetch = () => Promise.reject(new Error("ECONNREFUSED"));

    await expect(resolveSource({ kind: "url", url: "https://example.com/a.txt" }, { fetch: failing })).rejects.toThrow(
      "Fetching https://example.com/a.txt failed",
    );
  });

  it("rejects a response whose declared length is over the limit", async () => {
    const request = resolveSource(
      { kind: "url", url: "https://example.com/big.pdf" },
      { fetch: respond("%PDF", { headers: { "content-length": "5000" } }), maxBytes: 100 },
    );

    await expect(request).rejects.toThrow(ValidationError);
    await expect(request).rejects.toThrow("File is 5000 bytes, above the 100 byte limit");
  });

  it("stops reading a body once it passes the limit", async () => {
    let pulls = 0;
    const endless = new ReadableStream<Uint8Array>({
      pull(controller) {
        pulls++;
        controller.enqueue(new Uint8Array(60));
      },
    });
    const streaming: typeof fetch = () => Promise.resolve(new Response(endless));

    await expect(
      resolveSource({ kind: "url", url: "https://example.com/stream.txt" }, { fetch: streaming, maxBytes: 100 }),
    ).rejects.toThrow("Response body is above the 100 byte limit");
    expect(pulls).toBeLessThan(5);
  });

  it("reads a body within the limit", async () => {
    const resolved = await resolveSource(
      { kind: "url", url: "https://example.com/notes.txt" },
      { fetch: respond("hello", { headers: { "content-type": "text/plain" } }), maxBytes: 100 },
    );

    expect(resolved.kind === "binary" ? resolved.data.byteLength : -1).toBe(5);
  });
});
