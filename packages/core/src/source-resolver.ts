import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import type { DocumentMetadata, DocumentSource, IngestionSource } from "@docsift/types";
import { ExternalServiceError, ValidationError } from "@docsift/errors";
import { extensionForResource, normalizeExtension } from "@docsift/extractor";

export interface BinarySource {
  kind: "binary";
  data: Uint8Array;
  extension: string;
  fileName: string;
  title: string;
  source: DocumentSource;
  mimeType?: string;
  sourceUrl?: string;
}

export interface TextSource {
  kind: "text";
  text: string;
  title: string;
  source: DocumentSource;
  metadata: DocumentMetadata;
}

export type ResolvedSource = BinarySource | TextSource;

export interface ResolveSourceOptions {
  fetch?: typeof fetch;
  /** Origin recorded when the source does not name one ("batch" inside ingestBatch). */
  defaultSource?: DocumentSource;
  /** Largest response body read from a URL. */
  maxBytes?: number;
}

function tooLarge(size: number | undefined, maxBytes: number): ValidationError {
  const what = size === undefined ? "Response body is" : `File is ${String(size)} bytes,`;
  return new ValidationError(`${what} above the ${String(maxBytes)} byte limit`, { file: "too large" });
}

function fileNameFromUrl(url: URL, extension: string): string {
  const last = url.pathname.split("/").filter((part) => part.length > 0).pop();
  return last !== undefined && last.includes(".") ? decodeURIComponent(last) : `${url.hostname}.${extension}`;
}

/**
 * Turn any ingestion source into bytes with an extension, or plain text
 * that skips extraction. URLs are fetched here.
 */
export async function resolveSource(
  input: IngestionSource,
  options: ResolveSourceOptions = {},
): Promise<ResolvedSource> {
  switch (input.kind) {
    case "buffer":
      return {
        kind: "binary",
        data: input.data,
        extension: normalizeExtension(input.fileName),
        fileName: input.fileName,
        title: input.title ?? input.fileName,
        source: input.source ?? options.defaultSource ?? "upload",
      };

    case "file":
      return {
        kind: "binary",
        data: new Uint8Array(await readFile(input.path)),
        extension: normalizeExtension(input.fileName),
        fileName: input.fileName,
        title: input.title ?? input.fileName,
        source: input.source ?? options.defaultSource ?? "upload",
      };

    case "text":
      if (input.text.trim().length === 0) {
        throw new ValidationError("Text is empty", { text: "must not be empty" });
      }
      return {
        kind: "text",
        text: input.text,
        title: input.title,
        source: input.source ?? options.defaultSource ?? "paste",
        metadata: input.metadata ?? {},
      };

    case "url":
      return fetchUrl(input.url, input.title, options.fetch ?? fetch, options.maxBytes);

    default:
      throw new ValidationError("Unknown source kind", { kind: "unsupported" });
  }
}

async function fetchUrl(
  url: string,
  title: string | undefined,
  fetchImpl: typeof fetch,
  maxBytes = Number.POSITIVE_INFINITY,
): Promise<BinarySource> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ValidationError(`Invalid URL: ${url}`, { url: "must be an absolute http(s) URL" });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new ValidationError(`Invalid URL: ${url}`, { url: "must be an absolute http(s) URL" });
  }

  let response: Response;
  try {
    response = await fetchImpl(parsed.toString());
  } catch (err) {
    throw new ExternalServiceError(`Fetching ${url} failed`, "url-fetch", { cause: err });
  }
  if (!response.ok) {
    throw new ExternalServiceError(
      `Fetching ${url} failed: ${String(response.status)} ${response.statusText}`,
      "url-fetch",
    );
  }

  const declared = Number(response.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > maxBytes) {
    await response.body?.cancel();
    throw tooLarge(declared, maxBytes);
  }
  const data = await readBody(response, maxBytes);

  const contentType = response.headers.get("content-type");
  const extension = extensionForResource(parsed.toString(), contentType);
  const fileName = fileNameFromUrl(parsed, extension);

  return {
    kind: "binary",
    data,
    extension,
    fileName: basename(fileName),
    title: title ?? fileName,
    source: "url",
    sourceUrl: parsed.toString(),
    ...(contentType !== null ? { mimeType: contentType.split(";")[0]?.trim() ?? contentType } : {}),
  };
}

/** Reads the body, stopping as soon as it passes `maxBytes`. */
async function readBody(response: Response, maxBytes: number): Promise<Uint8Array> {
  if (!response.body) return new Uint8Array();

  const reader = response.body.getReader();
  const parts: Uint8Array[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw tooLarge(undefined, maxBytes);
    }
    parts.push(value);
  }
  return new Uint8Array(Buffer.concat(parts));
}
