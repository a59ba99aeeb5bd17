import type { DocumentFormat } from "@docsift/types";

const EXTENSION_FORMATS: Readonly<Record<string, DocumentFormat>> = {
  pdf: "pdf",
  docx: "docx",
  doc: "docx",
  odt: "docx",
  rtf: "docx",
  xlsx: "xlsx",
  xls: "xlsx",
  ods: "xlsx",
  csv: "csv",
  tsv: "csv",
  pptx: "pptx",
  ppt: "pptx",
  odp: "pptx",
  html: "html",
  htm: "html",
  xhtml: "html",
  txt: "text",
  md: "text",
  markdown: "text",
  json: "text",
  xml: "text",
  log: "text",
  srt: "text",
  vtt: "text",
  png: "image",
  jpg: "image",
  jpeg: "image",
  tif: "image",
  tiff: "image",
  bmp: "image",
  gif: "image",
  webp: "image",
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_FORMATS);

/** Lower-case, without leading dot or path. "Report.PDF" gives "pdf". */
export function normalizeExtension(declared: string): string {
  const trimmed = declared.trim().toLowerCase();
  const dot = trimmed.lastIndexOf(".");
  return dot >= 0 ? trimmed.slice(dot + 1) : trimmed;
}

export function formatForExtension(extension: string): DocumentFormat {
  return EXTENSION_FORMATS[normalizeExtension(extension)] ?? "universal";
}

const CONTENT_TYPE_EXTENSIONS: ReadonlyArray<[RegExp, string]> = [
  [/application\/pdf/, "pdf"],
  [/wordprocessingml|msword/, "docx"],
  [/spreadsheetml|ms-excel/, "xlsx"],
  [/presentationml|ms-powerpoint/, "pptx"],
  [/text\/csv/, "csv"],
  [/text\/html|application\/xhtml/, "html"],
  [/^image\/(png|jpe?g|tiff|bmp|gif|webp)/, "image"],
  [/^text\//, "txt"],
  [/application\/json/, "json"],
];

/**
 * Extension to use for a fetched resource: the URL path's own extension
 * when it is known, else one derived from the Content-Type header.
 */
export function extensionForResource(url: string, contentType: string | null): string {
  const pathname = new URL(url).pathname;
  const fromPath = normalizeExtension(pathname.split("/").pop() ?? "");
  if (fromPath !== "" && fromPath in EXTENSION_FORMATS) return fromPath;

  const type = (contentType ?? "").toLowerCase();
  for (const [pattern, extension] of CONTENT_TYPE_EXTENSIONS) {
    if (pattern.test(type)) {
      return extension === "image" ? (type.split("/")[1]?.split(";")[0] ?? "png") : extension;
    }
  }
  return "html";
}
