export interface PdfText {
  text: string;
  pageCount: number;
}

export interface IPdfReader {
  readText(data: Uint8Array): Promise<PdfText>;
  countPages(data: Uint8Array): Promise<number>;
}

type PdfjsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");

let pdfjs: Promise<PdfjsModule> | undefined;

function loadPdfjs(): Promise<PdfjsModule> {
  pdfjs ??= import("pdfjs-dist/legacy/build/pdf.mjs");
  return pdfjs;
}

/**
 * Text layer reader on pdf.js (legacy build, which runs in Node without a
 * DOM). Loaded on first use.
 */
export class PdfjsReader implements IPdfReader {
  private async open(data: Uint8Array) {
    const { getDocument } = await loadPdfjs();
    // pdf.js takes ownership of the buffer it is given
    return getDocument({ data: new Uint8Array(data), isEvalSupported: false, useSystemFonts: true })
      .promise;
  }

  async readText(data: Uint8Array): Promise<PdfText> {
    const doc = await this.open(data);
    try {
      const pages: string[] = [];
      for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        const text = content.items
          .map((item) => ("str" in item ? `${item.str}${item.hasEOL ? "\n" : " "}` : ""))
          .join("")
          .replace(/[ \t]+/g, " ")
          .trim();
        pages.push(text);
        page.cleanup();
      }
      return { text: pages.join("\n\n"), pageCount: doc.numPages };
    } finally {
      await doc.destroy();
    }
  }

  async countPages(data: Uint8Array): Promise<number> {
    const doc = await this.open(data);
    try {
      return doc.numPages;
    } finally {
      await doc.destroy();
    }
  }
}
