import type { ExtractionMethod, IFormatStrategy } from "../strategy.interface.js";

/** UTF-8 with replacement characters; never throws. */
export function decodeText(data: Uint8Array): string {
  return new TextDecoder("utf-8").decode(data);
}

export const utf8Method: ExtractionMethod = {
  name: "utf8",
  budget: "extraction",
  run: ({ data }) => Promise.resolve({ text: new TextDecoder("utf-8", { fatal: true }).decode(data) }),
};

export const latin1Method: ExtractionMethod = {
  name: "latin1",
  budget: "extraction",
  run: ({ data }) => Promise.resolve({ text: new TextDecoder("latin1").decode(data) }),
};

export function createTextStrategy(): IFormatStrategy {
  return { format: "text", methods: [utf8Method, latin1Method] };
}
