import { parse } from "node-html-parser";
import type { IFormatStrategy } from "../strategy.interface.js";
import { decodeText } from "./text.js";

export function stripHtml(html: string): string {
  return html
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, "")
    .replace(/<[^>]+>/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function createHtmlStrategy(): IFormatStrategy {
  return {
    format: "html",
    methods: [
      {
        name: "html-parser",
        budget: "extraction",
        run: ({ data }) => {
          const root = parse(decodeText(data));
          for (const node of root.querySelectorAll("script, style, noscript, template")) {
            node.remove();
          }
          return Promise.resolve({ text: root.structuredText });
        },
      },
      {
        name: "tag-strip",
        budget: "extraction",
        run: ({ data }) => Promise.resolve({ text: stripHtml(decodeText(data)) }),
      },
    ],
  };
}
