import mammoth from "mammoth";
import type { ExternalTools } from "../external-tool.js";
import type { IFormatStrategy } from "../strategy.interface.js";
import { toolMethod } from "./tool-method.js";

export function createDocxStrategy(tools: ExternalTools): IFormatStrategy {
  return {
    format: "docx",
    methods: [
      {
        name: "mammoth",
        budget: "extraction",
        run: async ({ data }) => {
          const result = await mammoth.extractRawText({ buffer: Buffer.from(data) });
          return { text: result.value };
        },
      },
      toolMethod(tools.office, "extraction"),
    ],
  };
}
