import type { DocumentFormat } from "@docsift/types";
import type { ExternalTools } from "../external-tool.js";
import type { ExtractionMethod, IFormatStrategy } from "../strategy.interface.js";
import { toolMethod } from "./tool-method.js";
import { decodeText } from "./text.js";

const PRINTABLE_RUN = /[\p{L}\p{N}\p{P}\p{Zs}]{4,}/gu;

/**
 * Keep runs of at least four printable characters, the way `strings` does.
 */
export function salvagePrintable(data: Uint8Array): string {
  const runs = decodeText(data).match(PRINTABLE_RUN) ?? [];
  return runs
    .map((run) => run.trim())
    .filter((run) => run.length >= 4)
    .join("\n");
}

export const printableMethod: ExtractionMethod = {
  name: "printable-text",
  budget: "extraction",
  run: ({ data }) => Promise.resolve({ text: salvagePrintable(data) }),
};

/** Office converter, then printable salvage. Also serves presentations. */
export function createUniversalStrategy(
  tools: ExternalTools,
  format: Extract<DocumentFormat, "universal" | "pptx"> = "universal",
): IFormatStrategy {
  return { format, methods: [toolMethod(tools.office, "extraction"), printableMethod] };
}
