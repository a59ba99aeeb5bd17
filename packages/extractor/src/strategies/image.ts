import type { ExternalTools } from "../external-tool.js";
import type { IFormatStrategy } from "../strategy.interface.js";
import { toolMethod } from "./tool-method.js";

export function createImageStrategy(tools: ExternalTools): IFormatStrategy {
  return { format: "image", methods: [toolMethod(tools.ocr, "ocr")] };
}
