import type { AppConfig } from "@docsift/types";
import type { Logger } from "@docsift/logger";
import type { IGenerationClient } from "./generation-client.interface.js";
import { CohereGenerationClient } from "./cohere-client.js";

export function createGenerationClient(
  config: Pick<AppConfig, "embeddings" | "generation">,
  logger?: Logger,
): IGenerationClient {
  return new CohereGenerationClient({
    apiKey: config.embeddings.cohereApiKey,
    model: config.generation.cohereModel,
    logger,
  });
}
