import { CohereClient } from "cohere-ai";
import type { EmbeddingInputType, EmbeddingResult } from "@docsift/types";
import { errorMessage, ExternalServiceError, withRetry } from "@docsift/errors";
import type { Logger } from "@docsift/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

const INPUT_TYPES = {
  document: "search_document",
  query: "search_query",
} as const;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
  logger?: Logger;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private readonly client: CohereClient;
  private readonly logger?: Logger;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.logger = config.logger;
  }

  embed(text: string, inputType: EmbeddingInputType = "query"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    const embeddings: number[][] = [];
    let tokensUsed = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);
      const response = await withRetry(
        async () => {
          try {
            return await this.client.v2.embed({
              texts: batch,
              model: this.model,
              inputType: INPUT_TYPES[inputType],
              embeddingTypes: ["float"],
            });
          } catch (err) {
            throw new ExternalServiceError(`Cohere embed failed: ${errorMessage(err)}`, "cohere", {
              cause: err,
            });
          }
        },
        { maxRetries: 2, baseDelayMs: 500, operation: "cohere.embed", logger: this.logger },
      );

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new ExternalServiceError(
          `Cohere returned ${String(vectors.length)} embeddings for ${String(batch.length)} texts`,
          "cohere",
        );
      }
      embeddings.push(...vectors);
      tokensUsed += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    return { embeddings, model: this.model, tokensUsed, dimensions: this.dimensions };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch (err) {
      this.logger?.warn({ err: errorMessage(err) }, "cohere health check failed");
      return false;
    }
  }
}
