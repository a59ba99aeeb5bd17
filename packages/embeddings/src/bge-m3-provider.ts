import { z } from "zod";
import type { EmbeddingInputType, EmbeddingResult } from "@docsift/types";
import { errorMessage, ExternalServiceError } from "@docsift/errors";
import type { Logger } from "@docsift/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_DIMENSIONS = 1024;

export interface BgeM3ProviderConfig {
  baseUrl: string;
  dimensions?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const responseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
  tokens_used: z.number().default(0),
});

/**
 * Self-hosted BGE-M3 model server over HTTP (`POST /embed`, `GET /health`).
 */
export class BgeM3EmbeddingProvider implements IEmbeddingProvider {
  readonly name = "bge-m3";
  readonly model = "bge-m3";
  readonly dimensions: number;
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger?: Logger;

  constructor(config: BgeM3ProviderConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
    this.fetchFn = config.fetch ?? fetch;
    this.logger = config.logger;
  }

  embed(text: string, inputType: EmbeddingInputType = "query"): Promise<EmbeddingResult> {
    return this.batchEmbed([text], inputType);
  }

  async batchEmbed(texts: string[], inputType: EmbeddingInputType = "document"): Promise<EmbeddingResult> {
    const response = await this.fetchFn(`${this.baseUrl}/embed`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ texts, dimensions: this.dimensions, input_type: inputType }),
    });

    if (!response.ok) {
      throw new ExternalServiceError(
        `BGE-M3 embedding failed: ${String(response.status)} ${response.statusText}`,
        "bge-m3",
      );
    }

    const parsed = responseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ExternalServiceError(`BGE-M3 returned an unexpected body: ${parsed.error.message}`, "bge-m3");
    }

    return {
      embeddings: parsed.data.embeddings,
      model: this.model,
      tokensUsed: parsed.data.tokens_used,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchFn(`${this.baseUrl}/health`);
      return response.ok;
    } catch (err) {
      this.logger?.warn({ err: errorMessage(err) }, "bge-m3 health check failed");
      return false;
    }
  }
}
