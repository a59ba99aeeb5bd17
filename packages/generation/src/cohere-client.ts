import { CohereClient } from "cohere-ai";
import { errorMessage, ExternalServiceError, withRetry } from "@docsift/errors";
import type { Logger } from "@docsift/logger";
import type { GenerateOptions, GenerationResult, IGenerationClient } from "./generation-client.interface.js";

const DEFAULT_MODEL = "command-r-08-2024";
const DEFAULT_TEMPERATURE = 0.2;

export type CohereChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export interface CohereChatRequest {
  model: string;
  messages: CohereChatMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface CohereChatResponse {
  message?: {
    content?: Array<{ type: string; text?: string }>;
  };
  usage?: {
    tokens?: { inputTokens?: number; outputTokens?: number };
  };
}

/** The slice of the Cohere v2 API this client calls. */
export interface CohereChatApi {
  chat(request: CohereChatRequest): Promise<CohereChatResponse>;
}

export interface CohereGenerationConfig {
  apiKey: string;
  model?: string;
  /** Replaces the SDK client, for tests. */
  api?: CohereChatApi;
  logger?: Logger;
}

export class CohereGenerationClient implements IGenerationClient {
  readonly name = "cohere";
  readonly model: string;
  private readonly api: CohereChatApi;
  private readonly logger?: Logger;

  constructor(config: CohereGenerationConfig) {
    this.api = config.api ?? new CohereClient({ token: config.apiKey }).v2;
    this.model = config.model ?? DEFAULT_MODEL;
    this.logger = config.logger;
  }

  async generate(prompt: string, contextParts: string[], options?: GenerateOptions): Promise<GenerationResult> {
    const messages: CohereChatMessage[] = [];
    if (options?.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: [...contextParts, prompt].join("\n\n") });

    const response = await withRetry(
      async () => {
        try {
          return await this.api.chat({
            model: this.model,
            messages,
            temperature: options?.temperature ?? DEFAULT_TEMPERATURE,
            ...(options?.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
          });
        } catch (err) {
          throw new ExternalServiceError(`Cohere chat failed: ${errorMessage(err)}`, "cohere", { cause: err });
        }
      },
      { maxRetries: 1, baseDelayMs: 500, operation: "cohere.chat", logger: this.logger },
    );

    const text = (response.message?.content ?? [])
      .map((item) => (item.type === "text" ? (item.text ?? "") : ""))
      .join("")
      .trim();

    return {
      text,
      model: this.model,
      inputTokens: response.usage?.tokens?.inputTokens ?? 0,
      outputTokens: response.usage?.tokens?.outputTokens ?? 0,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generate("Reply with OK.", [], { maxTokens: 5 });
      return true;
    } catch (err) {
      this.logger?.warn({ err: errorMessage(err) }, "cohere chat health check failed");
      return false;
    }
  }
}
