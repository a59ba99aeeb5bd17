export type { IGenerationClient, GenerateOptions, GenerationResult } from "./generation-client.interface.js";
export { CohereGenerationClient } from "./cohere-client.js";
export type {
  CohereChatApi,
  CohereChatMessage,
  CohereChatRequest,
  CohereChatResponse,
  CohereGenerationConfig,
} from "./cohere-client.js";
export { createGenerationClient } from "./factory.js";
