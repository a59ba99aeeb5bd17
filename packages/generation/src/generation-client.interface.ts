export interface GenerateOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResult {
  text: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Language model behind the answer generator. `contextParts` are the
 * retrieved passages, already formatted; `prompt` is the instruction and
 * question placed after them.
 */
export interface IGenerationClient {
  readonly name: string;
  readonly model: string;
  generate(prompt: string, contextParts: string[], options?: GenerateOptions): Promise<GenerationResult>;
  healthCheck(): Promise<boolean>;
}
