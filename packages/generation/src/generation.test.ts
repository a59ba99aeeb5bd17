import { describe, it, expect, vi } from "vitest";
import { ExternalServiceError } from "@docsift/errors";
import { CohereGenerationClient } from "./cohere-client.js";
import type { CohereChatApi } from "./cohere-client.js";
import { createGenerationClient } from "./factory.js";

function fakeApi(chat: CohereChatApi["chat"]): CohereChatApi {
  return { chat };
}

describe("CohereGenerationClient", () => {
  it("sends the system prompt and joins context before the prompt", async () => {
    const chat = vi.fn<CohereChatApi["chat"]>().mockResolvedValue({
      message: { content: [{ type: "text", text: " The refund window is 30 days. " }] },
      usage: { tokens: { inputTokens: 120, outputTokens: 9 } },
    });
    const client = new CohereGenerationClient({ apiKey: "test-secret", api: fakeApi(chat) });

    const result = await client.generate("Question: refund window?", ["[1] Refunds within 30 days."], {
      systemPrompt: "Answer from context only.",
      maxTokens: 200,
    });

    expect(result).toEqual({
      text: "The refund window is 30 days.",
      model: "command-r-08-2024",
      inputTokens: 120,
      outputTokens: 9,
    });
    expect(chat).toHaveBeenCalledWith({
      model: "command-r-08-2024",
      messages: [
        { role: "system", content: "Answer from context only." },
        { role: "user", content: "[1] Refunds within 30 days.\n\nQuestion: refund window?" },
      ],
      temperature: 0.2,
      maxTokens: 200,
    });
  });

  it("returns empty text when the model sends no text items", async () => {
    const client = new CohereGenerationClient({
      apiKey: "test-secret",
      api: fakeApi(vi.fn<CohereChatApi["chat"]>().mockResolvedValue({ message: { content: [] } })),
    });

    const result = await client.generate("hi", []);
    expect(result.text).toBe("");
    expect(result.inputTokens).toBe(0);
  });

  it("wraps SDK failures in ExternalServiceError", async () => {
    const chat = vi.fn<CohereChatApi["chat"]>().mockRejectedValue(new Error("socket hang up"));
    const client = new CohereGenerationClient({ apiKey: "test-secret", api: fakeApi(chat) });

    const error = await client.generate("hi", []).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({ message: "Cohere chat failed: socket hang up", service: "cohere" });
    expect(chat).toHaveBeenCalledTimes(2);
  });

  it("reports unhealthy when the call fails", async () => {
    const client = new CohereGenerationClient({
      apiKey: "test-secret",
      model: "command-a",
      api: fakeApi(vi.fn<CohereChatApi["chat"]>().mockRejectedValue(new ExternalServiceError("down", "cohere"))),
    });
    await expect(client.healthCheck()).resolves.toBe(false);
  });
});

describe("createGenerationClient", () => {
  it("uses the configured chat model", () => {
    const client = createGenerationClient({
      embeddings: {
        provider: "cohere",
        dimensions: 1024,
        cohereApiKey: "test-secret",
        cohereModel: "embed-v4.0",
        cacheMaxEntries: 10,
        cacheTtlMs: 1000,
      },
      generation: {
        cohereModel: "command-r-plus",
        timeoutMs: 1000,
        fallbackSummaryChars: 100,
        transcriptCharBudget: 1000,
      },
    });
    expect(client.name).toBe("cohere");
    expect(client.model).toBe("command-r-plus");
  });
});
