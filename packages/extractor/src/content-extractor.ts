import { readFile, stat } from "node:fs/promises";
import type {
  ExtractionFailure,
  ExtractionResult,
  MethodAttempt,
} from "@docsift/types";
import { errorMessage, withTimeout } from "@docsift/errors";
import { createSilentLogger, type Logger } from "@docsift/logger";
import { adaptiveTimeouts } from "./adaptive-timeout.js";
import { formatForExtension, normalizeExtension, SUPPORTED_EXTENSIONS } from "./format.js";
import { detectLanguage } from "./language.js";
import { runMethodChain } from "./method-chain.js";
import { scoreQuality } from "./quality.js";
import type { StrategyRegistry } from "./registry.js";
import type { ExtractionAddition, ExtractionInput } from "./strategy.interface.js";

export interface ContentExtractorOptions {
  maxFileSizeBytes: number;
  strategies: StrategyRegistry;
  logger?: Logger;
}

/** Raw bytes, or a path to read them from. */
export type ExtractionSourceData = Uint8Array | string;

/**
 * Turns a file into text plus metadata. The format comes from the declared
 * extension; unknown extensions use the universal strategy.
 */
export class ContentExtractor {
  private readonly maxFileSizeBytes: number;
  private readonly strategies: StrategyRegistry;
  private readonly logger: Logger;

  constructor(options: ContentExtractorOptions) {
    this.maxFileSizeBytes = options.maxFileSizeBytes;
    this.strategies = options.strategies;
    this.logger = options.logger ?? createSilentLogger();
  }

  get supportedFormats(): string[] {
    return [...SUPPORTED_EXTENSIONS];
  }

  async extract(source: ExtractionSourceData, declaredExtension: string): Promise<ExtractionResult> {
    const extension = normalizeExtension(declaredExtension);
    const format = formatForExtension(extension);
    const fileSize = typeof source === "string" ? (await stat(source)).size : source.byteLength;

    if (fileSize > this.maxFileSizeBytes) {
      return this.failure(
        "too_large",
        `File is ${String(fileSize)} bytes, above the ${String(this.maxFileSizeBytes)} byte limit`,
        [],
      );
    }

    const strategy = this.strategies.get(format) ?? this.strategies.get("universal");
    if (!strategy) {
      return this.failure("no_content", `No extraction strategy for "${extension}"`, []);
    }

    const data = typeof source === "string" ? new Uint8Array(await readFile(source)) : source;
    const input: ExtractionInput = { data, extension, format, fileSize, timeouts: adaptiveTimeouts(fileSize) };

    const chain = await runMethodChain(strategy.methods, input, this.logger);
    if (!chain.output || !chain.method) {
      this.logger.warn({ extension, attempts: chain.attempts }, "no extraction method produced content");
      return this.failure(
        "no_content",
        `No extraction method produced content for "${extension}"`,
        chain.attempts,
      );
    }

    const attempts = [...chain.attempts];
    const additions = await this.runAdditions(strategy.additions ?? [], input, attempts);

    const content = [chain.output.text, ...additions.map((a) => `[${a.heading}]\n${a.text}`)].join("\n\n");
    const language = detectLanguage(content);

    this.logger.info(
      { extension, method: chain.method, chars: content.length, additions: additions.length },
      "content extracted",
    );

    return {
      success: true,
      content,
      qualityScore: scoreQuality(content),
      method: chain.method,
      metadata: {
        format,
        extension,
        fileSize,
        ...(chain.output.pageCount !== undefined ? { pageCount: chain.output.pageCount } : {}),
        ...(language !== "unknown" ? { language } : {}),
        ...(chain.output.structuredData ? { structuredData: chain.output.structuredData } : {}),
        additions: additions.map((a) => a.name),
        attempts,
      },
    };
  }

  /**
   * Best-effort extras. A failure is logged and recorded, never raised.
   */
  private async runAdditions(
    additions: readonly ExtractionAddition[],
    input: ExtractionInput,
    attempts: MethodAttempt[],
  ): Promise<Array<{ name: string; heading: string; text: string }>> {
    const settled = await Promise.allSettled(
      additions.map(async (addition) => {
        const startedAt = Date.now();
        try {
          const text = (
            await withTimeout(addition.run(input), input.timeouts[addition.budget], addition.name)
          ).trim();
          attempts.push({ method: addition.name, ok: text.length > 0, chars: text.length, durationMs: Date.now() - startedAt });
          return { name: addition.name, heading: addition.heading, text };
        } catch (err) {
          attempts.push({
            method: addition.name,
            ok: false,
            chars: 0,
            durationMs: Date.now() - startedAt,
            error: errorMessage(err),
          });
          throw err;
        }
      }),
    );

    const results: Array<{ name: string; heading: string; text: string }> = [];
    settled.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        if (outcome.value.text.length > 0) results.push(outcome.value);
        return;
      }
      this.logger.debug(
        { addition: additions[index]?.name, err: errorMessage(outcome.reason) },
        "extraction addition skipped",
      );
    });
    return results;
  }

  private failure(
    reason: ExtractionFailure["reason"],
    error: string,
    attempts: MethodAttempt[],
  ): ExtractionFailure {
    return { success: false, reason, error, supportedFormats: this.supportedFormats, attempts };
  }
}
