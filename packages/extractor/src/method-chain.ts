import type { MethodAttempt } from "@docsift/types";
import { errorMessage, withTimeout } from "@docsift/errors";
import type { Logger } from "@docsift/logger";
import type { ExtractionInput, ExtractionMethod, MethodOutput } from "./strategy.interface.js";

/** Content longer than this ends the chain. */
export const MIN_CONTENT_CHARS = 50;

export interface ChainResult {
  output: MethodOutput | null;
  method: string | null;
  attempts: MethodAttempt[];
}

/**
 * Try each method under its time budget and stop at the first one whose
 * text passes MIN_CONTENT_CHARS. When none does, the longest non-empty
 * output wins; a failing or timed-out method is recorded and skipped.
 */
export async function runMethodChain(
  methods: readonly ExtractionMethod[],
  input: ExtractionInput,
  logger: Logger,
): Promise<ChainResult> {
  const attempts: MethodAttempt[] = [];
  let best: { output: MethodOutput; method: string } | null = null;

  for (const method of methods) {
    const startedAt = Date.now();
    const timeoutMs = input.timeouts[method.budget];

    try {
      const raw = await withTimeout(method.run(input), timeoutMs, `${input.format}:${method.name}`);
      const output = { ...raw, text: raw.text.trim() };
      const chars = output.text.length;

      attempts.push({ method: method.name, ok: chars > 0, chars, durationMs: Date.now() - startedAt });

      if (chars > MIN_CONTENT_CHARS) {
        return { output, method: method.name, attempts };
      }
      if (chars > 0 && (best === null || chars > best.output.text.length)) {
        best = { output, method: method.name };
      }
    } catch (err) {
      const error = errorMessage(err);
      attempts.push({ method: method.name, ok: false, chars: 0, durationMs: Date.now() - startedAt, error });
      logger.debug({ method: method.name, format: input.format, err: error }, "extraction method failed");
    }
  }

  return { output: best?.output ?? null, method: best?.method ?? null, attempts };
}
