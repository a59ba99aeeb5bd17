import type { ScopePolicy, SearchOptions } from "@docsift/types";
import { SEARCH_OPTION_ALLOWLIST } from "@docsift/types";
import { ValidationError } from "@docsift/errors";

const MAX_RESULT_LIMIT = 500;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function positiveInteger(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > MAX_RESULT_LIMIT) {
    throw new ValidationError(`search.${key} must be an integer between 1 and ${String(MAX_RESULT_LIMIT)}`, {
      [key]: "out of range",
    });
  }
  return value;
}

function unitInterval(key: string, value: unknown): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0 || value > 1) {
    throw new ValidationError(`search.${key} must be a number between 0 and 1`, { [key]: "out of range" });
  }
  return value;
}

function flag(key: string, value: unknown): boolean {
  if (typeof value !== "boolean") {
    throw new ValidationError(`search.${key} must be a boolean`, { [key]: "not a boolean" });
  }
  return value;
}

/**
 * Allowlist-only validation of caller-supplied search options. Unknown
 * keys are rejected rather than ignored; undefined values are dropped.
 */
export function validateSearchOptions(options: unknown): SearchOptions {
  if (options === undefined) return {};
  if (!isPlainObject(options)) {
    throw new ValidationError("Search options must be a plain object");
  }

  const allowedFields = new Set<string>(SEARCH_OPTION_ALLOWLIST);
  for (const key of Object.keys(options)) {
    if (!allowedFields.has(key)) {
      throw new ValidationError(
        `Invalid search option: "${key}". Allowed options: ${[...allowedFields].join(", ")}`,
        { [key]: "unknown option" },
      );
    }
  }

  const result: SearchOptions = {};
  const { limit, vectorLimit, keywordLimit, maxPerDocument } = options;
  if (limit !== undefined) result.limit = positiveInteger("limit", limit);
  if (vectorLimit !== undefined) result.vectorLimit = positiveInteger("vectorLimit", vectorLimit);
  if (keywordLimit !== undefined) result.keywordLimit = positiveInteger("keywordLimit", keywordLimit);
  if (maxPerDocument !== undefined) result.maxPerDocument = positiveInteger("maxPerDocument", maxPerDocument);

  const { vectorWeight, keywordWeight, similarityThreshold } = options;
  if (vectorWeight !== undefined) result.vectorWeight = unitInterval("vectorWeight", vectorWeight);
  if (keywordWeight !== undefined) result.keywordWeight = unitInterval("keywordWeight", keywordWeight);
  if (similarityThreshold !== undefined) {
    result.similarityThreshold = unitInterval("similarityThreshold", similarityThreshold);
  }

  const { rerank, diversify } = options;
  if (rerank !== undefined) result.rerank = flag("rerank", rerank);
  if (diversify !== undefined) result.diversify = flag("diversify", diversify);

  const { documentIds, scope } = options;
  if (documentIds !== undefined) {
    if (!Array.isArray(documentIds)) {
      throw new ValidationError("search.documentIds must be an array of strings", { documentIds: "not an array" });
    }
    const ids: string[] = [];
    for (const id of documentIds) {
      if (typeof id !== "string" || id.length === 0) {
        throw new ValidationError("Each documentId must be a non-empty string", { documentIds: "invalid id" });
      }
      ids.push(id);
    }
    result.documentIds = ids;
  }

  if (scope !== undefined) {
    if (scope !== "explicit" && scope !== "latest") {
      throw new ValidationError('search.scope must be "explicit" or "latest"', { scope: "invalid" });
    }
    const policy: ScopePolicy = scope;
    result.scope = policy;
  }

  return result;
}
