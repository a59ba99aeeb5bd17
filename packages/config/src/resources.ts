import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { z } from "zod";

/**
 * Read a JSON data file shipped beside a package and validate it.
 * Callers pass `new URL("../data/name.json", import.meta.url)`.
 */
export function loadJsonResource<T>(url: URL, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const raw = readFileSync(fileURLToPath(url), "utf8");
  const result = schema.safeParse(JSON.parse(raw));
  if (!result.success) {
    throw new Error(`Invalid resource ${url.pathname}: ${result.error.message}`);
  }
  return result.data;
}
