import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

const EXTENSIONS = ["vector", "pg_trgm"];

const CHUNK_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_chunks_embedding_hnsw
     ON chunks USING hnsw (embedding vector_cosine_ops)
     WHERE embedding IS NOT NULL`,
  `CREATE INDEX IF NOT EXISTS idx_chunks_content_trgm
     ON chunks USING gin (content gin_trgm_ops)`,
  `CREATE INDEX IF NOT EXISTS idx_chunks_missing_embedding
     ON chunks (tenant, created_at)
     WHERE embedding IS NULL`,
];

/** Runs `statement` only once the chunks table exists. */
function whenChunksExist(statement: string): string {
  return `DO $$ BEGIN
  IF to_regclass('public.chunks') IS NOT NULL THEN
    EXECUTE $stmt$${statement}$stmt$;
  END IF;
END $$`;
}

/**
 * The extensions the schema needs, then the ANN, trigram and backfill
 * indexes over chunks. Tables come from `npm run db:push` (drizzle-kit),
 * which needs the vector extension first; the index statements are no-ops
 * until the tables exist, so running this before and after the push is safe.
 */
export function getSetupSql(): string[] {
  return [
    ...EXTENSIONS.map((name) => `CREATE EXTENSION IF NOT EXISTS ${name}`),
    ...CHUNK_INDEXES.map(whenChunksExist),
  ];
}

export async function applySetupSql(db: DbClient): Promise<void> {
  for (const statement of getSetupSql()) {
    await db.execute(sql.raw(statement));
  }
}
