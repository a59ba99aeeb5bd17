import { pgTable, text, timestamp, jsonb, integer, index, unique, vector } from "drizzle-orm/pg-core";
import { EMBEDDING_COLUMN_DIMENSIONS, type ChunkMeta } from "@docsift/types";
import { documents } from "./documents.js";

export const chunks = pgTable(
  "chunks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    tenant: text("tenant").notNull(),
    ordinal: integer("ordinal").notNull(),
    content: text("content").notNull(),
    embedding: vector("embedding", { dimensions: EMBEDDING_COLUMN_DIMENSIONS }),
    meta: jsonb("meta").notNull().$type<ChunkMeta>(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique("uq_chunks_document_ordinal").on(table.documentId, table.ordinal),
    index("idx_chunks_tenant_document").on(table.tenant, table.documentId),
  ],
);
