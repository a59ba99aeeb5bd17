import { pgTable, text, timestamp, jsonb, pgEnum, index } from "drizzle-orm/pg-core";
import type { DocumentMetadata } from "@docsift/types";

export const documentSourceEnum = pgEnum("document_source", ["upload", "url", "paste", "video", "batch"]);

export const documents = pgTable(
  "documents",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenant: text("tenant").notNull(),
    title: text("title").notNull(),
    source: documentSourceEnum("source").notNull().default("upload"),
    metadata: jsonb("metadata").notNull().$type<DocumentMetadata>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_documents_tenant_created").on(table.tenant, table.createdAt)],
);
