import { pgTable, text, timestamp, smallint, index } from "drizzle-orm/pg-core";
import type { FeedbackRating } from "@docsift/types";
import { documents } from "./documents.js";

// Append-only
export const feedback = pgTable(
  "feedback",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenant: text("tenant").notNull(),
    query: text("query").notNull(),
    documentId: text("document_id").references(() => documents.id, { onDelete: "set null" }),
    rating: smallint("rating").notNull().$type<FeedbackRating>(),
    comment: text("comment"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_feedback_tenant_created").on(table.tenant, table.createdAt)],
);
