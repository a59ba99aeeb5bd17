import { pgTable, text, timestamp, jsonb, doublePrecision, index } from "drizzle-orm/pg-core";
import type { MetricName } from "@docsift/types";

export const ragMetrics = pgTable(
  "rag_metrics",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenant: text("tenant").notNull(),
    name: text("name").notNull().$type<MetricName>(), // e.g. "query_latency_ms", "job_transition"
    value: doublePrecision("value").notNull(),
    tags: jsonb("tags").notNull().$type<Record<string, string | number | boolean>>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_rag_metrics_tenant_name_created").on(table.tenant, table.name, table.createdAt)],
);
