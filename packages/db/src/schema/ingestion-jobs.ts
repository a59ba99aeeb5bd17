import { pgTable, text, timestamp, jsonb, integer, pgEnum, index } from "drizzle-orm/pg-core";
import type { IngestionOutcome } from "@docsift/types";

export const jobStatusEnum = pgEnum("ingestion_job_status", ["queued", "processing", "completed", "failed"]);

export const ingestionJobs = pgTable(
  "ingestion_jobs",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenant: text("tenant").notNull(),
    status: jobStatusEnum("status").notNull().default("queued"),
    progress: integer("progress").notNull().default(0),
    result: jsonb("result").$type<IngestionOutcome>(),
    error: text("error"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index("idx_ingestion_jobs_tenant").on(table.tenant, table.createdAt)],
);
