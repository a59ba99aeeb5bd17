import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export type DbRole = "service" | "worker";

export interface DbClientOptions {
  url: string;
  /** Pool size; defaults per role. */
  maxConnections?: number;
  role?: DbRole;
}

// Workers hold connections across long ingestions, so they idle out later.
const POOL_DEFAULTS: Record<DbRole, { max: number; idleTimeout: number }> = {
  service: { max: 20, idleTimeout: 20 },
  worker: { max: 10, idleTimeout: 30 },
};

export function createDbClient(options: DbClientOptions) {
  const defaults = POOL_DEFAULTS[options.role ?? "service"];
  const connection = postgres(options.url, {
    max: options.maxConnections ?? defaults.max,
    idle_timeout: defaults.idleTimeout,
    connect_timeout: 10,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
