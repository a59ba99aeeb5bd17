import type { ConnectionOptions } from "bullmq";

const DEFAULT_REDIS_PORT = 6379;

/**
 * BullMQ connection options from a redis:// or rediss:// URL. Workers need
 * `maxRetriesPerRequest: null` so blocking commands are never cut short.
 */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  const db = Number(parsed.pathname.replace(/^\//, ""));

  return {
    host: parsed.hostname,
    port: Number(parsed.port) || DEFAULT_REDIS_PORT,
    ...(parsed.username ? { username: decodeURIComponent(parsed.username) } : {}),
    ...(parsed.password ? { password: decodeURIComponent(parsed.password) } : {}),
    ...(Number.isInteger(db) && db > 0 ? { db } : {}),
    ...(parsed.protocol === "rediss:" ? { tls: {} } : {}),
    maxRetriesPerRequest: null,
  };
}
