export { envSchema, parseEnv, parseCommand } from "./env.js";
export { INGESTION_PROFILES, resolveIngestionProfile } from "./ingestion-profiles.js";
export { loadJsonResource } from "./resources.js";
