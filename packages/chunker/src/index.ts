export type { IChunker, ChunkInput } from "./chunker.interface.js";
export { WindowChunker } from "./window-chunker.js";
export { ByteWindowChunker } from "./byte-window-chunker.js";
export { StructuredChunker } from "./structured-chunker.js";
export { normalizeText, windowStep } from "./normalize.js";
export {
  FORMAT_CHUNK_DEFAULTS,
  DEFAULT_MIN_CHUNK_LENGTH,
  DEFAULT_BYTE_THRESHOLD,
} from "./defaults.js";
export type { FormatChunkDefaults } from "./defaults.js";
export {
  createChunker,
  chunkDocument,
  chunkText,
  emergencyChunk,
  resolveChunkingOptions,
} from "./factory.js";
export type { ChunkingResult, DocumentChunkInput } from "./factory.js";
