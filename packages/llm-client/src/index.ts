export const VERSION = "0.1.0";

// Re-export all types
export * from "./types/index.js";

// Re-export provider utilities
export * from "./utils/index.js";

// Re-export provider adapters
export * from "./providers/index.js";
export {
  NO_API_KEY,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "./providers/openai-compatible/index.js";
