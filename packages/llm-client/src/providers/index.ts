/**
 * Barrel re-export for provider adapters.
 */

// Adapter interface
export type { ProviderAdapter } from "./adapter.js";

// OpenAI-compatible adapter (Chat Completions API)
export { OpenAICompatibleAdapter } from "./openai-compatible/index.js";
export type { OpenAICompatibleAdapterOptions } from "./openai-compatible/index.js";
