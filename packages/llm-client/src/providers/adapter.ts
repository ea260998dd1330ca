/**
 * ProviderAdapter: the contract every completion backend implements.
 */

import type { CompletionRequest, CompletionResponse } from "../types/index.js";

/**
 * The contract that every chat-completion backend must implement.
 *
 * The engine only ever talks to this interface, so tests can swap in a
 * scripted fake and deployments can point at any OpenAI-compatible server.
 */
export interface ProviderAdapter {
  /** Provider name, e.g. "openai-compatible". */
  readonly name: string;

  /**
   * Send a request and block until the model finishes.
   *
   * Rejects with an `UpstreamHTTPError` on non-2xx status or transport
   * failure. Never retries.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
