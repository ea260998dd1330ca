/**
 * Request types for the chat-completion client.
 */

import type { Message } from "./message.js";
import type { ToolChoice, ToolDescriptor } from "./tool.js";

// ---------------------------------------------------------------------------
// CompletionRequest
// ---------------------------------------------------------------------------

/**
 * The single input type for `ProviderAdapter.complete()`.
 */
export interface CompletionRequest {
  /** Required; model identifier sent upstream. */
  readonly model: string;
  /** Required; the conversation. */
  readonly messages: readonly Message[];
  /** Tool catalog offered to the model. */
  readonly tools?: readonly ToolDescriptor[];
  /** Sent only together with `tools`. */
  readonly tool_choice?: ToolChoice;
  /** Number of choices; the engine always asks for one. */
  readonly n?: number;
}
