/**
 * Message types for the chat-completion client.
 *
 * Messages mirror the OpenAI chat-completion wire shape directly: a role,
 * optional text, and for assistant turns an ordered list of tool-invocation
 * requests.
 */

import { Role } from "./enums.js";

// ---------------------------------------------------------------------------
// ToolCallRequest
// ---------------------------------------------------------------------------

/** A model-initiated tool invocation carried by an assistant message. */
export interface ToolCallRequest {
  /** Unique identifier (provider-assigned). */
  readonly id: string;
  readonly type: "function";
  readonly function: {
    /** Tool name. */
    readonly name: string;
    /** Raw argument text, expected to be a JSON object. */
    readonly arguments: string;
  };
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

/** One turn in a conversation. */
export interface Message {
  /** Who produced this message. */
  readonly role: Role;
  /** The message text; null for assistant turns that only call tools. */
  readonly content?: string | null;
  /** Tool invocations requested by an assistant turn, in request order. */
  readonly tool_calls?: readonly ToolCallRequest[];
  /** Only for tool messages: the id of the request this result answers. */
  readonly tool_call_id?: string;
  /** Only for tool messages: the tool that produced the result. */
  readonly name?: string;
}

/** An ordered, mutable message history owned by one call chain. */
export type Conversation = Message[];

// ---------------------------------------------------------------------------
// Convenience factory functions
// ---------------------------------------------------------------------------

/** Create a system message from plain text. */
export function createSystemMessage(text: string): Message {
  return { role: Role.SYSTEM, content: text };
}

/** Create a user message from plain text. */
export function createUserMessage(text: string): Message {
  return { role: Role.USER, content: text };
}

/** Create an assistant message, optionally carrying tool calls. */
export function createAssistantMessage(
  text: string | null,
  toolCalls?: readonly ToolCallRequest[],
): Message {
  if (toolCalls && toolCalls.length > 0) {
    return { role: Role.ASSISTANT, content: text, tool_calls: toolCalls };
  }
  return { role: Role.ASSISTANT, content: text };
}

/** Create a tool-result message answering `tool_call_id`. */
export function createToolResultMessage(
  tool_call_id: string,
  name: string,
  content: string,
): Message {
  return { role: Role.TOOL, content, tool_call_id, name };
}

/** Create a tool-invocation request with JSON-encoded arguments. */
export function createToolCall(
  id: string,
  name: string,
  args: Record<string, unknown> | string = {},
): ToolCallRequest {
  return {
    id,
    type: "function",
    function: {
      name,
      arguments: typeof args === "string" ? args : JSON.stringify(args),
    },
  };
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Tool calls requested by a message. A message without `tool_calls` is
 * treated the same as one with an empty list.
 */
export function getMessageToolCalls(message: Message): readonly ToolCallRequest[] {
  return message.tool_calls ?? [];
}

/** Whether a message carries instructions (system or developer role). */
export function isInstructionMessage(message: Message): boolean {
  return message.role === Role.SYSTEM || message.role === Role.DEVELOPER;
}
