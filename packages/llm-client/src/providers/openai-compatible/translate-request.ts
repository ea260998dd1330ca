/**
 * Translate a CompletionRequest into the OpenAI Chat Completions body.
 *
 * Messages already use the wire shape, so translation is mostly a matter of
 * dropping fields that do not belong on a given role.
 */

import {
  Role,
  type CompletionRequest,
  type Message,
  type ToolDescriptor,
  type ToolChoice,
} from "../../types/index.js";

// ---------------------------------------------------------------------------
// Chat Completions native types
// ---------------------------------------------------------------------------

export interface ChatCompletionMessage {
  role: "system" | "user" | "assistant" | "tool" | "developer";
  content: string | null;
  name?: string;
  tool_calls?: Array<{
    id: string;
    type: "function";
    function: { name: string; arguments: string };
  }>;
  tool_call_id?: string;
}

export interface ChatCompletionRequestBody {
  model: string;
  messages: ChatCompletionMessage[];
  tools?: readonly ToolDescriptor[];
  tool_choice?: ToolChoice;
  n: number;
}

// ---------------------------------------------------------------------------
// Message translation
// ---------------------------------------------------------------------------

function translateMessage(msg: Message): ChatCompletionMessage {
  const chatMsg: ChatCompletionMessage = {
    role: msg.role,
    content: msg.content ?? null,
  };

  if (msg.role === Role.ASSISTANT && msg.tool_calls && msg.tool_calls.length > 0) {
    chatMsg.tool_calls = msg.tool_calls.map((tc) => ({
      id: tc.id,
      type: "function",
      function: { name: tc.function.name, arguments: tc.function.arguments },
    }));
  }

  if (msg.role === Role.TOOL) {
    if (msg.tool_call_id !== undefined) chatMsg.tool_call_id = msg.tool_call_id;
    if (msg.name !== undefined) chatMsg.name = msg.name;
  }

  return chatMsg;
}

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

export function translateRequest(request: CompletionRequest): ChatCompletionRequestBody {
  const body: ChatCompletionRequestBody = {
    model: request.model,
    messages: request.messages.map(translateMessage),
    n: request.n ?? 1,
  };

  if (request.tools && request.tools.length > 0) {
    body.tools = request.tools;
    body.tool_choice = request.tool_choice ?? "auto";
  }

  return body;
}
