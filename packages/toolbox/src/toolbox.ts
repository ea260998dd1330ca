/**
 * Toolbox: the conversation engine.
 *
 * Drives one conversation against an OpenAI-compatible endpoint:
 *
 *   normalize -> model call -> tool execution -> model call -> ... -> answer
 *
 * The conversation passed in is owned by the call chain and mutated in
 * place: assistant and tool messages are appended as they happen.
 */

import type {
  CompletionRequest,
  CompletionResponse,
  Conversation,
  Message,
  ProviderAdapter,
  ToolCallRequest,
  ToolDescriptor,
} from "@toolchat/llm-client";
import {
  ConfigurationError,
  DEFAULT_REQUEST_TIMEOUT_MS,
  NO_API_KEY,
  OpenAICompatibleAdapter,
  Role,
  createAssistantMessage,
  createSystemMessage,
  createToolResultMessage,
  getFirstChoice,
  getMessageToolCalls,
  isInstructionMessage,
} from "@toolchat/llm-client";
import { ToolInvocationError, ToolRoundLimitError } from "./errors.js";
import { FanOutCoordinator } from "./fan-out.js";
import type { FanOutErrorPolicy } from "./fan-out.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { ToolRegistry } from "./tool-registry.js";
import type {
  ConversationResult,
  GetResponseOptions,
  ToolCollection,
  ToolErrorPayload,
  ToolOutcome,
} from "./types.js";

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export const DEFAULT_MAX_TOOL_ROUNDS = 10;
export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ToolboxOptions {
  /** Model identifier sent with every request. */
  model: string;
  /** Backend adapter. When omitted one is built from `rootUrl`. */
  adapter?: ProviderAdapter;
  /** API root of an OpenAI-compatible endpoint, e.g. `http://localhost:8080/v1/`. */
  rootUrl?: string;
  apiKey?: string;
  /** Instruction placed at the head of every conversation. */
  systemPrompt?: string;
  /** Stop at the first tool error and return it instead of feeding it back. */
  failOnToolError?: boolean;
  /** Tool-call rounds allowed per `getResponse` call. */
  maxToolRounds?: number;
  /** Per-tool-call timeout in milliseconds. */
  toolTimeoutMs?: number;
  /** Per-model-call timeout in milliseconds; used when building the adapter. */
  requestTimeoutMs?: number;
  fanOutErrorPolicy?: FanOutErrorPolicy;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Normalize the instruction messages of a conversation, in place.
 *
 * Every system and developer message is removed. The configured prompt is
 * then placed at index 0; without one, the first instruction message the
 * client sent is kept there instead. Applying it twice changes nothing.
 */
export function normalizeConversation(
  conversation: Conversation,
  systemPrompt?: string,
): Conversation {
  const clientInstruction = conversation.find(isInstructionMessage);

  const rest = conversation.filter((message) => !isInstructionMessage(message));
  conversation.length = 0;

  if (systemPrompt) {
    conversation.push(createSystemMessage(systemPrompt));
  } else if (clientInstruction) {
    conversation.push(clientInstruction);
  }
  conversation.push(...rest);
  return conversation;
}

/** Whether a tool result reports a failure through an `error` field. */
export function isToolErrorPayload(value: unknown): value is ToolErrorPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    "error" in value &&
    Boolean(value.error)
  );
}

/** JSON text of a tool result. `undefined` results are sent as `null`. */
export function serializeToolResult(value: unknown): string {
  const text: string | undefined = JSON.stringify(value);
  return text ?? "null";
}

// ---------------------------------------------------------------------------
// Toolbox
// ---------------------------------------------------------------------------

export class Toolbox {
  readonly model: string;
  readonly systemPrompt: string | undefined;
  readonly failOnToolError: boolean;
  readonly maxToolRounds: number;
  readonly toolTimeoutMs: number;
  readonly registry: ToolRegistry;

  private readonly adapter: ProviderAdapter;
  private readonly logger: Logger;
  private readonly fanOut: FanOutCoordinator;

  /**
   * @throws SchemaGenerationError when a tool cannot be described.
   * @throws ConfigurationError when neither `adapter` nor `rootUrl` is given.
   */
  constructor(tools: ToolCollection, options: ToolboxOptions) {
    this.logger = options.logger ?? createLogger("toolbox");
    this.model = options.model;
    this.systemPrompt = options.systemPrompt || undefined;
    this.failOnToolError = options.failOnToolError ?? false;
    this.maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    this.toolTimeoutMs = options.toolTimeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;

    if (options.adapter) {
      this.adapter = options.adapter;
    } else if (options.rootUrl) {
      this.adapter = new OpenAICompatibleAdapter({
        baseUrl: options.rootUrl,
        apiKey: options.apiKey ?? NO_API_KEY,
        timeout: options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      });
    } else {
      throw new ConfigurationError("Toolbox needs either an adapter or a rootUrl");
    }

    if (!this.systemPrompt) {
      this.logger.warn("No system prompt provided. Was this deliberate?");
    }

    this.logger.debug("Generating tool descriptors");
    this.registry = ToolRegistry.fromCollection(tools);

    this.fanOut = new FanOutCoordinator(
      (conversation) => this.getResponse(conversation),
      { errorPolicy: options.fanOutErrorPolicy, logger: this.logger },
    );
  }

  /** Descriptors offered to the model, in collection order. */
  get descriptors(): ToolDescriptor[] {
    return this.registry.descriptors();
  }

  /**
   * Build the request for the current state of a conversation.
   *
   * Tools are offered unless there are none or the last message is a tool
   * result, in which case the model is expected to answer in text.
   */
  buildRequest(conversation: readonly Message[]): CompletionRequest {
    const last = conversation[conversation.length - 1];
    const tools = this.registry.descriptors();
    const offerTools = tools.length > 0 && last?.role !== Role.TOOL;

    return {
      model: this.model,
      messages: [...conversation],
      ...(offerTools ? { tools, tool_choice: "auto" as const } : {}),
      n: 1,
    };
  }

  /**
   * Run a conversation until the model answers without requesting tools.
   *
   * @throws UpstreamHTTPError when the backend call fails.
   * @throws ToolRoundLimitError when the model keeps requesting tools past
   *   `maxToolRounds` rounds.
   */
  async getResponse(
    conversation: Conversation,
    options: GetResponseOptions = {},
  ): Promise<ConversationResult> {
    const autoToolCall = options.autoToolCall ?? true;
    const failOnToolError = options.failOnToolError ?? this.failOnToolError;
    let rounds = 0;

    while (true) {
      normalizeConversation(conversation, this.systemPrompt);
      const request = this.buildRequest(conversation);

      this.logger.debug(
        { adapter: this.adapter.name, messages: request.messages.length },
        "Requesting completion",
      );
      const response: CompletionResponse = await this.adapter.complete(request);
      this.logger.debug({ id: response.id }, "Received completion");

      const { message } = getFirstChoice(response);
      const toolCalls = getMessageToolCalls(message);
      conversation.push(createAssistantMessage(message.content ?? null, toolCalls));

      if (!autoToolCall || toolCalls.length === 0) {
        return { status: "done", response };
      }

      rounds++;
      if (rounds > this.maxToolRounds) {
        throw new ToolRoundLimitError(this.maxToolRounds);
      }

      for (const toolCall of toolCalls) {
        const failure = await this.runToolCall(conversation, toolCall);
        if (failure && failOnToolError) {
          return { status: "failed", error: failure, toolCall };
        }
      }
    }
  }

  /**
   * Run the conversation `n` times concurrently on copies and merge the
   * answers into one envelope with `n` choices.
   */
  async getNResponses(conversation: readonly Message[], n: number): Promise<CompletionResponse> {
    return this.fanOut.getNResponses(conversation, n);
  }

  /**
   * Invoke one requested tool and append its result message.
   * Returns the error payload when the call failed.
   */
  private async runToolCall(
    conversation: Conversation,
    toolCall: ToolCallRequest,
  ): Promise<ToolErrorPayload | undefined> {
    const { name, arguments: argsJson } = toolCall.function;
    this.logger.debug({ tool: name, arguments: argsJson }, "Calling tool");

    const outcome: ToolOutcome = await this.registry.invoke(name, argsJson, {
      timeoutMs: this.toolTimeoutMs,
    });

    let result: unknown = outcome.ok ? outcome.value : outcome.error.toPayload();
    let content: string;
    try {
      content = serializeToolResult(result);
    } catch (err) {
      const error = new ToolInvocationError(
        "execution_failed",
        name,
        `Tool call failed with exception: result is not serializable: ${
          err instanceof Error ? err.message : String(err)
        }`,
        { cause: err },
      );
      result = error.toPayload();
      content = serializeToolResult(result);
    }

    conversation.push(createToolResultMessage(toolCall.id, name, content));

    if (isToolErrorPayload(result)) {
      this.logger.warn({ tool: name, error: result.error }, "Tool call failed");
      return result;
    }
    return undefined;
  }
}
