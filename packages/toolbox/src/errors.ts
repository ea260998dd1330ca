/**
 * Errors raised by the toolbox.
 */

import { SDKError } from "@toolchat/llm-client";
import type { ToolCallRequest } from "@toolchat/llm-client";
import type { ToolErrorPayload } from "./types.js";

/** A tool's documentation is missing or cannot be parsed. Fatal at construction. */
export class SchemaGenerationError extends SDKError {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot describe tool "${toolName}": ${message}`, options);
    this.name = "SchemaGenerationError";
    this.toolName = toolName;
  }
}

export type ToolInvocationErrorKind = "not_found" | "bad_arguments" | "execution_failed";

/**
 * A single tool call could not be completed. Recoverable: the engine feeds
 * it back to the model as a tool message.
 */
export class ToolInvocationError extends SDKError {
  readonly kind: ToolInvocationErrorKind;
  readonly toolName: string;

  constructor(
    kind: ToolInvocationErrorKind,
    toolName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ToolInvocationError";
    this.kind = kind;
    this.toolName = toolName;
  }

  /** The JSON payload sent to the model in place of a result. */
  toPayload(): ToolErrorPayload {
    return { error: this.message };
  }
}

/** The model kept requesting tools past the configured number of rounds. */
export class ToolRoundLimitError extends SDKError {
  readonly rounds: number;

  constructor(rounds: number) {
    super(`Tool-call round limit of ${rounds} exceeded`);
    this.name = "ToolRoundLimitError";
    this.rounds = rounds;
  }
}

/** A fan-out branch ended on a tool error while `failOnToolError` was set. */
export class ToolExecutionFailedError extends SDKError {
  readonly payload: ToolErrorPayload;
  readonly toolCall: ToolCallRequest;

  constructor(payload: ToolErrorPayload, toolCall: ToolCallRequest) {
    const detail = typeof payload.error === "string" ? payload.error : JSON.stringify(payload.error);
    super(`Tool "${toolCall.function.name}" failed: ${detail}`);
    this.name = "ToolExecutionFailedError";
    this.payload = payload;
    this.toolCall = toolCall;
  }
}
