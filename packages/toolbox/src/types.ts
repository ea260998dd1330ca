/**
 * Tool type definitions for the toolbox.
 */

import type {
  CompletionResponse,
  ToolCallRequest,
  ToolDescriptor,
} from "@toolchat/llm-client";
import type { ToolInvocationError } from "./errors.js";

/** Arguments a tool receives: the model's JSON object merged over declared defaults. */
export type ToolArguments = Record<string, unknown>;

/** A tool implementation. May return a value or a promise of one. */
export type ToolHandler = (args: ToolArguments) => unknown;

/**
 * Native declaration of one parameter, in call order.
 */
export interface ParameterDeclaration {
  name: string;
  /** Native type name (`str`, `int`, `boolean`, ...). Overridden by the documented type. */
  type?: string;
  /** Value used when the model omits the argument. Presence makes the parameter optional. */
  default?: unknown;
}

/**
 * A tool as declared by its author: documentation, parameters and handler.
 *
 * `doc` is a numpy-style block: a summary paragraph, optionally followed by
 * a `Parameters` section underlined with dashes, each entry a `name : type`
 * line followed by indented description lines.
 */
export interface ToolSpec {
  doc: string;
  params?: readonly ParameterDeclaration[];
  execute: ToolHandler;
}

/**
 * The tool collection handed to a Toolbox. Every member whose name does not
 * start with an underscore is exposed to the model under that name.
 */
export type ToolCollection = Readonly<Record<string, ToolSpec>>;

/**
 * A tool with its generated descriptor, ready for dispatch.
 */
export interface RegisteredTool {
  descriptor: ToolDescriptor;
  spec: ToolSpec;
  /** Declared defaults, merged under the model's arguments. */
  defaults: ToolArguments;
}

/** JSON payload reporting a failed tool call. */
export interface ToolErrorPayload {
  readonly error: unknown;
  readonly [key: string]: unknown;
}

/** Result of `ToolRegistry.invoke`. */
export type ToolOutcome =
  | { ok: true; value: unknown }
  | { ok: false; error: ToolInvocationError };

/**
 * Terminal state of one `getResponse` call chain.
 *
 * `done` carries the envelope of the final completion; `failed` is the
 * short-circuit taken when `failOnToolError` is set and a tool reports an
 * error.
 */
export type ConversationResult =
  | { status: "done"; response: CompletionResponse }
  | { status: "failed"; error: ToolErrorPayload; toolCall: ToolCallRequest };

/** Per-call overrides for `Toolbox.getResponse`. */
export interface GetResponseOptions {
  /** Execute requested tools and continue the conversation. Default true. */
  autoToolCall?: boolean;
  /** Overrides the toolbox-wide `failOnToolError`. */
  failOnToolError?: boolean;
}
