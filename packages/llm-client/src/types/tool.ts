/**
 * Tool descriptor types sent to the model.
 */

import type { JsonSchemaType } from "./enums.js";

// ---------------------------------------------------------------------------
// ParameterSchema
// ---------------------------------------------------------------------------

/** Schema of a single tool parameter. */
export interface ParameterSchema {
  readonly type: JsonSchemaType;
  readonly description?: string;
  /** Allowed values, for parameters documented with a literal set. */
  readonly enum?: readonly string[];
}

// ---------------------------------------------------------------------------
// ToolDescriptor
// ---------------------------------------------------------------------------

/**
 * Machine-readable description of one tool, in the `tools` array format of
 * the chat-completion API.
 */
export interface ToolDescriptor {
  readonly type: "function";
  readonly function: {
    /** Unique tool name. */
    readonly name: string;
    /** Human-readable description for the model. */
    readonly description: string;
    readonly parameters: {
      readonly type: "object";
      readonly properties: Readonly<Record<string, ParameterSchema>>;
      /** Parameters without a default, in declaration order. Omitted when empty. */
      readonly required?: readonly string[];
    };
  };
}

// ---------------------------------------------------------------------------
// ToolChoice
// ---------------------------------------------------------------------------

/** Controls whether the model may call tools. Only "auto" is sent today. */
export type ToolChoice = "auto" | "none" | "required";
