/**
 * Core enums for the chat-completion client.
 *
 * Uses `as const satisfies` pattern instead of TypeScript enums for tree-shaking
 * and better type inference.
 */

// ---------------------------------------------------------------------------
// Role
// ---------------------------------------------------------------------------

/** The five roles of the chat-completion wire format. */
export const Role = {
  /** High-level instructions shaping model behavior. Always first. */
  SYSTEM: "system",
  /** Human input. */
  USER: "user",
  /** Model output. Text and tool-invocation requests. */
  ASSISTANT: "assistant",
  /** Tool execution results, linked by tool_call_id. */
  TOOL: "tool",
  /** Privileged instructions from the application (not the end user). */
  DEVELOPER: "developer",
} as const satisfies Record<string, string>;

export type Role = (typeof Role)[keyof typeof Role];

// ---------------------------------------------------------------------------
// JsonSchemaType
// ---------------------------------------------------------------------------

/** The closed set of parameter types a tool descriptor may name. */
export const JsonSchemaType = {
  STRING: "string",
  INTEGER: "integer",
  NUMBER: "number",
  BOOLEAN: "boolean",
  ARRAY: "array",
  OBJECT: "object",
  NULL: "null",
} as const satisfies Record<string, string>;

export type JsonSchemaType = (typeof JsonSchemaType)[keyof typeof JsonSchemaType];
