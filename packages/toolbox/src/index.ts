export const VERSION = "0.1.0";

// Core types
export type {
  ToolArguments,
  ToolHandler,
  ParameterDeclaration,
  ToolSpec,
  ToolCollection,
  RegisteredTool,
  ToolErrorPayload,
  ToolOutcome,
  ConversationResult,
  GetResponseOptions,
} from "./types.js";

// Errors
export {
  SchemaGenerationError,
  ToolInvocationError,
  ToolRoundLimitError,
  ToolExecutionFailedError,
} from "./errors.js";
export type { ToolInvocationErrorKind } from "./errors.js";

// Descriptor generation
export { parseDocstring, cleanDoc, DocstringSyntaxError } from "./docstring.js";
export type { DocParameter, ParsedDocstring } from "./docstring.js";
export {
  generateDescriptor,
  generateDescriptors,
  jsonSchemaType,
  parseLiteralSet,
  publicToolNames,
} from "./descriptor.js";

// Tool registry
export { ToolRegistry } from "./tool-registry.js";
export type { InvokeOptions } from "./tool-registry.js";

// Conversation engine
export {
  Toolbox,
  normalizeConversation,
  isToolErrorPayload,
  serializeToolResult,
  DEFAULT_MAX_TOOL_ROUNDS,
  DEFAULT_TOOL_TIMEOUT_MS,
} from "./toolbox.js";
export type { ToolboxOptions } from "./toolbox.js";

// Fan-out
export { FanOutCoordinator, FanOutErrorPolicy } from "./fan-out.js";
export type { BranchRunner, FanOutOptions } from "./fan-out.js";

// Logging
export { createLogger, rootLogger } from "./logger.js";
export type { Logger } from "./logger.js";
