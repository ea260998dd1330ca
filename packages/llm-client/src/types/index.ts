/**
 * Barrel re-export for all type modules.
 */

// Enums
export { Role, JsonSchemaType } from "./enums.js";

// Message types
export type { ToolCallRequest, Message, Conversation } from "./message.js";
export {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolResultMessage,
  createToolCall,
  getMessageToolCalls,
  isInstructionMessage,
} from "./message.js";

// Tool types
export type { ParameterSchema, ToolDescriptor, ToolChoice } from "./tool.js";

// Request types
export type { CompletionRequest } from "./request.js";

// Response types
export type { Usage, Choice, CompletionResponse } from "./response.js";
export {
  MessageSchema,
  ToolCallRequestSchema,
  CompletionResponseSchema,
  getFirstChoice,
} from "./response.js";

// Error types
export {
  SDKError,
  UpstreamHTTPError,
  AuthenticationError,
  NotFoundError,
  InvalidRequestError,
  MalformedResponseError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  NetworkError,
  ConfigurationError,
} from "./errors.js";
export type { UpstreamErrorOptions } from "./errors.js";
