export const VERSION = "0.1.0";

export { loadConfig, HttpUrlSchema } from "./config.js";
export type { GatewayConfig, LogLevel } from "./config.js";

export { ChatCompletionRequestSchema, MAX_CHOICES } from "./schema.js";
export type { ChatCompletionRequest } from "./schema.js";

export {
  handleRequest,
  mapErrorToResponse,
  ErrorType,
  RequestBodyTooLargeError,
} from "./routes.js";
export type {
  CompletionService,
  GatewayContext,
  GatewayRequest,
  GatewayResponse,
} from "./routes.js";

export {
  createGatewayServer,
  createToolbox,
  readRequestBody,
  startServer,
  MAX_BODY_BYTES,
} from "./server.js";
export type { RunningGateway, StartServerOptions } from "./server.js";

export { demoTools } from "./demo-tools.js";
