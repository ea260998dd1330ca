/**
 * Route handling for the OpenAI-compatible gateway.
 *
 * `handleRequest` works on plain request and response values so the routes
 * can be exercised without a socket; `server.ts` adapts it to `node:http`.
 */

import { SDKError, UpstreamHTTPError } from "@toolchat/llm-client";
import type { CompletionResponse, Message } from "@toolchat/llm-client";
import {
  ToolExecutionFailedError,
  ToolRoundLimitError,
  createLogger,
} from "@toolchat/toolbox";
import type { Logger } from "@toolchat/toolbox";
import { ChatCompletionRequestSchema } from "./schema.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface GatewayRequest {
  method: string;
  /** Request target; a query string is ignored. */
  path: string;
  /** Raw body text. */
  body?: string;
}

export interface GatewayResponse {
  status: number;
  body: unknown;
}

/** The part of the conversation engine the routes depend on. */
export interface CompletionService {
  getNResponses(conversation: readonly Message[], n: number): Promise<CompletionResponse>;
}

export interface GatewayContext {
  service: CompletionService;
  /** Model id listed by `/v1/models`. */
  model: string;
  modelOwner: string;
  /** Unix seconds reported as the model's `created` time. */
  createdAt: number;
  logger?: Logger;
}

export const ErrorType = {
  INVALID_REQUEST: "invalid_request_error",
  NOT_FOUND: "not_found_error",
  METHOD_NOT_ALLOWED: "method_not_allowed_error",
  UPSTREAM: "upstream_error",
  TOOL: "tool_error",
  INTERNAL: "internal_error",
} as const satisfies Record<string, string>;

export type ErrorType = (typeof ErrorType)[keyof typeof ErrorType];

/** The request body grew past the server's byte limit before it ended. */
export class RequestBodyTooLargeError extends SDKError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Request body exceeds ${limit} bytes`);
    this.name = "RequestBodyTooLargeError";
    this.limit = limit;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function errorBody(status: number, type: ErrorType, message: string): GatewayResponse {
  return { status, body: { error: { message, type } } };
}

/** Map an engine failure to an HTTP status and error body. */
export function mapErrorToResponse(error: unknown, logger: Logger): GatewayResponse {
  if (error instanceof RequestBodyTooLargeError) {
    logger.warn({ limit: error.limit }, "Request body too large");
    return errorBody(413, ErrorType.INVALID_REQUEST, error.message);
  }
  if (error instanceof UpstreamHTTPError) {
    logger.warn({ err: error }, "Upstream model call failed");
    return errorBody(502, ErrorType.UPSTREAM, error.message);
  }
  if (error instanceof ToolExecutionFailedError || error instanceof ToolRoundLimitError) {
    logger.warn({ err: error }, "Tool execution failed");
    return errorBody(500, ErrorType.TOOL, error.message);
  }
  logger.error({ err: error }, "Unhandled error while serving request");
  return errorBody(500, ErrorType.INTERNAL, "Internal server error");
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

async function createChatCompletion(
  context: GatewayContext,
  body: string | undefined,
  logger: Logger,
): Promise<GatewayResponse> {
  const json = parseJson(body ?? "");
  if (!json.ok) {
    return errorBody(400, ErrorType.INVALID_REQUEST, "Request body is not valid JSON");
  }

  const parsed = ChatCompletionRequestSchema.safeParse(json.value);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
      .join("; ");
    return errorBody(400, ErrorType.INVALID_REQUEST, message);
  }

  const { messages, n } = parsed.data;
  logger.info({ messages: messages.length, n }, "Chat completion request");

  try {
    const response = await context.service.getNResponses(messages, n);
    return { status: 200, body: response };
  } catch (error) {
    return mapErrorToResponse(error, logger);
  }
}

function listModels(context: GatewayContext): GatewayResponse {
  return {
    status: 200,
    body: {
      object: "list",
      data: [
        {
          id: context.model,
          object: "model",
          created: context.createdAt,
          owned_by: context.modelOwner,
        },
      ],
    },
  };
}

/**
 * Serve one request. Never throws: every failure becomes an error response.
 */
export async function handleRequest(
  context: GatewayContext,
  request: GatewayRequest,
): Promise<GatewayResponse> {
  const logger = context.logger ?? createLogger("gateway");
  const [pathname = "/"] = request.path.split("?");
  const method = request.method.toUpperCase();

  switch (pathname) {
    case "/v1/chat/completions":
      if (method !== "POST") {
        return errorBody(405, ErrorType.METHOD_NOT_ALLOWED, `Method ${method} not allowed`);
      }
      return createChatCompletion(context, request.body, logger);

    case "/v1/models":
      if (method !== "GET") {
        return errorBody(405, ErrorType.METHOD_NOT_ALLOWED, `Method ${method} not allowed`);
      }
      return listModels(context);

    default:
      return errorBody(404, ErrorType.NOT_FOUND, `No route for ${method} ${pathname}`);
  }
}
