import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import {
  ServerError,
  createToolCall,
  type CompletionResponse,
  type Message,
} from "@toolchat/llm-client";
import { ToolExecutionFailedError, ToolRoundLimitError, Toolbox } from "@toolchat/toolbox";
import { RequestBodyTooLargeError, handleRequest, mapErrorToResponse } from "../src/routes.js";
import type { CompletionService, GatewayContext } from "../src/routes.js";

const silent = pino({ level: "silent" });

function completion(contents: string[]): CompletionResponse {
  return {
    id: "chatcmpl-1",
    object: "chat.completion",
    created: 1700000000,
    model: "test-model",
    choices: contents.map((content, index) => ({
      index,
      message: { role: "assistant", content },
      finish_reason: "stop",
    })),
  };
}

function context(service: CompletionService): GatewayContext {
  return { service, model: "toolchat", modelOwner: "tester", createdAt: 1700000000, logger: silent };
}

function serviceReturning(response: CompletionResponse) {
  return {
    getNResponses: vi.fn<(conversation: readonly Message[], n: number) => Promise<CompletionResponse>>()
      .mockResolvedValue(response),
  };
}

function serviceFailing(error: Error): CompletionService {
  return { getNResponses: () => Promise.reject(error) };
}

const chatBody = (extra: Record<string, unknown> = {}): string =>
  JSON.stringify({ model: "toolchat", messages: [{ role: "user", content: "hi" }], ...extra });

// ===========================================================================
// /v1/models
// ===========================================================================

describe("GET /v1/models", () => {
  it("lists the configured model", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["x"]))), {
      method: "GET",
      path: "/v1/models",
    });

    expect(response).toEqual({
      status: 200,
      body: {
        object: "list",
        data: [{ id: "toolchat", object: "model", created: 1700000000, owned_by: "tester" }],
      },
    });
  });

  it("rejects other methods", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["x"]))), {
      method: "POST",
      path: "/v1/models",
    });

    expect(response.status).toBe(405);
  });
});

// ===========================================================================
// /v1/chat/completions
// ===========================================================================

describe("POST /v1/chat/completions", () => {
  it("fans out n requests and returns the merged envelope", async () => {
    const service = serviceReturning(completion(["a", "b"]));

    const response = await handleRequest(context(service), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody({ n: 2, temperature: 0.2 }),
    });

    expect(response).toEqual({ status: 200, body: completion(["a", "b"]) });
    expect(service.getNResponses).toHaveBeenCalledWith([{ role: "user", content: "hi" }], 2);
  });

  it("defaults n to 1 and ignores a query string", async () => {
    const service = serviceReturning(completion(["a"]));

    await handleRequest(context(service), {
      method: "POST",
      path: "/v1/chat/completions?debug=1",
      body: chatBody(),
    });

    expect(service.getNResponses).toHaveBeenCalledWith([{ role: "user", content: "hi" }], 1);
  });

  it("accepts history messages that carry explicit nulls", async () => {
    const service = serviceReturning(completion(["a"]));

    const response = await handleRequest(context(service), {
      method: "POST",
      path: "/v1/chat/completions",
      body: JSON.stringify({
        messages: [
          { role: "user", content: "hi", name: null },
          { role: "assistant", content: "hello", tool_calls: null, tool_call_id: null },
          { role: "user", content: "again" },
        ],
      }),
    });

    expect(response.status).toBe(200);
    const [conversation] = service.getNResponses.mock.calls[0] ?? [];
    expect(conversation).toEqual([
      { role: "user", content: "hi" },
      { role: "assistant", content: "hello" },
      { role: "user", content: "again" },
    ]);
    expect(conversation?.[1]?.tool_calls).toBeUndefined();
  });

  it("rejects a body that is not JSON", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["a"]))), {
      method: "POST",
      path: "/v1/chat/completions",
      body: "{nope",
    });

    expect(response).toEqual({
      status: 400,
      body: { error: { message: "Request body is not valid JSON", type: "invalid_request_error" } },
    });
  });

  it("rejects an empty message list", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["a"]))), {
      method: "POST",
      path: "/v1/chat/completions",
      body: JSON.stringify({ messages: [] }),
    });

    expect(response).toEqual({
      status: 400,
      body: {
        error: {
          message: "messages: messages must contain at least one message",
          type: "invalid_request_error",
        },
      },
    });
  });

  it("rejects n outside 1..16", async () => {
    const ctx = context(serviceReturning(completion(["a"])));

    for (const n of [0, 17, 1.5]) {
      const response = await handleRequest(ctx, {
        method: "POST",
        path: "/v1/chat/completions",
        body: chatBody({ n }),
      });
      expect(response.status).toBe(400);
    }
  });

  it("rejects streaming requests", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["a"]))), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody({ stream: true }),
    });

    expect(response).toEqual({
      status: 400,
      body: {
        error: { message: "stream: Streaming responses are not supported", type: "invalid_request_error" },
      },
    });
  });

  it("maps upstream failures to 502", async () => {
    const response = await handleRequest(
      context(serviceFailing(new ServerError("upstream down", { provider: "fake", status_code: 503 }))),
      { method: "POST", path: "/v1/chat/completions", body: chatBody() },
    );

    expect(response).toEqual({
      status: 502,
      body: { error: { message: "upstream down", type: "upstream_error" } },
    });
  });

  it("maps tool failures and round limits to 500", async () => {
    const toolFailure = new ToolExecutionFailedError(
      { error: "boom" },
      createToolCall("call_1", "explode"),
    );

    const first = await handleRequest(context(serviceFailing(toolFailure)), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody(),
    });
    const second = await handleRequest(context(serviceFailing(new ToolRoundLimitError(10))), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody(),
    });

    expect(first).toEqual({
      status: 500,
      body: { error: { message: 'Tool "explode" failed: boom', type: "tool_error" } },
    });
    expect(second).toEqual({
      status: 500,
      body: { error: { message: "Tool-call round limit of 10 exceeded", type: "tool_error" } },
    });
  });

  it("hides the message of unexpected errors", async () => {
    const response = await handleRequest(context(serviceFailing(new Error("secret detail"))), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody(),
    });

    expect(response).toEqual({
      status: 500,
      body: { error: { message: "Internal server error", type: "internal_error" } },
    });
  });

  it("serves a real Toolbox end to end", async () => {
    const toolbox = new Toolbox({}, {
      adapter: {
        name: "fake",
        complete: async () => completion(["Hello from the model"]),
      },
      model: "test-model",
      systemPrompt: "Be brief.",
      logger: silent,
    });

    const response = await handleRequest(context(toolbox), {
      method: "POST",
      path: "/v1/chat/completions",
      body: chatBody({ n: 2 }),
    });

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      choices: [
        { index: 0, message: { content: "Hello from the model" } },
        { index: 1, message: { content: "Hello from the model" } },
      ],
    });
  });
});

describe("mapErrorToResponse", () => {
  it("answers an oversized body with 413", () => {
    expect(mapErrorToResponse(new RequestBodyTooLargeError(8), silent)).toEqual({
      status: 413,
      body: { error: { message: "Request body exceeds 8 bytes", type: "invalid_request_error" } },
    });
  });
});

describe("unknown routes", () => {
  it("returns 404", async () => {
    const response = await handleRequest(context(serviceReturning(completion(["a"]))), {
      method: "GET",
      path: "/v2/anything",
    });

    expect(response).toEqual({
      status: 404,
      body: { error: { message: "No route for GET /v2/anything", type: "not_found_error" } },
    });
  });
});
