import { describe, it, expect } from "vitest";
import {
  createSystemMessage,
  createUserMessage,
  createAssistantMessage,
  createToolResultMessage,
  createToolCall,
  getMessageToolCalls,
  isInstructionMessage,
} from "../src/types/message.js";
import { Role } from "../src/types/enums.js";
import type { Message } from "../src/types/message.js";

describe("message factories", () => {
  it("createSystemMessage creates a SYSTEM message", () => {
    expect(createSystemMessage("You are a helpful assistant.")).toEqual({
      role: Role.SYSTEM,
      content: "You are a helpful assistant.",
    });
  });

  it("createUserMessage creates a USER message", () => {
    expect(createUserMessage("What is 2 + 2?")).toEqual({
      role: Role.USER,
      content: "What is 2 + 2?",
    });
  });

  it("createAssistantMessage omits tool_calls when there are none", () => {
    expect(createAssistantMessage("The answer is 4.", [])).toEqual({
      role: Role.ASSISTANT,
      content: "The answer is 4.",
    });
  });

  it("createAssistantMessage keeps tool calls in order", () => {
    const calls = [createToolCall("call_a", "alpha"), createToolCall("call_b", "beta")];
    const msg = createAssistantMessage(null, calls);
    expect(msg.content).toBeNull();
    expect(msg.tool_calls?.map((tc) => tc.id)).toEqual(["call_a", "call_b"]);
  });

  it("createToolResultMessage sets tool_call_id and name", () => {
    expect(createToolResultMessage("call_123", "lookup", '"72F and sunny"')).toEqual({
      role: Role.TOOL,
      content: '"72F and sunny"',
      tool_call_id: "call_123",
      name: "lookup",
    });
  });
});

describe("createToolCall", () => {
  it("JSON-encodes object arguments", () => {
    expect(createToolCall("call_1", "lookup", { city: "Lyon" })).toEqual({
      id: "call_1",
      type: "function",
      function: { name: "lookup", arguments: '{"city":"Lyon"}' },
    });
  });

  it("keeps raw argument text as-is", () => {
    const call = createToolCall("call_1", "lookup", "{not json");
    expect(call.function.arguments).toBe("{not json");
  });

  it("defaults to empty arguments", () => {
    expect(createToolCall("call_1", "now").function.arguments).toBe("{}");
  });
});

describe("getMessageToolCalls", () => {
  it("treats a missing tool_calls field as an empty list", () => {
    const msg: Message = { role: Role.ASSISTANT, content: "done" };
    expect(getMessageToolCalls(msg)).toEqual([]);
  });

  it("returns the requests in order", () => {
    const calls = [createToolCall("1", "a"), createToolCall("2", "b")];
    const msg = createAssistantMessage(null, calls);
    expect(getMessageToolCalls(msg)).toEqual(calls);
  });
});

describe("isInstructionMessage", () => {
  it("is true for system and developer roles only", () => {
    expect(isInstructionMessage({ role: Role.SYSTEM, content: "x" })).toBe(true);
    expect(isInstructionMessage({ role: Role.DEVELOPER, content: "x" })).toBe(true);
    expect(isInstructionMessage({ role: Role.USER, content: "x" })).toBe(false);
    expect(isInstructionMessage({ role: Role.TOOL, content: "x" })).toBe(false);
  });
});
