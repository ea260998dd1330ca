import { describe, it, expect } from "vitest";
import {
  ServerError,
  createToolCall,
  createUserMessage,
  type Conversation,
} from "@toolchat/llm-client";
import { FanOutCoordinator, FanOutErrorPolicy } from "../src/fan-out.js";
import type { BranchRunner } from "../src/fan-out.js";
import { ToolExecutionFailedError } from "../src/errors.js";
import { Toolbox } from "../src/toolbox.js";
import type { ConversationResult } from "../src/types.js";
import { FakeAdapter, silentLogger, textCompletion } from "./helpers/fake-adapter.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type Script = (branch: number, conversation: Conversation) => Promise<ConversationResult>;

/** A runner that numbers branches in the order they are started. */
function scripted(script: Script): BranchRunner {
  let started = 0;
  return (conversation) => script(started++, conversation);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function done(text: string, id: string): ConversationResult {
  return { status: "done", response: textCompletion(text, id) };
}

const toolFailure: ConversationResult = {
  status: "failed",
  error: { error: "Tool call failed with exception: boom" },
  toolCall: createToolCall("call_1", "explode"),
};

function coordinator(script: Script, errorPolicy?: FanOutErrorPolicy): FanOutCoordinator {
  return new FanOutCoordinator(scripted(script), { errorPolicy, logger: silentLogger });
}

// ===========================================================================
// Merging
// ===========================================================================

describe("FanOutCoordinator", () => {
  it("orders choices by branch regardless of completion order", async () => {
    const fanOut = coordinator(async (branch) => {
      await delay((3 - branch) * 10);
      return done(`answer ${branch}`, `id-${branch}`);
    });

    const merged = await fanOut.getNResponses([createUserMessage("hi")], 3);

    expect(merged.id).toBe("id-0");
    expect(merged.model).toBe("test-model");
    expect(merged.created).toBe(1700000000);
    expect(merged.choices.map((c) => [c.index, c.message.content])).toEqual([
      [0, "answer 0"],
      [1, "answer 1"],
      [2, "answer 2"],
    ]);
  });

  it("gives every branch its own copy of the conversation", async () => {
    const seen: Conversation[] = [];
    const fanOut = coordinator(async (branch, conversation) => {
      conversation.push(createUserMessage(`branch ${branch}`));
      seen.push(conversation);
      return done("ok", `id-${branch}`);
    });
    const original: Conversation = [createUserMessage("hi")];

    await fanOut.getNResponses(original, 2);

    expect(original).toEqual([{ role: "user", content: "hi" }]);
    expect(seen[0]).not.toBe(seen[1]);
    expect(seen[0]?.map((m) => m.content)).toEqual(["hi", "branch 0"]);
    expect(seen[1]?.map((m) => m.content)).toEqual(["hi", "branch 1"]);
  });

  it("sums usage across branches", async () => {
    const fanOut = coordinator(async (branch) => done("ok", `id-${branch}`));

    const merged = await fanOut.getNResponses([createUserMessage("hi")], 2);

    expect(merged.usage).toEqual({ prompt_tokens: 20, completion_tokens: 10, total_tokens: 30 });
  });

  it("sums usage when a branch reports only some counters", async () => {
    const fanOut = coordinator(async (branch) => {
      const result = done("ok", `id-${branch}`);
      if (branch === 1 && result.status === "done") {
        return { status: "done", response: { ...result.response, usage: { prompt_tokens: 3, total_tokens: 3 } } };
      }
      return result;
    });

    const merged = await fanOut.getNResponses([createUserMessage("hi")], 2);

    expect(merged.usage).toEqual({ prompt_tokens: 13, completion_tokens: 5, total_tokens: 18 });
  });

  it("rejects n that is not a positive integer", async () => {
    const fanOut = coordinator(async (branch) => done("ok", `id-${branch}`));

    await expect(fanOut.getNResponses([], 0)).rejects.toBeInstanceOf(RangeError);
    await expect(fanOut.getNResponses([], 1.5)).rejects.toBeInstanceOf(RangeError);
  });

  // -------------------------------------------------------------------------
  // partial
  // -------------------------------------------------------------------------

  describe("partial policy", () => {
    it("reports a failed branch as an error choice", async () => {
      const fanOut = coordinator(async (branch) => {
        if (branch === 1) throw new ServerError("upstream down", { provider: "fake" });
        return done(`answer ${branch}`, `id-${branch}`);
      });

      const merged = await fanOut.getNResponses([createUserMessage("hi")], 3);

      expect(merged.choices).toHaveLength(3);
      expect(merged.choices[1]).toEqual({
        index: 1,
        message: { role: "assistant", content: null },
        finish_reason: "error",
        error: { type: "ServerError", message: "upstream down" },
      });
      expect(merged.choices[2]?.message.content).toBe("answer 2");
    });

    it("takes metadata from the first branch that answered", async () => {
      const fanOut = coordinator(async (branch) => {
        if (branch === 0) throw new ServerError("upstream down", { provider: "fake" });
        return done(`answer ${branch}`, `id-${branch}`);
      });

      const merged = await fanOut.getNResponses([createUserMessage("hi")], 2);

      expect(merged.id).toBe("id-1");
    });

    it("reports a tool short-circuit as an error choice", async () => {
      const fanOut = coordinator(async (branch) =>
        branch === 0 ? toolFailure : done("ok", `id-${branch}`),
      );

      const merged = await fanOut.getNResponses([createUserMessage("hi")], 2);

      expect(merged.choices[0]?.error).toEqual({
        type: "ToolExecutionFailedError",
        message: 'Tool "explode" failed: Tool call failed with exception: boom',
      });
    });

    it("throws the first branch's error when every branch fails", async () => {
      const fanOut = coordinator(async (branch) => {
        throw new ServerError(`down ${branch}`, { provider: "fake" });
      });

      await expect(fanOut.getNResponses([createUserMessage("hi")], 2)).rejects.toThrow("down 0");
    });
  });

  // -------------------------------------------------------------------------
  // fail_all
  // -------------------------------------------------------------------------

  describe("fail_all policy", () => {
    it("throws the first failure in branch order", async () => {
      const fanOut = coordinator(async (branch) => {
        if (branch === 1) {
          await delay(20);
          throw new ServerError("slow failure", { provider: "fake" });
        }
        if (branch === 2) throw new ServerError("fast failure", { provider: "fake" });
        return done("ok", `id-${branch}`);
      }, FanOutErrorPolicy.FAIL_ALL);

      await expect(fanOut.getNResponses([createUserMessage("hi")], 3)).rejects.toThrow(
        "slow failure",
      );
    });

    it("surfaces a tool short-circuit as ToolExecutionFailedError", async () => {
      const fanOut = coordinator(
        async (branch) => (branch === 1 ? toolFailure : done("ok", `id-${branch}`)),
        FanOutErrorPolicy.FAIL_ALL,
      );

      const failure = fanOut.getNResponses([createUserMessage("hi")], 2);
      await expect(failure).rejects.toBeInstanceOf(ToolExecutionFailedError);
      await expect(failure).rejects.toMatchObject({
        payload: { error: "Tool call failed with exception: boom" },
        toolCall: { id: "call_1" },
      });
    });

    it("merges normally when every branch succeeds", async () => {
      const fanOut = coordinator(
        async (branch) => done(`answer ${branch}`, `id-${branch}`),
        FanOutErrorPolicy.FAIL_ALL,
      );

      const merged = await fanOut.getNResponses([createUserMessage("hi")], 2);

      expect(merged.choices.map((c) => c.message.content)).toEqual(["answer 0", "answer 1"]);
    });
  });
});

// ===========================================================================
// Through the Toolbox
// ===========================================================================

describe("Toolbox.getNResponses", () => {
  it("runs one engine call per branch and leaves the caller's conversation alone", async () => {
    const adapter = new FakeAdapter([textCompletion("first", "id-a"), textCompletion("second", "id-b")]);
    const toolbox = new Toolbox({}, {
      adapter,
      model: "test-model",
      systemPrompt: "Be brief.",
      logger: silentLogger,
    });
    const conversation: Conversation = [createUserMessage("hi")];

    const merged = await toolbox.getNResponses(conversation, 2);

    expect(adapter.requests).toHaveLength(2);
    expect(merged.id).toBe("id-a");
    expect(merged.choices.map((c) => c.message.content)).toEqual(["first", "second"]);
    expect(conversation).toEqual([{ role: "user", content: "hi" }]);
  });
});
