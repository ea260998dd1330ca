/**
 * Fan-out coordinator: runs one conversation several times concurrently and
 * merges the answers into a single multi-choice envelope.
 *
 * Each branch receives an isolated deep copy of the conversation, so
 * branches never see each other's tool calls.
 */

import type {
  Choice,
  CompletionResponse,
  Conversation,
  Message,
  Usage,
} from "@toolchat/llm-client";
import { Role, getFirstChoice } from "@toolchat/llm-client";
import { ToolExecutionFailedError } from "./errors.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { ConversationResult } from "./types.js";

/**
 * What to do when some branches fail:
 * - `partial`: report failed branches as error choices; throw only when all fail.
 * - `fail_all`: throw the first failure in branch order.
 */
export const FanOutErrorPolicy = {
  PARTIAL: "partial",
  FAIL_ALL: "fail_all",
} as const satisfies Record<string, string>;

export type FanOutErrorPolicy = (typeof FanOutErrorPolicy)[keyof typeof FanOutErrorPolicy];

/** Runs one branch to completion. */
export type BranchRunner = (conversation: Conversation) => Promise<ConversationResult>;

export interface FanOutOptions {
  errorPolicy?: FanOutErrorPolicy;
  logger?: Logger;
}

type BranchResult =
  | { ok: true; response: CompletionResponse }
  | { ok: false; error: Error };

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

function settle(outcome: PromiseSettledResult<ConversationResult>): BranchResult {
  if (outcome.status === "rejected") {
    return { ok: false, error: toError(outcome.reason) };
  }
  const result = outcome.value;
  if (result.status === "failed") {
    return { ok: false, error: new ToolExecutionFailedError(result.error, result.toolCall) };
  }
  return { ok: true, response: result.response };
}

function sumUsage(responses: readonly CompletionResponse[]): Usage | undefined {
  const usages = responses.flatMap((r) => (r.usage ? [r.usage] : []));
  if (usages.length === 0) return undefined;

  let prompt = 0;
  let completion = 0;
  let total = 0;
  for (const usage of usages) {
    const branchPrompt = usage.prompt_tokens ?? 0;
    const branchCompletion = usage.completion_tokens ?? 0;
    prompt += branchPrompt;
    completion += branchCompletion;
    total += usage.total_tokens ?? branchPrompt + branchCompletion;
  }
  return { prompt_tokens: prompt, completion_tokens: completion, total_tokens: total };
}

function errorChoice(index: number, error: Error): Choice {
  return {
    index,
    message: { role: Role.ASSISTANT, content: null },
    finish_reason: "error",
    error: { type: error.name, message: error.message },
  };
}

export class FanOutCoordinator {
  readonly errorPolicy: FanOutErrorPolicy;
  private readonly runBranch: BranchRunner;
  private readonly logger: Logger;

  constructor(runBranch: BranchRunner, options: FanOutOptions = {}) {
    this.runBranch = runBranch;
    this.errorPolicy = options.errorPolicy ?? FanOutErrorPolicy.PARTIAL;
    this.logger = options.logger ?? createLogger("fan-out");
  }

  /**
   * Run `n` branches and merge them. `choices[i]` comes from branch `i`;
   * `id`, `created` and `model` come from the first branch that answered.
   *
   * @throws RangeError when `n` is not a positive integer.
   */
  async getNResponses(conversation: readonly Message[], n: number): Promise<CompletionResponse> {
    if (!Number.isInteger(n) || n < 1) {
      throw new RangeError(`n must be a positive integer, got ${n}`);
    }

    const branches = Array.from({ length: n }, () =>
      this.runBranch(structuredClone([...conversation])),
    );
    const results = (await Promise.allSettled(branches)).map(settle);

    const failures = results.flatMap((r, i) => (r.ok ? [] : [{ index: i, error: r.error }]));
    for (const { index, error } of failures) {
      this.logger.warn({ branch: index, error: error.message }, "Fan-out branch failed");
    }

    const [firstFailure] = failures;
    if (firstFailure && this.errorPolicy === FanOutErrorPolicy.FAIL_ALL) {
      throw firstFailure.error;
    }

    const responses = results.flatMap((r) => (r.ok ? [r.response] : []));
    const [head] = responses;
    if (!head) {
      // Every branch failed.
      throw firstFailure ? firstFailure.error : new Error("No fan-out branch produced a response");
    }

    const choices = results.map((r, index): Choice =>
      r.ok ? { ...getFirstChoice(r.response), index } : errorChoice(index, r.error),
    );
    const usage = sumUsage(responses);

    return {
      id: head.id,
      object: head.object,
      created: head.created,
      model: head.model,
      choices,
      ...(usage ? { usage } : {}),
    };
  }
}
