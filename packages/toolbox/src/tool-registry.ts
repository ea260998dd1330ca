/**
 * Tool registry: the dispatch table from tool name to implementation.
 *
 * Built once from a tool collection and never mutated afterwards, so
 * concurrent conversations can share it.
 */

import type { ToolDescriptor } from "@toolchat/llm-client";
import { generateDescriptor, publicToolNames } from "./descriptor.js";
import { SchemaGenerationError, ToolInvocationError } from "./errors.js";
import type {
  RegisteredTool,
  ToolArguments,
  ToolCollection,
  ToolOutcome,
} from "./types.js";

export interface InvokeOptions {
  /** Fail the call with `execution_failed` when the handler takes longer. */
  timeoutMs?: number;
}

function isPlainObject(value: unknown): value is ToolArguments {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse the model's argument text. Empty text counts as an empty object.
 */
function parseArguments(toolName: string, argsJson: string): ToolArguments {
  if (argsJson.trim().length === 0) return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(argsJson);
  } catch (err) {
    throw new ToolInvocationError(
      "bad_arguments",
      toolName,
      `Invalid JSON arguments for tool "${toolName}": ${errorMessage(err)}`,
      { cause: err },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ToolInvocationError(
      "bad_arguments",
      toolName,
      `Arguments for tool "${toolName}" must be a JSON object`,
    );
  }
  return parsed;
}

async function withTimeout<T>(
  toolName: string,
  run: Promise<T>,
  timeoutMs: number | undefined,
): Promise<T> {
  if (timeoutMs === undefined || timeoutMs <= 0) return run;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(
        new ToolInvocationError(
          "execution_failed",
          toolName,
          `Tool call failed with exception: tool "${toolName}" timed out after ${timeoutMs}ms`,
        ),
      );
    }, timeoutMs);
  });

  try {
    return await Promise.race([run, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class ToolRegistry {
  private readonly _tools: ReadonlyMap<string, RegisteredTool>;

  private constructor(tools: ReadonlyMap<string, RegisteredTool>) {
    this._tools = tools;
  }

  /**
   * Build a registry over every public member of a collection.
   *
   * @throws SchemaGenerationError for the first tool that cannot be described.
   */
  static fromCollection(collection: ToolCollection): ToolRegistry {
    const tools = new Map<string, RegisteredTool>();

    for (const name of publicToolNames(collection)) {
      const spec = collection[name];
      if (!spec) {
        throw new SchemaGenerationError(name, "tool is not defined");
      }

      const defaults: ToolArguments = {};
      for (const param of spec.params ?? []) {
        if (param.default !== undefined) {
          defaults[param.name] = param.default;
        }
      }

      tools.set(name, { descriptor: generateDescriptor(name, spec), spec, defaults });
    }

    return new ToolRegistry(tools);
  }

  /**
   * Look up a tool by name.
   */
  get(name: string): RegisteredTool | undefined {
    return this._tools.get(name);
  }

  has(name: string): boolean {
    return this._tools.has(name);
  }

  /**
   * Return all tool names, in collection order.
   */
  names(): string[] {
    return Array.from(this._tools.keys());
  }

  /**
   * Return all tool descriptors (for sending to the model).
   */
  descriptors(): ToolDescriptor[] {
    return Array.from(this._tools.values()).map((t) => t.descriptor);
  }

  /**
   * Dispatch one tool call. Never throws: every failure is reported as an
   * `{ ok: false }` outcome carrying a `ToolInvocationError`.
   */
  async invoke(
    name: string,
    argsJson: string,
    options: InvokeOptions = {},
  ): Promise<ToolOutcome> {
    const tool = this._tools.get(name);
    if (!tool) {
      return {
        ok: false,
        error: new ToolInvocationError("not_found", name, `Tool "${name}" does not exist`),
      };
    }

    let args: ToolArguments;
    try {
      args = { ...tool.defaults, ...parseArguments(name, argsJson) };
    } catch (err) {
      if (err instanceof ToolInvocationError) return { ok: false, error: err };
      throw err;
    }

    try {
      const run = Promise.resolve().then(() => tool.spec.execute(args));
      const value = await withTimeout(name, run, options.timeoutMs);
      return { ok: true, value };
    } catch (err) {
      if (err instanceof ToolInvocationError) return { ok: false, error: err };
      return {
        ok: false,
        error: new ToolInvocationError(
          "execution_failed",
          name,
          `Tool call failed with exception: ${errorMessage(err)}`,
          { cause: err },
        ),
      };
    }
  }
}
