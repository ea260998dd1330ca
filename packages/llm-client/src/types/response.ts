/**
 * Response types for the chat-completion client.
 *
 * The zod schemas validate whatever the endpoint sends back; the exported
 * types are inferred from them so the wire shape is declared once.
 */

import { z } from "zod";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const RoleSchema = z.enum(["system", "user", "assistant", "tool", "developer"]);

export const ToolCallRequestSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string().default("{}"),
  }),
});

/** Accepts an explicit `null` and drops it, so the parsed key is simply absent. */
function absentWhenNull<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

export const MessageSchema = z.object({
  role: RoleSchema,
  content: z.string().nullable().optional(),
  tool_calls: absentWhenNull(z.array(ToolCallRequestSchema)),
  tool_call_id: absentWhenNull(z.string()),
  name: absentWhenNull(z.string()),
});

// Servers report whichever counters they track; any of them may be missing.
export const UsageSchema = z.object({
  prompt_tokens: z.number().int().nonnegative().optional(),
  completion_tokens: z.number().int().nonnegative().optional(),
  total_tokens: z.number().int().nonnegative().optional(),
});

export const ChoiceSchema = z.object({
  index: z.number().int().nonnegative().default(0),
  message: MessageSchema,
  finish_reason: z.string().nullable().default(null),
});

export const CompletionResponseSchema = z.object({
  id: z.string().default(""),
  object: z.string().default("chat.completion"),
  created: z.number().int().default(0),
  model: z.string().default(""),
  choices: z.array(ChoiceSchema).min(1),
  usage: absentWhenNull(UsageSchema),
});

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type Usage = z.infer<typeof UsageSchema>;

/** One completion choice. Failed fan-out branches carry `error`. */
export type Choice = z.infer<typeof ChoiceSchema> & {
  readonly error?: { readonly type: string; readonly message: string };
};

/** The chat-completion response envelope. */
export type CompletionResponse = Omit<
  z.infer<typeof CompletionResponseSchema>,
  "choices"
> & {
  choices: Choice[];
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** The first choice of a response; validation guarantees there is one. */
export function getFirstChoice(response: CompletionResponse): Choice {
  const [first] = response.choices;
  if (!first) {
    throw new RangeError("Completion response has no choices");
  }
  return first;
}

