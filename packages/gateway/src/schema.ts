/**
 * Request body schema for `POST /v1/chat/completions`.
 *
 * Only `messages` and `n` drive the gateway; other OpenAI request fields are
 * accepted and ignored.
 */

import { z } from "zod";
import { MessageSchema } from "@toolchat/llm-client";

/** Upper bound on `n` for one request. */
export const MAX_CHOICES = 16;

export const ChatCompletionRequestSchema = z.object({
  model: z.string().optional(),
  messages: z.array(MessageSchema).min(1, "messages must contain at least one message"),
  n: z.number().int().min(1).max(MAX_CHOICES).default(1),
  stream: z
    .boolean()
    .optional()
    .refine((stream) => stream !== true, "Streaming responses are not supported"),
});

export type ChatCompletionRequest = z.infer<typeof ChatCompletionRequestSchema>;
