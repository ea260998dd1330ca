/**
 * Validate an OpenAI Chat Completions response body.
 */

import {
  CompletionResponseSchema,
  MalformedResponseError,
  type CompletionResponse,
} from "../../types/index.js";

// ---------------------------------------------------------------------------
// Main translation function
// ---------------------------------------------------------------------------

/**
 * Parse the raw JSON body of a 2xx response.
 *
 * A body that is not a chat completion with at least one choice is an
 * upstream failure, reported as `MalformedResponseError`.
 */
export function translateResponse(raw: unknown, providerName: string): CompletionResponse {
  const parsed = CompletionResponseSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new MalformedResponseError(
      `Malformed chat completion response: ${issues}`,
      { provider: providerName, cause: parsed.error },
    );
  }

  return parsed.data;
}
