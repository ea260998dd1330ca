/**
 * JSON POST over the global `fetch`.
 */

export interface JsonResponse {
  status: number;
  /** Parsed JSON body, or `undefined` when the text is not JSON. */
  body: unknown;
  text: string;
}

export interface PostJsonOptions {
  headers?: Record<string, string>;
  /** Abort the request after this many milliseconds. */
  timeoutMs?: number;
}

/**
 * POST `payload` as JSON and read the whole reply.
 *
 * Resolves for every HTTP status; the caller decides what a non-2xx means.
 * Rejects only when no response arrives (network failure or timeout).
 */
export async function postJson(
  url: string,
  payload: unknown,
  options: PostJsonOptions = {},
): Promise<JsonResponse> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...options.headers },
    body: JSON.stringify(payload),
    redirect: "follow",
    signal:
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? AbortSignal.timeout(options.timeoutMs)
        : undefined,
  });

  const text = await res.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    body = undefined;
  }
  return { status: res.status, body, text };
}
