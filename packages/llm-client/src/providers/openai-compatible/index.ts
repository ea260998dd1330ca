/**
 * OpenAI-compatible provider adapter for the Chat Completions API.
 *
 * Works against any endpoint speaking the chat-completion dialect (vLLM,
 * llama.cpp server, Ollama, LM Studio, OpenAI itself). The base URL is the
 * API root including its version segment, e.g. `http://localhost:8080/v1`;
 * requests go to `<baseUrl>/chat/completions`.
 */

import type { ProviderAdapter } from "../adapter.js";
import type { CompletionRequest, CompletionResponse } from "../../types/index.js";
import { ConfigurationError } from "../../types/index.js";
import { mapHttpError, mapTransportError, postJson } from "../../utils/index.js";
import type { JsonResponse } from "../../utils/index.js";
import { translateRequest } from "./translate-request.js";
import { translateResponse } from "./translate-response.js";

/** API key value meaning "this endpoint needs no credentials". */
export const NO_API_KEY = "no-key-needed";

/** Default per-request timeout in milliseconds. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export interface OpenAICompatibleAdapterOptions {
  baseUrl: string;
  apiKey?: string;
  providerName?: string;
  defaultHeaders?: Record<string, string>;
  /** Per-request timeout in milliseconds. */
  timeout?: number;
}

export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeout: number;

  constructor(options: OpenAICompatibleAdapterOptions) {
    if (!/^https?:\/\//.test(options.baseUrl)) {
      throw new ConfigurationError(
        `Base URL must start with http:// or https://, got "${options.baseUrl}"`,
      );
    }
    this.name = options.providerName ?? "openai-compatible";
    this.apiKey = options.apiKey ?? NO_API_KEY;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /** The full URL requests are posted to. */
  get endpoint(): string {
    return `${this.baseUrl}/chat/completions`;
  }

  private buildHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.apiKey}`, ...this.defaultHeaders };
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body = translateRequest(request);

    let httpRes: JsonResponse;
    try {
      httpRes = await postJson(this.endpoint, body, {
        headers: this.buildHeaders(),
        timeoutMs: this.timeout,
      });
    } catch (error) {
      throw mapTransportError(error, this.name);
    }

    if (httpRes.status < 200 || httpRes.status >= 300) {
      throw mapHttpError(httpRes.status, httpRes.body ?? httpRes.text, this.name);
    }

    return translateResponse(httpRes.body, this.name);
  }
}

export { translateRequest } from "./translate-request.js";
export { translateResponse } from "./translate-response.js";
