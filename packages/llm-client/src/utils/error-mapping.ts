/**
 * Turns failed completion calls into UpstreamHTTPError subclasses.
 */

import {
  UpstreamHTTPError,
  AuthenticationError,
  NotFoundError,
  InvalidRequestError,
  RateLimitError,
  ServerError,
  RequestTimeoutError,
  NetworkError,
} from "../types/index.js";
import type { UpstreamErrorOptions } from "../types/index.js";

type UpstreamErrorClass = new (message: string, options: UpstreamErrorOptions) => UpstreamHTTPError;

const STATUS_ERRORS: ReadonlyMap<number, UpstreamErrorClass> = new Map([
  [401, AuthenticationError],
  [403, AuthenticationError],
  [404, NotFoundError],
  [408, RequestTimeoutError],
  [429, RateLimitError],
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * The `error` object of an OpenAI-style error body, or the body itself when
 * a server puts `message` at the top level.
 */
function errorObject(body: unknown): Record<string, unknown> | undefined {
  if (!isRecord(body)) return undefined;
  const nested = body["error"];
  return isRecord(nested) ? nested : body;
}

function describe(status: number, body: unknown): string {
  const error = errorObject(body);
  if (error && typeof error["message"] === "string") return error["message"];
  if (isRecord(body) && typeof body["error"] === "string") return body["error"];
  if (typeof body === "string" && body.trim().length > 0) return body.trim();
  return `HTTP ${status} from completion endpoint`;
}

function errorCode(body: unknown): string | undefined {
  const error = errorObject(body);
  if (!error) return undefined;
  const code = error["code"] ?? error["type"];
  return typeof code === "string" ? code : undefined;
}

/**
 * Map a non-2xx response to a typed upstream error.
 *
 * @param body - Parsed JSON body, or the raw text when it was not JSON.
 */
export function mapHttpError(status: number, body: unknown, provider: string): UpstreamHTTPError {
  const options: UpstreamErrorOptions = {
    provider,
    status_code: status,
    error_code: errorCode(body),
  };
  const message = describe(status, body);

  const ErrorClass =
    STATUS_ERRORS.get(status) ??
    (status >= 500 ? ServerError : status >= 400 ? InvalidRequestError : UpstreamHTTPError);
  return new ErrorClass(message, options);
}

/**
 * Map a rejection from `fetch` (no HTTP status at all) to an upstream error.
 *
 * Timeouts raised by `AbortSignal.timeout` surface as a DOMException named
 * "TimeoutError"; everything else is treated as a network failure.
 */
export function mapTransportError(error: unknown, provider: string): UpstreamHTTPError {
  if (error instanceof UpstreamHTTPError) return error;

  const name = error instanceof Error ? error.name : "";
  const detail = error instanceof Error ? error.message : String(error);

  if (name === "TimeoutError") {
    return new RequestTimeoutError(`Request timed out: ${detail}`, { provider, cause: error });
  }
  return new NetworkError(`Request failed: ${detail}`, { provider, cause: error });
}
