/**
 * Error hierarchy for the chat-completion client.
 *
 * All library errors inherit from SDKError. Everything that goes wrong while
 * talking to the completion endpoint (non-2xx status, transport failure,
 * timeout, unreadable body) is an UpstreamHTTPError. Nothing retries: the
 * whole family is one terminal failure for the caller.
 */

// ---------------------------------------------------------------------------
// SDKError: base for all library errors
// ---------------------------------------------------------------------------

/** Base error for all toolchat errors. */
export class SDKError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "SDKError";
  }
}

// ---------------------------------------------------------------------------
// UpstreamHTTPError: failures of the remote completion endpoint
// ---------------------------------------------------------------------------

/** Constructor options shared by every upstream error. */
export interface UpstreamErrorOptions {
  /** Which provider adapter saw the failure. */
  provider: string;
  /** HTTP status code; absent for transport-level failures. */
  status_code?: number;
  /** Error code from the body (`error.code` or `error.type`). */
  error_code?: string;
  cause?: unknown;
}

/** Non-2xx status or transport failure from the completion endpoint. */
export class UpstreamHTTPError extends SDKError {
  readonly provider: string;
  readonly status_code?: number;
  readonly error_code?: string;

  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, { cause: options.cause });
    this.name = "UpstreamHTTPError";
    this.provider = options.provider;
    this.status_code = options.status_code;
    this.error_code = options.error_code;
  }
}

/** 401 or 403: the endpoint refused the API key. */
export class AuthenticationError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** 404: wrong root URL or unknown model. */
export class NotFoundError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "NotFoundError";
  }
}

/** Any other 4xx: the endpoint rejected the request body. */
export class InvalidRequestError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "InvalidRequestError";
  }
}

/** 429. */
export class RateLimitError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "RateLimitError";
  }
}

/** 5xx. */
export class ServerError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "ServerError";
  }
}

/** 408, or the per-request timeout fired before the endpoint answered. */
export class RequestTimeoutError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "RequestTimeoutError";
  }
}

/** DNS failure, refused connection, reset socket. */
export class NetworkError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/** 2xx status whose body is not a chat completion. */
export class MalformedResponseError extends UpstreamHTTPError {
  constructor(message: string, options: UpstreamErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}

// ---------------------------------------------------------------------------
// Non-upstream errors
// ---------------------------------------------------------------------------

/** Misconfiguration (bad base URL, invalid environment). */
export class ConfigurationError extends SDKError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
