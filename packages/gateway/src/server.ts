/**
 * HTTP server for the gateway, on `node:http`.
 */

import * as http from "node:http";
import type { ServerResponse } from "node:http";
import type { Readable } from "node:stream";
import { Toolbox, createLogger } from "@toolchat/toolbox";
import type { Logger, ToolCollection } from "@toolchat/toolbox";
import type { GatewayConfig } from "./config.js";
import { RequestBodyTooLargeError, handleRequest, mapErrorToResponse } from "./routes.js";
import type { CompletionService, GatewayContext } from "./routes.js";

/** Largest request body the gateway reads, in bytes. */
export const MAX_BODY_BYTES = 1024 * 1024;

/**
 * Collect a request body as UTF-8 text.
 *
 * Once more than `limit` bytes have arrived the promise rejects with
 * `RequestBodyTooLargeError` and the rest of the stream is drained unread.
 */
export function readRequestBody(req: Readable, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const onData = (chunk: Buffer | string): void => {
      received += Buffer.byteLength(chunk);
      if (received > limit) {
        req.off("data", onData);
        req.off("end", onEnd);
        req.resume();
        reject(new RequestBodyTooLargeError(limit));
        return;
      }
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => {
      resolve(Buffer.concat(chunks).toString("utf8"));
    };

    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", reject);
  });
}

function respondJson(res: ServerResponse, statusCode: number, data: unknown): void {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(data));
}

/** Build the Toolbox a gateway serves from its configuration. */
export function createToolbox(config: GatewayConfig, tools: ToolCollection, logger?: Logger): Toolbox {
  return new Toolbox(tools, {
    rootUrl: config.rootUrl,
    model: config.model,
    apiKey: config.apiKey,
    systemPrompt: config.systemPrompt,
    failOnToolError: config.failOnToolError,
    maxToolRounds: config.maxToolRounds,
    toolTimeoutMs: config.toolTimeoutMs,
    requestTimeoutMs: config.requestTimeoutMs,
    fanOutErrorPolicy: config.fanOutErrorPolicy,
    logger: logger?.child({ module: "toolbox" }),
  });
}

/** Wrap the route handler in a `node:http` server. Does not listen. */
export function createGatewayServer(context: GatewayContext): http.Server {
  const log = context.logger ?? createLogger("gateway");

  return http.createServer((req, res) => {
    const started = Date.now();
    readRequestBody(req)
      .then(
        (body) => handleRequest(context, { method: req.method ?? "GET", path: req.url ?? "/", body }),
        (error: unknown) => mapErrorToResponse(error, log),
      )
      .then((response) => {
        respondJson(res, response.status, response.body);
        log.info(
          { method: req.method, url: req.url, status: response.status, ms: Date.now() - started },
          "Request served",
        );
      })
      .catch((error: unknown) => {
        log.error({ err: error }, "Error handling request");
        if (!res.headersSent) {
          respondJson(res, 500, { error: { message: "Internal server error", type: "internal_error" } });
        } else {
          res.end();
        }
      });
  });
}

export interface StartServerOptions {
  /** Tools exposed to the model. Ignored when `service` is given. */
  tools?: ToolCollection;
  /** Replaces the Toolbox built from the configuration. */
  service?: CompletionService;
  logger?: Logger;
}

export interface RunningGateway {
  readonly server: http.Server;
  /** Base URL the server listens on. */
  readonly url: string;
  close(): Promise<void>;
}

/**
 * Build the gateway from configuration and start listening.
 */
export async function startServer(
  config: GatewayConfig,
  options: StartServerOptions = {},
): Promise<RunningGateway> {
  const logger = options.logger ?? createLogger("gateway");
  const service = options.service ?? createToolbox(config, options.tools ?? {}, logger);

  const server = createGatewayServer({
    service,
    model: config.model,
    modelOwner: config.modelOwner,
    createdAt: Math.floor(Date.now() / 1000),
    logger,
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : config.port;
  const url = `http://${config.host}:${port}`;
  logger.info({ url, model: config.model, upstream: config.rootUrl }, "Gateway listening");

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
