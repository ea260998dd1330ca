/**
 * Gateway configuration, read from environment variables and validated
 * with zod.
 */

import { z } from "zod";
import { ConfigurationError, NO_API_KEY } from "@toolchat/llm-client";
import { FanOutErrorPolicy } from "@toolchat/toolbox";

export const HttpUrlSchema = z
  .string()
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, "Invalid URL (expected http:// or https://)");

const EnvBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const PositiveInt = z.coerce.number().int().positive();

const LogLevelEnum = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

const EnvSchema = z.object({
  ROOT_URL: HttpUrlSchema,
  LLM_MODEL: z.string().default("toolchat"),
  MODEL_OWNER: z.string().default("toolchat"),
  API_KEY: z.string().default(NO_API_KEY),
  SYSTEM_PROMPT: z.string().optional(),
  FAIL_ON_TOOL_ERROR: EnvBoolean.default("false"),
  MAX_TOOL_ROUNDS: PositiveInt.default(10),
  TOOL_TIMEOUT_MS: PositiveInt.default(30_000),
  REQUEST_TIMEOUT_MS: PositiveInt.default(15_000),
  FANOUT_ERROR_POLICY: z
    .enum([FanOutErrorPolicy.PARTIAL, FanOutErrorPolicy.FAIL_ALL])
    .default(FanOutErrorPolicy.PARTIAL),
  HOST: z.string().default("127.0.0.1"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  LOG_LEVEL: LogLevelEnum.default("info"),
});

export type LogLevel = z.infer<typeof LogLevelEnum>;

export interface GatewayConfig {
  /** API root of the OpenAI-compatible backend, e.g. `http://localhost:8080/v1/`. */
  readonly rootUrl: string;
  /** Model id sent upstream and listed by `/v1/models`. */
  readonly model: string;
  readonly modelOwner: string;
  readonly apiKey: string;
  readonly systemPrompt?: string;
  readonly failOnToolError: boolean;
  readonly maxToolRounds: number;
  readonly toolTimeoutMs: number;
  readonly requestTimeoutMs: number;
  readonly fanOutErrorPolicy: FanOutErrorPolicy;
  readonly host: string;
  readonly port: number;
  readonly logLevel: LogLevel;
}

/** Unset and empty variables are treated alike. */
function presentValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") values[key] = value;
  }
  return values;
}

/**
 * Load and validate configuration from environment variables.
 *
 * @throws ConfigurationError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const result = EnvSchema.safeParse(presentValues(env));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, {
      cause: result.error,
    });
  }

  const vars = result.data;
  return {
    rootUrl: vars.ROOT_URL,
    model: vars.LLM_MODEL,
    modelOwner: vars.MODEL_OWNER,
    apiKey: vars.API_KEY,
    ...(vars.SYSTEM_PROMPT !== undefined ? { systemPrompt: vars.SYSTEM_PROMPT } : {}),
    failOnToolError: vars.FAIL_ON_TOOL_ERROR,
    maxToolRounds: vars.MAX_TOOL_ROUNDS,
    toolTimeoutMs: vars.TOOL_TIMEOUT_MS,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    fanOutErrorPolicy: vars.FANOUT_ERROR_POLICY,
    host: vars.HOST,
    port: vars.PORT,
    logLevel: vars.LOG_LEVEL,
  };
}
