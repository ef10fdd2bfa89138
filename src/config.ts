import path from "node:path";
import { config as dotenvConfig } from "dotenv";
import { z } from "zod";
import { ConfigError } from "./errors.js";

dotenvConfig();

export const DEFAULT_USER_AGENT = "Mozilla/5.0 (X11; Linux x86_64; rv:89.0) Gecko/20100101 Firefox/89.0";

function required(label: string, flag: string) {
  const message = `missing ${label} (set it or pass ${flag})`;
  return z.string({ required_error: message }).trim().min(1, message);
}

const schema = z.object({
  MIRROR_API_KEY: required("API key", "--api-key"),
  MIRROR_SESSION_COOKIE: required("session cookie", "--session-cookie"),
  MIRROR_ROOT_NODE_ID: required("root node id", "--node-id"),
  MIRROR_BASE_URL: required("base URL", "--base-url").url("must be an absolute http(s) URL"),
  MIRROR_OUTPUT_DIR: z.string().default("."),
  MIRROR_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  MIRROR_FETCH_RETRIES: z.coerce.number().int().min(0).default(3),
  MIRROR_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  MIRROR_PAGE_RETRY_LIMIT: z.coerce.number().int().min(0).default(0),
  MIRROR_PAGE_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  MIRROR_PROGRESS: z
    .enum(["0", "1", "false", "true", "FALSE", "TRUE"])
    .optional()
    .default("1")
    .transform((value) => value === "1" || value.toLowerCase() === "true"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info")
});

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

export type AppConfig = {
  apiKey: string;
  sessionCookie: string;
  rootNodeId: string;
  baseUrl: string;
  outputDir: string;
  userAgent: string;
  fetchRetries: number;
  retryDelayMs: number;
  /** Consecutive failures tolerated for one page; 0 keeps retrying forever. */
  pageRetryLimit: number;
  pageRetryDelayMs: number;
  progress: boolean;
  logLevel: LogLevel;
};

/** Values given on the command line; they win over the environment. */
export type ConfigOverrides = {
  apiKey?: string;
  sessionCookie?: string;
  nodeId?: string;
  baseUrl?: string;
  outputDir?: string;
  pageRetryLimit?: string;
  progress?: boolean;
};

export function loadConfig(overrides: ConfigOverrides = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const input: Record<string, string> = {};
  for (const key of Object.keys(schema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== "") input[key] = value;
  }

  if (overrides.apiKey !== undefined) input.MIRROR_API_KEY = overrides.apiKey;
  if (overrides.sessionCookie !== undefined) input.MIRROR_SESSION_COOKIE = overrides.sessionCookie;
  if (overrides.nodeId !== undefined) input.MIRROR_ROOT_NODE_ID = overrides.nodeId;
  if (overrides.baseUrl !== undefined) input.MIRROR_BASE_URL = overrides.baseUrl;
  if (overrides.outputDir !== undefined) input.MIRROR_OUTPUT_DIR = overrides.outputDir;
  if (overrides.pageRetryLimit !== undefined) input.MIRROR_PAGE_RETRY_LIMIT = overrides.pageRetryLimit;
  if (overrides.progress === false) input.MIRROR_PROGRESS = "0";

  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const parsed = result.data;
  return {
    apiKey: parsed.MIRROR_API_KEY,
    sessionCookie: parsed.MIRROR_SESSION_COOKIE,
    rootNodeId: parsed.MIRROR_ROOT_NODE_ID,
    baseUrl: parsed.MIRROR_BASE_URL.replace(/\/$/, ""),
    outputDir: path.resolve(parsed.MIRROR_OUTPUT_DIR),
    userAgent: parsed.MIRROR_USER_AGENT,
    fetchRetries: parsed.MIRROR_FETCH_RETRIES,
    retryDelayMs: parsed.MIRROR_RETRY_DELAY_MS,
    pageRetryLimit: parsed.MIRROR_PAGE_RETRY_LIMIT,
    pageRetryDelayMs: parsed.MIRROR_PAGE_RETRY_DELAY_MS,
    progress: parsed.MIRROR_PROGRESS,
    logLevel: parsed.LOG_LEVEL
  };
}
