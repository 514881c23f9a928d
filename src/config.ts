import * as z from "zod";
import TOML from "@iarna/toml";
import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { DEFAULT_API_URL } from "./client.js";
import { DEFAULT_RETRY_INTERVAL_MS, RETRY_TIMEOUTS } from "./retry.js";

const ApiConfigSchema = z.object({
  token: z.string().min(1),
  base_url: z.url().default(DEFAULT_API_URL),
});

const RetryConfigSchema = z.object({
  interval_ms: z.number().int().positive().default(DEFAULT_RETRY_INTERVAL_MS),
  lookup_timeout_ms: z.number().int().positive().default(RETRY_TIMEOUTS.lookup),
  read_timeout_ms: z.number().int().positive().default(RETRY_TIMEOUTS.read),
  write_timeout_ms: z.number().int().positive().default(RETRY_TIMEOUTS.write),
});

const LogConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  json: z.boolean().default(false),
});

export const ClientConfigSchema = z.object({
  api: ApiConfigSchema,
  retry: RetryConfigSchema.prefault({}),
  log: LogConfigSchema.prefault({}),
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export const DEFAULT_CONFIG_PATH = "oncall.toml";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Loads client configuration from a TOML file.
 *
 * `PAGERDUTY_TOKEN` and `PAGERDUTY_API_URL` override `api.token` and
 * `api.base_url`. Without an explicit path, a missing `oncall.toml` is not an
 * error, so configuration can come from the environment alone.
 *
 * @example oncall.toml
 * ```toml
 * [api]
 * token = "test-token"
 *
 * [retry]
 * write_timeout_ms = 60000
 *
 * [log]
 * level = "debug"
 * ```
 */
export function loadClientConfig(
  configPath?: string,
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const resolvedPath = resolve(configPath ?? DEFAULT_CONFIG_PATH);
  const parsed: Record<string, unknown> =
    configPath !== undefined || existsSync(resolvedPath)
      ? TOML.parse(readFileSync(resolvedPath, "utf-8"))
      : {};

  // Environment variable overrides for secrets
  const api: Record<string, unknown> = isRecord(parsed["api"]) ? { ...parsed["api"] } : {};
  if (env["PAGERDUTY_TOKEN"]) api["token"] = env["PAGERDUTY_TOKEN"];
  if (env["PAGERDUTY_API_URL"]) api["base_url"] = env["PAGERDUTY_API_URL"];

  return ClientConfigSchema.parse({ ...parsed, api });
}
