import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import { Cron } from "croner";
import type { ZodIssue } from "zod";
import { ConfigError, errorMessage } from "../errors.js";
import { isLogLevel } from "../logging/logger.js";
import { PROVIDER_NAMES, type ProviderName } from "../providers/types.js";
import { CONFIG_FILE, DEFAULT_CONFIG } from "./defaults.js";
import { ConfigPatchSchema, ConfigSchema, type ConfigPatch, type DevpulseConfig, type ProviderConfig } from "./schema.js";

export interface LoadConfigOptions {
  /** Config file; a missing file is not an error. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest precedence, typically CLI flags. */
  overrides?: ConfigPatch;
}

function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
}

export function readConfigFile(path: string): ConfigPatch {
  const full = resolve(path);
  if (!existsSync(full)) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(full, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Cannot read ${full}`, [errorMessage(err)]);
  }
  const parsed = ConfigPatchSchema.safeParse(raw);
  if (!parsed.success) throw new ConfigError(`Invalid config file ${full}`, formatIssues(parsed.error.issues));
  return parsed.data;
}

function envNumber(value: string | undefined): number | undefined {
  return value === undefined || value === "" ? undefined : Number(value);
}

function envBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value.toLowerCase() === "true" || value === "1";
}

type ProviderPatch = NonNullable<NonNullable<ConfigPatch["providers"]>["openai"]>;

function providerFromEnv(env: NodeJS.ProcessEnv, prefix: "OPENAI" | "ANTHROPIC"): ProviderPatch {
  const patch: ProviderPatch = {};
  // Usage endpoints need an admin key; a plain API key is accepted as a fallback.
  const apiKey = env[`${prefix}_ADMIN_KEY`] || env[`${prefix}_API_KEY`];
  if (apiKey) {
    patch.apiKey = apiKey;
    patch.enabled = true;
  }
  const enabled = envBool(env[`${prefix}_ENABLED`]);
  if (enabled !== undefined) patch.enabled = enabled;
  if (prefix === "OPENAI" && env.OPENAI_ORG_ID) patch.organizationId = env.OPENAI_ORG_ID;
  if (env[`${prefix}_BASE_URL`]) patch.baseUrl = env[`${prefix}_BASE_URL`];
  return patch;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigPatch {
  const patch: ConfigPatch = {};
  if (env.DEVPULSE_HOST) patch.host = env.DEVPULSE_HOST;
  const otlpPort = envNumber(env.DEVPULSE_OTLP_PORT);
  if (otlpPort !== undefined) patch.otlpPort = otlpPort;
  const apiPort = envNumber(env.DEVPULSE_API_PORT);
  if (apiPort !== undefined) patch.apiPort = apiPort;
  const wsPort = envNumber(env.DEVPULSE_WS_PORT);
  if (wsPort !== undefined) patch.wsPort = wsPort;
  if (env.DATABASE_URL) {
    patch.databaseUrl = env.DATABASE_URL;
    patch.storage = "postgres";
  }
  const level = env.DEVPULSE_LOG_LEVEL;
  if (level) {
    if (!isLogLevel(level)) throw new ConfigError("Invalid DEVPULSE_LOG_LEVEL", [`unknown level ${level}`]);
    patch.logging = { level };
  }
  if (env.DEVPULSE_LOG_FILE) patch.logging = { ...patch.logging, file: env.DEVPULSE_LOG_FILE };
  patch.providers = {
    openai: providerFromEnv(env, "OPENAI"),
    anthropic: providerFromEnv(env, "ANTHROPIC"),
  };
  return patch;
}

export function applyPatch(base: DevpulseConfig, patch: ConfigPatch): DevpulseConfig {
  const { dashboard, logging, providers, ...top } = patch;
  return {
    ...base,
    ...top,
    dashboard: { ...base.dashboard, ...dashboard },
    logging: { ...base.logging, ...logging },
    providers: {
      openai: { ...base.providers.openai, ...providers?.openai },
      anthropic: { ...base.providers.anthropic, ...providers?.anthropic },
    },
  };
}

/** defaults ← config file ← environment ← overrides, validated as a whole. */
export function loadConfig(options: LoadConfigOptions = {}): DevpulseConfig {
  const layers = [
    readConfigFile(options.path ?? CONFIG_FILE),
    configFromEnv(options.env ?? process.env),
    options.overrides ?? {},
  ];
  const merged = layers.reduce(applyPatch, DEFAULT_CONFIG);
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) throw new ConfigError("Invalid configuration", formatIssues(parsed.error.issues));
  return parsed.data;
}

export function validateProviderConfig(config: ProviderConfig): string[] {
  const issues: string[] = [];
  if (!config.enabled) return issues;
  if (!config.apiKey) issues.push("API key is required but not provided");
  try {
    new Cron(config.schedule, { paused: true }).stop();
  } catch (err) {
    issues.push(`invalid schedule '${config.schedule}': ${errorMessage(err)}`);
  }
  if (config.maxRetries < 0) issues.push("maxRetries cannot be negative");
  if (config.timeoutMs < 1000) issues.push("timeoutMs must be at least 1000");
  return issues;
}

/** Issues per enabled provider; providers without issues are left out. */
export function validateProviderConfigs(config: DevpulseConfig): Partial<Record<ProviderName, string[]>> {
  const result: Partial<Record<ProviderName, string[]>> = {};
  for (const name of PROVIDER_NAMES) {
    const issues = validateProviderConfig(config.providers[name]);
    if (issues.length > 0) result[name] = issues;
  }
  return result;
}
