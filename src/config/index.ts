// Configuration loader and validator

import fs from "fs";
import path from "path";
import type { ZodIssue } from "zod";
import { ConfigError } from "../utils/errors.js";
import { DEFAULT_HOME, systemConfigSchema, type SystemConfig } from "./schema.js";

export * from "./schema.js";

const DEFAULT_CONFIG_PATH = path.join(DEFAULT_HOME, "config.json");

/**
 * Load configuration from a JSON file.
 * Priority: env > config.json > defaults
 *
 * A missing or unparsable file falls back to defaults; a file that parses but
 * fails validation throws ConfigError.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const filePath = configPath || getConfigPath(env);

  if (!fs.existsSync(filePath)) {
    return applyEnvironmentVariables(getDefaultConfig(), env);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    console.warn(`Failed to read config from ${filePath}, using defaults: ${error instanceof Error ? error.message : String(error)}`);
    return applyEnvironmentVariables(getDefaultConfig(), env);
  }

  return applyEnvironmentVariables(parseConfig(raw, filePath), env);
}

/**
 * Validate an already-parsed config object and fill in defaults.
 */
export function parseConfig(input: unknown, source = "config"): SystemConfig {
  const result = systemConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(source, result.error.issues.map(formatIssue));
  }
  return result.data;
}

export function getDefaultConfig(): SystemConfig {
  return systemConfigSchema.parse({});
}

/**
 * Apply environment variables to config.
 * Malformed values are ignored rather than failing startup.
 */
function applyEnvironmentVariables(config: SystemConfig, env: NodeJS.ProcessEnv): SystemConfig {
  const result: SystemConfig = {
    ...config,
    logging: { ...config.logging },
    workflow: { ...config.workflow },
    gateway: { ...config.gateway },
  };

  const level = env.DESKFLOW_LOG_LEVEL;
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    result.logging.level = level;
  }

  if (env.DESKFLOW_GATEWAY_HOST) {
    result.gateway.host = env.DESKFLOW_GATEWAY_HOST;
  }

  if (env.DESKFLOW_GATEWAY_PORT) {
    const port = parseInt(env.DESKFLOW_GATEWAY_PORT, 10);
    if (!isNaN(port) && port >= 0 && port <= 65535) {
      result.gateway.port = port;
    }
  }

  if (env.DESKFLOW_INTENT_THRESHOLD) {
    const threshold = parseFloat(env.DESKFLOW_INTENT_THRESHOLD);
    if (!isNaN(threshold) && threshold >= 0 && threshold <= 1) {
      result.workflow.intentConfidenceThreshold = threshold;
    }
  }

  return result;
}

export function ensureStorageDirectories(config: SystemConfig): void {
  fs.mkdirSync(config.transcripts.path, { recursive: true });

  if (config.logging.logsPath) {
    fs.mkdirSync(config.logging.logsPath, { recursive: true });
  }
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.DESKFLOW_CONFIG;
  if (envPath) {return envPath;}
  return DEFAULT_CONFIG_PATH;
}

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${where}: ${issue.message}`;
}
