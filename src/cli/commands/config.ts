/**
 * Config commands - inspect and validate configuration
 */

import fs from "fs";
import path from "path";
import type { CliOptions } from "../types.js";
import { getConfigPath, loadConfig, parseConfig } from "../../config/index.js";
import { ConfigError } from "../../utils/errors.js";
import { formatOutput, printError, printInfo, printSuccess } from "../utils/output.js";

/**
 * Print the effective configuration (file, env and defaults merged).
 */
export async function configShow(options: CliOptions): Promise<void> {
  const configPath = options.config ?? getConfigPath();
  const config = loadConfig(options.config);

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  printInfo(fs.existsSync(configPath) ? `Loaded from ${configPath}` : `No file at ${configPath}; showing defaults`);
  console.log(
    formatOutput({
      "logging.level": config.logging.level,
      "workflow.escalationSentiments": config.workflow.escalationSentiments.join(", "),
      "workflow.intentConfidenceThreshold": config.workflow.intentConfidenceThreshold,
      "escalation.avgHandlingSeconds": config.escalation.avgHandlingSeconds,
      "watchdog.enabled": config.watchdog.enabled,
      "transcripts.path": config.transcripts.path,
      "gateway.address": `${config.gateway.host}:${config.gateway.port}`,
    })
  );
  console.log(formatOutput(Object.entries(config.workflow.routes).map(([intent, event]) => ({ intent, event }))));
}

/** Print the config file location */
export async function configPath(options: CliOptions): Promise<void> {
  console.log(options.config ?? getConfigPath());
}

/**
 * Validate a config file without starting anything.
 */
export async function configValidate(filePath: string, options: CliOptions): Promise<void> {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    printError(`File not found: ${resolved}`);
    process.exitCode = 1;
    return;
  }

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(resolved, "utf-8"));
    parseConfig(raw, resolved);
    if (options.json) {
      console.log(JSON.stringify({ valid: true, path: resolved }));
    } else {
      printSuccess(`${resolved} is valid`);
    }
  } catch (error) {
    const issues = error instanceof ConfigError ? error.issues : [error instanceof Error ? error.message : String(error)];
    if (options.json) {
      console.log(JSON.stringify({ valid: false, path: resolved, issues }));
    } else {
      printError(`${resolved} is invalid`);
      for (const issue of issues) {
        console.error(`  - ${issue}`);
      }
    }
    process.exitCode = 1;
  }
}
