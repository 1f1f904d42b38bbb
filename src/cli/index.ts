/**
 * deskflow CLI - Main entry point
 */

import { Command } from "commander";
import type { CliOptions } from "./types.js";

// Gateway commands
import { gatewayStart, gatewayStatus } from "./commands/gateway.js";

// In-process simulation
import { simulateCommand } from "./commands/simulate.js";

// RPC call command
import { callCommand } from "./commands/call.js";

// Config commands
import { configPath, configShow, configValidate } from "./commands/config.js";

/** Helper to get CLI options from the root program */
function getCliOptions(program: Command): CliOptions {
  const opts = program.opts<{ json?: boolean; verbose?: boolean; config?: string }>();
  return {
    json: opts.json ?? false,
    verbose: opts.verbose ?? false,
    config: opts.config,
  };
}

/** Create CLI program */
export function createCli(): Command {
  const program = new Command();

  program
    .name("deskflow")
    .description("Event-driven customer-support workflow")
    .version("0.1.0");

  // Global options
  program.option("--json", "Output in JSON format");
  program.option("--verbose", "Verbose output");
  program.option("-c, --config <path>", "Config file path");

  // Gateway commands
  const gatewayCmd = program.command("gateway")
    .description("Gateway management");

  gatewayCmd.command("start")
    .description("Start the gateway in the foreground")
    .option("-p, --port <port>", "Listen port (overrides config)")
    .option("--demo", "Answer classification tasks with keyword rules")
    .action(async (options: { port?: string; demo?: boolean }) => {
      await gatewayStart({ ...getCliOptions(program), ...options });
    });

  gatewayCmd.command("status")
    .description("Show gateway status")
    .action(async () => {
      await gatewayStatus(getCliOptions(program));
    });

  // Simulate command
  program.command("simulate")
    .description("Run customer messages through an in-process workflow")
    .argument("<messages...>", "Customer messages, sent in order")
    .option("-s, --session <id>", "Session id", "sim-1")
    .option("--resolve", "Answer routed tasks with a final reply")
    .option("--operator <id>", "Operator that takes and closes escalations")
    .action(async (messages: string[], options: { session?: string; resolve?: boolean; operator?: string }) => {
      await simulateCommand(messages, { ...getCliOptions(program), ...options });
    });

  // Gateway call command (direct RPC invocation)
  program.command("call")
    .description("Call RPC method directly")
    .argument("<rpc>", "RPC method to call (e.g., queue.status, chat.send)")
    .argument("[params...]", "key=value pairs or one JSON object")
    .option("--timeout <ms>", "Request timeout in milliseconds", "5000")
    .action(async (rpc: string, params: string[], options: { timeout: string }) => {
      await callCommand(rpc, params, { ...getCliOptions(program), timeout: parseInt(options.timeout, 10) });
    });

  // Config commands
  const configCmd = program.command("config")
    .description("Configuration");

  configCmd.command("show")
    .description("Show the effective configuration")
    .action(async () => {
      await configShow(getCliOptions(program));
    });

  configCmd.command("path")
    .description("Show the config file path")
    .action(async () => {
      await configPath(getCliOptions(program));
    });

  configCmd.command("validate")
    .description("Validate a config file")
    .argument("<file>", "Config file to check")
    .action(async (file: string) => {
      await configValidate(file, getCliOptions(program));
    });

  return program;
}

/** Run CLI */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
