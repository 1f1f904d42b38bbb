/**
 * Gateway RPC call command
 */

import { loadConfig } from "../../config/index.js";
import { printError, printSuccess, formatOutput } from "../utils/output.js";
import { GatewayRpcClient } from "../utils/rpc-client.js";
import type { CliOptions, RpcCallOptions } from "../types.js";

/**
 * Turn `key=value` arguments into params; values are read as JSON when they
 * parse, otherwise kept as strings. A single JSON object argument is used as is.
 */
export function parseCallArgs(args: string[]): Record<string, unknown> {
  const first = args[0];
  if (args.length === 1 && first !== undefined && first.trim().startsWith("{")) {
    const parsed: unknown = JSON.parse(first);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      throw new Error("Params must be a JSON object");
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  const params: Record<string, unknown> = {};
  for (const arg of args) {
    const separator = arg.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Expected key=value, got '${arg}'`);
    }
    const key = arg.slice(0, separator);
    const value = arg.slice(separator + 1);
    try {
      params[key] = JSON.parse(value);
    } catch {
      params[key] = value;
    }
  }
  return params;
}

/** Call RPC method */
export async function callCommand(method: string, args: string[], options: CliOptions & RpcCallOptions): Promise<void> {
  const config = loadConfig(options.config);
  const client = new GatewayRpcClient(config.gateway.host, config.gateway.port, options.timeout);

  try {
    const params = parseCallArgs(args);
    if (!options.json) {
      printSuccess(`Calling RPC: ${method}`);
    }

    const result = await client.call(method, params, options);
    console.log(formatOutput(result, options.json ? "json" : "table"));
  } catch (error) {
    printError(`RPC call failed: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  } finally {
    client.close();
  }
}
