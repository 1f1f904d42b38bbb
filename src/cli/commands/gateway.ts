/**
 * Gateway management commands
 */

import { loadConfig } from "../../config/index.js";
import { startGateway } from "../../gateway/index.js";
import { GatewayRpcClient } from "../utils/rpc-client.js";
import { formatOutput, printError, printInfo, printSuccess, printWarning } from "../utils/output.js";
import type { CliOptions } from "../types.js";

/** Gateway start command: runs in the foreground until SIGINT/SIGTERM */
export async function gatewayStart(options: CliOptions & { port?: string; demo?: boolean }): Promise<void> {
  const port = options.port !== undefined ? parseInt(options.port, 10) : undefined;
  if (port !== undefined && (isNaN(port) || port < 0 || port > 65535)) {
    printError(`Invalid port: ${options.port}`);
    process.exitCode = 1;
    return;
  }

  const gateway = await startGateway({
    configPath: options.config,
    demoClassifiers: options.demo ?? false,
    port,
  });
  const { host, port: boundPort } = gateway.server.address();
  printSuccess(`Gateway listening on ws://${host}:${boundPort}`);
  if (options.demo) {
    printInfo("Demo classifiers answer sentiment and intent tasks");
  }

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    printInfo(`${signal} received, shutting down gateway...`);
    gateway
      .stop()
      .then(() => printSuccess("Gateway stopped"))
      .catch((error: unknown) => {
        printError(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

/** Gateway status command: asks a running gateway for its stats */
export async function gatewayStatus(options: CliOptions): Promise<void> {
  const config = loadConfig(options.config);
  const client = new GatewayRpcClient(config.gateway.host, config.gateway.port);

  try {
    await client.connect();
    const stats = await client.call("stats.get");
    console.log(formatOutput({ running: true, host: config.gateway.host, port: config.gateway.port, stats }, options.json ? "json" : "table"));
  } catch (error) {
    console.log(formatOutput({ running: false, host: config.gateway.host, port: config.gateway.port }, options.json ? "json" : "table"));
    if (!options.json) {
      printWarning(`Gateway not reachable: ${error instanceof Error ? error.message : String(error)}`);
    }
  } finally {
    client.close();
  }
}
