/**
 * CLI Commands for the MCP OpenAPI Bridge
 *
 * Each command resolves its configuration, does its work and returns the
 * process exit code; index.ts owns process.exit().
 */

import chalk from "chalk";
import * as fs from "node:fs";
import * as path from "node:path";
import { getConfigFilePath, resolveConfig, type CliOverrides } from "./config-manager.js";
import { Bridge, discoverOpenApi, type BridgeDependencies } from "../mcp/bridge.js";
import type { BridgeConfig } from "../mcp/config.js";
import { ConfigError, errorMessage } from "../utils/errors.js";
import { initializeLogger, logError, logInfo } from "../utils/logger.js";

/**
 * Resolve the configuration, printing validation problems to stderr.
 * Returns null when the configuration is unusable.
 */
function loadBridgeConfig(cli: CliOverrides, command: string[]): BridgeConfig | null {
  try {
    return resolveConfig({ cli, command });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red("✗") + ` ${error.message}`);
      for (const issue of error.issues) {
        console.error(`  ${chalk.bold(issue.path)}: ${issue.message}`);
      }
      if (command.length === 0) {
        console.error(`\nPass the tool server command after ${chalk.cyan("--")}, e.g.`);
        console.error(`  ${chalk.cyan("mcp-openapi-bridge --port 8000 -- node ./my-mcp-server.js")}\n`);
      }
      return null;
    }
    throw error;
  }
}

function setupLogging(config: BridgeConfig, debug?: boolean): void {
  initializeLogger({ debug, level: config.log.level, format: config.log.format });
}

/**
 * Run the bridge until SIGINT/SIGTERM, or until the tool server exhausts its restarts.
 */
export async function runBridgeCommand(
  cli: CliOverrides,
  command: string[],
  deps: BridgeDependencies = {}
): Promise<number> {
  const config = loadBridgeConfig(cli, command);
  if (!config) return 1;
  setupLogging(config, cli.debug);

  if (config.log.format === "text") {
    console.error(chalk.cyan("\n🚀 MCP OpenAPI Bridge"));
    console.error(chalk.cyan("=====================\n"));
  }

  const bridge = new Bridge(config, deps);

  const onSignal = (signal: NodeJS.Signals) => {
    logInfo(`Received ${signal}`, { component: "CLI" });
    void bridge.stop();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    await bridge.start();
    logInfo(`Bridging ${[config.subprocess.command, ...config.subprocess.args].join(" ")}`, { component: "CLI" });
  } catch (error) {
    logError(`Failed to start bridge: ${errorMessage(error)}`, { component: "CLI" });
    await bridge.stop();
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    return 1;
  }

  const code = await bridge.done;
  process.off("SIGINT", onSignal);
  process.off("SIGTERM", onSignal);
  return code;
}

/**
 * Discover the tool server's tools once and print (or save) the OpenAPI document.
 */
export async function openApiCommand(
  cli: CliOverrides,
  command: string[],
  output?: string,
  deps: BridgeDependencies = {}
): Promise<number> {
  const config = loadBridgeConfig(cli, command);
  if (!config) return 1;
  setupLogging(config, cli.debug);

  try {
    const document = await discoverOpenApi(config, deps);
    const text = `${JSON.stringify(document, null, 2)}\n`;

    if (output) {
      const filePath = path.resolve(output);
      fs.writeFileSync(filePath, text, "utf-8");
      console.error(chalk.green("✓") + ` Wrote ${Object.keys(document.paths).length} operation(s) to ${filePath}`);
    } else {
      process.stdout.write(text);
    }
    return 0;
  } catch (error) {
    logError(`Failed to generate OpenAPI document: ${errorMessage(error)}`, { component: "CLI" });
    return 1;
  }
}

/**
 * Show where configuration comes from and print the effective result.
 */
export function configInfoCommand(cli: CliOverrides, command: string[]): number {
  const filePath = getConfigFilePath(cli.config);

  console.error(chalk.cyan("\nConfiguration Information\n"));
  if (filePath) {
    const exists = fs.existsSync(filePath);
    console.error(`Config file:     ${chalk.bold(filePath)}`);
    console.error(`Status:          ${exists ? chalk.green("exists") : chalk.red("missing")}`);
  } else {
    console.error(`Config file:     ${chalk.dim("none (defaults, environment and flags only)")}`);
  }
  console.error();

  const config = loadBridgeConfig(cli, command);
  if (!config) return 1;

  process.stdout.write(`${JSON.stringify(config, null, 2)}\n`);
  return 0;
}
