#!/usr/bin/env node

/**
 * MCP OpenAPI Bridge CLI
 *
 * Main entry point for the command-line interface
 *
 * Usage:
 *   mcp-openapi-bridge [run] [options] -- <command> [args...]      - Serve the tool server over HTTP
 *   mcp-openapi-bridge openapi [options] -- <command> [args...]    - Print the generated OpenAPI document
 *   mcp-openapi-bridge config [options] [-- <command> [args...]]   - Show the effective configuration
 */

import { Command, Option } from "commander";
import { configInfoCommand, openApiCommand, runBridgeCommand } from "./commands.js";
import { CONFIG_ENV_VAR, type CliOverrides } from "./config-manager.js";
import { BRIDGE_NAME, BRIDGE_VERSION } from "../version.js";

const program = new Command();

program
  .name(BRIDGE_NAME)
  .description("Expose a stdio MCP tool server as an HTTP API with a generated OpenAPI document")
  .version(BRIDGE_VERSION)
  .enablePositionalOptions();

const configOption = () =>
  new Option("-c, --config <path>", `Path to a JSON configuration file (env: ${CONFIG_ENV_VAR})`);

// Main 'run' command
program
  .command("run", { isDefault: true })
  .description("Start the bridge (default command)")
  .argument("[command...]", "Tool server command and its arguments (after --)")
  .passThroughOptions()
  .addOption(configOption())
  .option("--host <host>", "Host to bind to (default: 0.0.0.0)")
  .option("-p, --port <number>", "Port to listen on (default: 8000)")
  .option("-t, --timeout <ms>", "Deadline for each tool call in milliseconds (default: 30000)")
  .option("--max-restarts <n>", "Restarts allowed within the restart window before giving up (default: 5)")
  .option("--cors-origin <origins...>", "Allowed CORS origins (default: *)")
  .option("--no-cors", "Disable CORS headers")
  .addOption(new Option("--log-format <format>", "Log output format").choices(["text", "json"]))
  .option("-d, --debug", "Enable debug logging")
  .addHelpText(
    "after",
    `
Examples:
  $ mcp-openapi-bridge -- node ./weather-server.js
  $ mcp-openapi-bridge --port 9000 --timeout 10000 -- uvx mcp-server-time
  $ mcp-openapi-bridge --config bridge.json --log-format json -- npx -y @modelcontextprotocol/server-everything
`
  )
  .action(async (command: string[], options: CliOverrides) => {
    process.exit(await runBridgeCommand(options, command));
  });

program
  .command("openapi")
  .description("Start the tool server once and print its OpenAPI document")
  .argument("[command...]", "Tool server command and its arguments (after --)")
  .passThroughOptions()
  .addOption(configOption())
  .option("-o, --output <file>", "Write the document to a file instead of stdout")
  .option("-t, --timeout <ms>", "Deadline for the handshake and tool listing in milliseconds")
  .addOption(new Option("--log-format <format>", "Log output format").choices(["text", "json"]))
  .option("-d, --debug", "Enable debug logging")
  .action(async (command: string[], options: CliOverrides & { output?: string }) => {
    process.exit(await openApiCommand(options, command, options.output));
  });

program
  .command("config")
  .description("Show configuration sources and the effective configuration")
  .argument("[command...]", "Tool server command and its arguments (after --)")
  .passThroughOptions()
  .addOption(configOption())
  .option("--host <host>", "Host to bind to")
  .option("-p, --port <number>", "Port to listen on")
  .option("-t, --timeout <ms>", "Deadline for each tool call in milliseconds")
  .action((command: string[], options: CliOverrides) => {
    process.exit(configInfoCommand(options, command));
  });

await program.parseAsync();
