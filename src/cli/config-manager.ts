/**
 * Configuration Manager for the MCP OpenAPI Bridge
 *
 * Resolves the effective BridgeConfig from four layers, later ones winning:
 *
 *   defaults < JSON config file < environment < command-line flags
 *
 * The merged result is validated once by the zod schema in mcp/config.ts.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { bridgeConfigSchema, type BridgeConfig } from "../mcp/config.js";
import { isRecord } from "../mcp/schema-utils.js";
import { ConfigError, errorMessage } from "../utils/errors.js";

export const CONFIG_ENV_VAR = "MCP_BRIDGE_CONFIG";

/** Options as parsed by commander; every field is optional. */
export interface CliOverrides {
  config?: string;
  host?: string;
  port?: string;
  timeout?: string;
  maxRestarts?: string;
  corsOrigin?: string[];
  /** commander sets this to false for --no-cors */
  cors?: boolean;
  logFormat?: string;
  debug?: boolean;
}

export interface ResolveConfigOptions {
  cli?: CliOverrides;
  /** Tool server command line given after `--` */
  command?: string[];
  env?: NodeJS.ProcessEnv;
}

type Layer = Record<string, unknown>;

/**
 * Get the config file path, from the flag or the MCP_BRIDGE_CONFIG variable.
 * Returns undefined when neither is set (no file layer).
 */
export function getConfigFilePath(overridePath?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const configured = overridePath ?? env[CONFIG_ENV_VAR];
  return configured ? path.resolve(configured) : undefined;
}

/**
 * Load the JSON config file. Unlike defaults, an explicitly named file must exist.
 */
export function loadConfigFile(filePath: string): Layer {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Config file not found at: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file at ${filePath}: ${errorMessage(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Config file at ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  // NaN is left for the schema to reject with the offending path
  return Number(value);
}

/**
 * Environment layer: MCP_BRIDGE_HOST, MCP_BRIDGE_PORT,
 * MCP_BRIDGE_CALL_TIMEOUT_MS, LOG_LEVEL and LOG_FORMAT.
 */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
  return {
    host: env.MCP_BRIDGE_HOST || undefined,
    port: toNumber(env.MCP_BRIDGE_PORT),
    callTimeoutMs: toNumber(env.MCP_BRIDGE_CALL_TIMEOUT_MS),
    log: {
      level: env.LOG_LEVEL || undefined,
      format: env.LOG_FORMAT || undefined,
    },
  };
}

/** Command-line layer, including the tool server command after `--`. */
export function cliLayer(cli: CliOverrides, command: string[] = []): Layer {
  const [executable, ...args] = command;

  return {
    host: cli.host,
    port: toNumber(cli.port),
    callTimeoutMs: toNumber(cli.timeout),
    subprocess: executable !== undefined ? { command: executable, args } : undefined,
    restart: { maxRestarts: toNumber(cli.maxRestarts) },
    http: {
      corsOrigins: cli.corsOrigin,
      // --no-cors only ever disables; without it the lower layers decide
      cors: cli.cors === false ? false : undefined,
    },
    log: {
      level: cli.debug ? "debug" : undefined,
      format: cli.logFormat,
    },
  };
}

/**
 * Deep-merge `override` onto `base`. Undefined values are skipped and arrays
 * are replaced, not concatenated.
 */
export function mergeLayers(base: Layer, override: Layer): Layer {
  const merged: Layer = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
  }
  return merged;
}

/**
 * Resolve and validate the effective configuration.
 * Throws ConfigError listing every invalid field.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const cli = options.cli ?? {};

  const filePath = getConfigFilePath(cli.config, env);
  const fileLayer = filePath ? loadConfigFile(filePath) : {};

  const merged = [envLayer(env), cliLayer(cli, options.command)].reduce(mergeLayers, fileLayer);

  const result = bridgeConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join(".") : "(root)",
      message: issue.message,
    }));
    const source = filePath ? ` (config file: ${filePath})` : "";
    throw new ConfigError(`Invalid configuration${source}`, issues);
  }
  return result.data;
}
