/**
 * Library entry point: embed the bridge or its building blocks.
 */

export { Bridge, discoverOpenApi, type BridgeDependencies } from "./mcp/bridge.js";
export { bridgeConfigSchema, type BridgeConfig, type BridgeConfigInput } from "./mcp/config.js";
export { resolveConfig, type CliOverrides, type ResolveConfigOptions } from "./cli/config-manager.js";
export {
  CapabilityDiscovery,
  validateToolEntries,
  type DiscoveryResult,
  type ToolDescriptor,
} from "./mcp/capability-discovery.js";
export { DynamicRouter, buildRouteTable, shapeToolResult, type RouteTable } from "./mcp/dynamic-router.js";
export { BridgeHttpServer, type HealthReport } from "./mcp/http-server.js";
export { toOpenApi, type OpenApiDocument } from "./mcp/openapi-translator.js";
export {
  ProcessSupervisor,
  type ChildProcessLike,
  type LifecycleState,
  type SpawnFunction,
  type SubprocessHandle,
} from "./mcp/process-supervisor.js";
export { RequestCorrelator } from "./mcp/request-correlator.js";
export { StdioFramer } from "./mcp/stdio-framer.js";
export * from "./utils/errors.js";
export { initializeLogger } from "./utils/logger.js";
export { BRIDGE_NAME, BRIDGE_VERSION } from "./version.js";
