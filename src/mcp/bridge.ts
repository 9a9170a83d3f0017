/**
 * Bridge orchestration.
 *
 * Wires Supervisor → Discovery → Translator → Router → HTTP. Every new
 * generation's handshake runs discovery and publishes a complete route table
 * before the supervisor reports ready.
 */

import type { AddressInfo } from "node:net";
import { CapabilityDiscovery } from "./capability-discovery.js";
import type { BridgeConfig } from "./config.js";
import { DynamicRouter, buildRouteTable } from "./dynamic-router.js";
import { BridgeHttpServer, type HealthReport } from "./http-server.js";
import { toOpenApi, type OpenApiDocument } from "./openapi-translator.js";
import {
  ProcessSupervisor,
  type GenerationContext,
  type SpawnFunction,
  type SubprocessHandle,
} from "./process-supervisor.js";
import { BRIDGE_NAME, BRIDGE_VERSION } from "../version.js";
import { errorMessage } from "../utils/errors.js";
import { logError, logInfo } from "../utils/logger.js";

export interface BridgeDependencies {
  /** Replaces child_process.spawn (tests use an in-process fake) */
  spawn?: SpawnFunction;
  random?: () => number;
}

const CLIENT_INFO = { name: BRIDGE_NAME, version: BRIDGE_VERSION };

/**
 * Run the MCP handshake for one generation and build its OpenAPI document.
 */
async function discoverGeneration(context: GenerationContext, timeoutMs: number) {
  const discovery = new CapabilityDiscovery(context.correlator, { clientInfo: CLIENT_INFO, timeoutMs });
  const result = await discovery.discover();
  return { tools: result.tools, openapi: toOpenApi(result.tools, result.serverInfo) };
}

function createSupervisor(
  config: BridgeConfig,
  handshake: (context: GenerationContext) => Promise<void>,
  deps: BridgeDependencies,
  restart = config.restart
): ProcessSupervisor {
  return new ProcessSupervisor({
    callTimeoutMs: config.callTimeoutMs,
    restart,
    shutdown: config.shutdown,
    env: config.subprocess.env,
    cwd: config.subprocess.cwd,
    handshake,
    spawn: deps.spawn,
    random: deps.random,
  });
}

export class Bridge {
  readonly supervisor: ProcessSupervisor;
  readonly router: DynamicRouter;
  readonly http: BridgeHttpServer;

  /** Resolves with the process exit code once the bridge has shut down. */
  readonly done: Promise<number>;

  private resolveDone: (code: number) => void = () => undefined;
  private startup: Promise<SubprocessHandle> | null = null;
  private stopping: Promise<void> | null = null;
  private exitTimer: NodeJS.Timeout | null = null;
  private exhausted = false;

  constructor(
    private readonly config: BridgeConfig,
    deps: BridgeDependencies = {}
  ) {
    this.supervisor = createSupervisor(config, (context) => this.publish(context), deps);
    this.router = new DynamicRouter({
      callTimeoutMs: config.callTimeoutMs,
      state: () => this.supervisor.state,
    });
    this.http = new BridgeHttpServer({
      host: config.host,
      port: config.port,
      bodyLimitBytes: config.http.bodyLimitBytes,
      cors: config.http.cors,
      corsOrigins: config.http.corsOrigins,
      router: this.router,
      health: () => this.health(),
    });

    this.done = new Promise<number>((resolve) => {
      this.resolveDone = resolve;
    });

    this.supervisor.on("terminated", ({ reason, exhausted }) => {
      if (exhausted) this.scheduleExit(reason);
    });
  }

  /**
   * Bind the HTTP listener, then spawn the tool server. Resolves once
   * listening; /health answers 503 until the first generation is ready.
   */
  async start(): Promise<AddressInfo> {
    const address = await this.http.listen();

    const { command, args } = this.config.subprocess;
    this.startup = this.supervisor.start(command, args);
    void this.startup.catch((err: unknown) => {
      logError(`Tool server failed to start: ${errorMessage(err)}`, { component: "Bridge" });
    });

    return address;
  }

  /** Resolves when the first generation is ready; rejects if the supervisor gave up first. */
  whenReady(): Promise<SubprocessHandle> {
    if (!this.startup) {
      return Promise.reject(new Error("Bridge.start() has not been called"));
    }
    return this.startup;
  }

  /** Graceful shutdown: stop accepting connections, stop the tool server, then settle `done`. */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  health(): HealthReport {
    const state = this.supervisor.state;
    return {
      status: state === "ready" ? "ok" : "unavailable",
      state,
      generation: this.supervisor.generation,
      pid: this.supervisor.pid ?? null,
      tools: this.router.current.routes.size,
      restarts: this.supervisor.restarts,
      recentStderr: this.supervisor.recentStderr(),
    };
  }

  private async publish(context: GenerationContext): Promise<void> {
    const { tools, openapi } = await discoverGeneration(context, this.config.callTimeoutMs);
    this.router.swap(buildRouteTable(context.generation, context.correlator, tools, openapi));
  }

  private scheduleExit(reason: string): void {
    this.exhausted = true;
    const delay = this.config.terminatedExitDelayMs;
    logError(`Tool server terminated: ${reason}. Exiting in ${delay}ms`, { component: "Bridge" });

    this.exitTimer = setTimeout(() => {
      this.exitTimer = null;
      void this.stop();
    }, delay);
  }

  private async shutdown(): Promise<void> {
    logInfo("Shutting down bridge...", { component: "Bridge" });
    if (this.exitTimer) {
      clearTimeout(this.exitTimer);
      this.exitTimer = null;
    }

    // Stop accepting first; in-flight requests finish once the tool server drains them
    const closing = this.http.close();
    try {
      await this.supervisor.stop();
    } finally {
      await closing.catch((err: unknown) => {
        logError(`Failed to close HTTP server: ${errorMessage(err)}`, { component: "Bridge" });
      });
      this.resolveDone(this.exhausted ? 1 : 0);
    }
  }
}

/**
 * Spawn the tool server once, discover its tools and return the OpenAPI
 * document, then stop the subprocess. Used by the `openapi` command.
 */
export async function discoverOpenApi(config: BridgeConfig, deps: BridgeDependencies = {}): Promise<OpenApiDocument> {
  const captured: { document?: OpenApiDocument } = {};

  const supervisor = createSupervisor(
    config,
    async (context) => {
      captured.document = (await discoverGeneration(context, config.callTimeoutMs)).openapi;
    },
    deps,
    { ...config.restart, maxRestarts: 0 }
  );

  try {
    await supervisor.start(config.subprocess.command, config.subprocess.args);
  } finally {
    await supervisor.stop();
  }

  if (!captured.document) {
    throw new Error("Tool server became ready without completing discovery");
  }
  return captured.document;
}
