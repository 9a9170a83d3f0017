/**
 * Capability Discovery - MCP handshake and tool listing for one generation.
 *
 * Runs `initialize`, confirms with `notifications/initialized`, then pages
 * through `tools/list`. Every advertised tool is validated on its own: an
 * entry that is malformed, has an unusable schema, or collides with another
 * entry's name or HTTP path is dropped with a warning, and the remaining
 * tools are still published.
 */

import {
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
  ToolSchema,
} from "@modelcontextprotocol/sdk/types.js";
import type { RequestCorrelator } from "./request-correlator.js";
import { isRecord, jsonSchemaToZod, toPathSegment, type JsonSchema } from "./schema-utils.js";
import { ProtocolError, errorMessage } from "../utils/errors.js";
import { logDebug, logInfo, logWarn } from "../utils/logger.js";

/**
 * The normalized, immutable description of one tool.
 */
export interface ToolDescriptor {
  readonly name: string;
  /** Sanitized HTTP path segment (without the leading slash) */
  readonly path: string;
  readonly title?: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly outputSchema?: JsonSchema;
  readonly annotations?: Record<string, unknown>;
}

export interface RejectedTool {
  name: string | null;
  reason: string;
}

export interface ServerInfo {
  name: string;
  version: string;
}

export interface DiscoveryResult {
  protocolVersion: string;
  serverInfo: ServerInfo;
  instructions?: string;
  tools: readonly ToolDescriptor[];
  rejected: RejectedTool[];
}

export interface DiscoveryOptions {
  clientInfo: ServerInfo;
  /** Deadline for each handshake / listing request */
  timeoutMs?: number;
  /** Upper bound on tools/list pages followed through nextCursor (default 100) */
  maxPages?: number;
}

const DEFAULT_MAX_PAGES = 100;

export class CapabilityDiscovery {
  constructor(
    private readonly correlator: RequestCorrelator,
    private readonly options: DiscoveryOptions
  ) {}

  /**
   * Perform the handshake and list tools.
   * Fails with ProtocolError when the server's initialize result does not
   * match the protocol.
   */
  async discover(): Promise<DiscoveryResult> {
    const handshake = await this.initialize();

    const entries = await this.listTools();
    const { tools, rejected } = validateToolEntries(entries);

    for (const rejection of rejected) {
      logWarn(`Dropping tool ${rejection.name ?? "(unnamed)"}: ${rejection.reason}`, {
        component: "Discovery",
        generation: this.correlator.generation,
      });
    }

    logInfo(
      `Discovered ${tools.length} tool${tools.length !== 1 ? "s" : ""} from "${handshake.serverInfo.name}"` +
        (rejected.length > 0 ? ` (${rejected.length} dropped)` : ""),
      { component: "Discovery", generation: this.correlator.generation }
    );

    return { ...handshake, tools, rejected };
  }

  private async initialize(): Promise<Omit<DiscoveryResult, "tools" | "rejected">> {
    const result = await this.correlator.call(
      "initialize",
      {
        protocolVersion: LATEST_PROTOCOL_VERSION,
        capabilities: {},
        clientInfo: this.options.clientInfo,
      },
      { timeoutMs: this.options.timeoutMs }
    );

    const parsed = InitializeResultSchema.safeParse(result);
    if (!parsed.success) {
      throw new ProtocolError("Invalid initialize result", { details: parsed.error.issues });
    }

    const { protocolVersion, serverInfo, instructions } = parsed.data;
    if (!SUPPORTED_PROTOCOL_VERSIONS.includes(protocolVersion)) {
      throw new ProtocolError(`Server protocol version ${protocolVersion} is not supported`);
    }

    logDebug(`Handshake with ${serverInfo.name}@${serverInfo.version} (protocol ${protocolVersion})`, {
      component: "Discovery",
      generation: this.correlator.generation,
    });

    await this.correlator.notify("notifications/initialized");

    return {
      protocolVersion,
      serverInfo: { name: serverInfo.name, version: serverInfo.version },
      instructions: typeof instructions === "string" ? instructions : undefined,
    };
  }

  private async listTools(): Promise<unknown[]> {
    const maxPages = this.options.maxPages ?? DEFAULT_MAX_PAGES;
    const entries: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < maxPages; page++) {
      const result = await this.correlator.call("tools/list", cursor !== undefined ? { cursor } : {}, {
        timeoutMs: this.options.timeoutMs,
      });

      if (!isRecord(result) || !Array.isArray(result.tools)) {
        throw new ProtocolError("tools/list result has no tools array", { details: result });
      }
      entries.push(...result.tools);

      if (typeof result.nextCursor !== "string" || result.nextCursor.length === 0) {
        return entries;
      }
      cursor = result.nextCursor;
    }

    logWarn(`tools/list still paginating after ${maxPages} pages; using what was listed`, {
      component: "Discovery",
      generation: this.correlator.generation,
    });
    return entries;
  }
}

/**
 * Validate raw `tools/list` entries into descriptors.
 *
 * Entries are checked individually; then every group of entries that shares
 * a name or a sanitized path is rejected as a whole, because there is no
 * principled way to pick a winner.
 */
export function validateToolEntries(entries: readonly unknown[]): {
  tools: ToolDescriptor[];
  rejected: RejectedTool[];
} {
  const rejected: RejectedTool[] = [];
  const candidates: ToolDescriptor[] = [];

  for (const entry of entries) {
    const outcome = toDescriptor(entry);
    if ("reason" in outcome) {
      rejected.push(outcome);
    } else {
      candidates.push(outcome);
    }
  }

  const byPath = new Map<string, ToolDescriptor[]>();
  for (const candidate of candidates) {
    const group = byPath.get(candidate.path) ?? [];
    group.push(candidate);
    byPath.set(candidate.path, group);
  }

  const tools: ToolDescriptor[] = [];
  for (const [path, group] of byPath) {
    const [only, ...others] = group;
    if (only && others.length === 0) {
      tools.push(only);
      continue;
    }
    const names = group.map((tool) => tool.name);
    for (const tool of group) {
      rejected.push({
        name: tool.name,
        reason: `path /${path} is shared by tools ${names.map((name) => JSON.stringify(name)).join(", ")}`,
      });
    }
  }

  return { tools, rejected };
}

function entryName(entry: unknown): string | null {
  return isRecord(entry) && typeof entry.name === "string" ? entry.name : null;
}

function toDescriptor(entry: unknown): ToolDescriptor | RejectedTool {
  const name = entryName(entry);

  const parsed = ToolSchema.safeParse(entry);
  if (!parsed.success || !isRecord(entry) || name === null) {
    const issue = parsed.success ? "entry is not an object" : parsed.error.issues[0]?.message ?? "invalid entry";
    return { name, reason: `malformed tool entry: ${issue}` };
  }
  if (name.trim().length === 0) {
    return { name, reason: "empty tool name" };
  }

  const path = toPathSegment(name);
  if (path === null) {
    return { name, reason: "name has no characters usable in a URL path" };
  }

  const inputSchema = entry.inputSchema;
  if (!isRecord(inputSchema)) {
    return { name, reason: "inputSchema is not an object" };
  }
  try {
    jsonSchemaToZod(inputSchema);
  } catch (error) {
    return { name, reason: `inputSchema is not usable: ${errorMessage(error)}` };
  }

  let outputSchema: JsonSchema | undefined;
  if (entry.outputSchema !== undefined) {
    if (!isRecord(entry.outputSchema) || entry.outputSchema.type !== "object") {
      return { name, reason: "outputSchema must be an object schema" };
    }
    outputSchema = structuredClone(entry.outputSchema);
  }

  return Object.freeze({
    name,
    path,
    title: typeof entry.title === "string" ? entry.title : undefined,
    description: typeof entry.description === "string" ? entry.description : "",
    inputSchema: Object.freeze(structuredClone(inputSchema)),
    outputSchema: outputSchema ? Object.freeze(outputSchema) : undefined,
    annotations: isRecord(entry.annotations) ? structuredClone(entry.annotations) : undefined,
  });
}
