/**
 * Dynamic Router - the runtime route table for tool endpoints.
 *
 * A RouteTable is built in full from one discovery pass and published with a
 * single assignment, so every request sees either the old table or the new
 * one. Each binding captures the correlator of the generation that
 * discovered it.
 */

import type { z } from 'zod';
import type { ToolDescriptor } from './capability-discovery.js';
import { toOpenApi, type OpenApiDocument } from './openapi-translator.js';
import type { LifecycleState } from './process-supervisor.js';
import type { CallOptions } from './request-correlator.js';
import { isRecord, jsonSchemaToZod, toSchemaIssues } from './schema-utils.js';
import {
  BridgeError,
  HttpError,
  SchemaValidationError,
  ToolInvocationError,
  TransportError,
  UnavailableError,
  normalizeError,
  toErrorEnvelope,
} from '../utils/errors.js';
import { logDebug, logError, logWarn } from '../utils/logger.js';

/** What a binding needs from its generation's correlator. */
export interface ToolCaller {
  call(method: string, params?: unknown, options?: CallOptions): Promise<unknown>;
}

export interface RouteBinding {
  readonly path: string;
  readonly method: 'POST';
  readonly descriptor: ToolDescriptor;
  readonly validator: z.ZodTypeAny;
  readonly generation: number;
  invoke(args: unknown, timeoutMs: number): Promise<unknown>;
}

export interface RouteTable {
  readonly generation: number;
  /** Keyed by request path, e.g. "/echo" */
  readonly routes: ReadonlyMap<string, RouteBinding>;
  readonly openapi: OpenApiDocument;
}

export interface RouterResponse {
  status: number;
  body: unknown;
  headers?: Record<string, string>;
}

export interface DynamicRouterOptions {
  callTimeoutMs: number;
  /** Current supervisor state, read on every request */
  state: () => LifecycleState;
  /** Retry-After value sent with 503 transport errors (default 1) */
  retryAfterSeconds?: number;
}

/**
 * Build a complete table for one generation. Validators are compiled here,
 * before anything is published.
 */
export function buildRouteTable(
  generation: number,
  caller: ToolCaller,
  tools: readonly ToolDescriptor[],
  openapi: OpenApiDocument
): RouteTable {
  const routes = new Map<string, RouteBinding>();

  for (const descriptor of tools) {
    const path = `/${descriptor.path}`;
    routes.set(path, {
      path,
      method: 'POST',
      descriptor,
      validator: jsonSchemaToZod(descriptor.inputSchema),
      generation,
      invoke: (args, timeoutMs) => caller.call('tools/call', { name: descriptor.name, arguments: args }, { timeoutMs }),
    });
  }

  return Object.freeze({ generation, routes, openapi });
}

/**
 * Turn a `tools/call` result into the HTTP response body.
 *
 * - `isError: true` fails with a tool_error carrying the unpacked content
 * - an object `structuredContent` is returned as-is
 * - a `content` array is unpacked: text items are parsed as JSON where possible
 * - anything else is returned verbatim
 */
export function shapeToolResult(toolName: string, result: unknown): unknown {
  if (!isRecord(result)) {
    return result;
  }

  const content = Array.isArray(result.content) ? result.content.map(unpackContentItem) : undefined;

  if (result.isError === true) {
    const firstText = Array.isArray(result.content)
      ? result.content.find((item): item is { text: string } => isRecord(item) && typeof item.text === 'string')
      : undefined;
    throw new ToolInvocationError(
      firstText ? `Tool ${toolName} failed: ${firstText.text}` : `Tool ${toolName} reported an error`,
      { toolResult: content ?? result }
    );
  }

  if (isRecord(result.structuredContent)) {
    return result.structuredContent;
  }

  return content ?? result;
}

function unpackContentItem(item: unknown): unknown {
  if (!isRecord(item) || item.type !== 'text' || typeof item.text !== 'string') {
    return item;
  }
  try {
    return JSON.parse(item.text);
  } catch {
    return item.text;
  }
}

const EMPTY_TABLE: RouteTable = Object.freeze({
  generation: 0,
  routes: new Map<string, RouteBinding>(),
  openapi: toOpenApi([]),
});

export class DynamicRouter {
  private table: RouteTable = EMPTY_TABLE;
  // Bindings whose generation lost its transport; replaced wholesale on swap
  private unavailable = new Set<RouteBinding>();
  private readonly retryAfter: string;

  constructor(private readonly options: DynamicRouterOptions) {
    this.retryAfter = String(options.retryAfterSeconds ?? 1);
  }

  /** The table currently serving requests. */
  get current(): RouteTable {
    return this.table;
  }

  /** Publish a new table. The previous one stays valid for requests already holding it. */
  swap(table: RouteTable): void {
    this.table = table;
    this.unavailable = new Set();
    logDebug(`Published ${table.routes.size} route(s) for generation ${table.generation}`, { component: 'Router' });
  }

  /**
   * Handle one request against the current table snapshot.
   * `body` is the decoded JSON body, or undefined when the request had none.
   */
  async dispatch(method: string, path: string, body: unknown): Promise<RouterResponse> {
    const table = this.table;
    const binding = table.routes.get(path);

    try {
      if (!binding) {
        throw new HttpError('not_found', 404, `No tool is served at ${path}`);
      }
      if (method !== binding.method) {
        const error = new HttpError('method_not_allowed', 405, `${method} is not allowed on ${path}`);
        return { ...this.errorResponse(error), headers: { Allow: binding.method } };
      }

      const state = this.options.state();
      if (state !== 'ready') {
        throw new UnavailableError(state);
      }
      if (this.unavailable.has(binding)) {
        throw new TransportError(`Connection to the tool server (generation ${binding.generation}) was lost`);
      }

      const args = body ?? {};
      const parsed = binding.validator.safeParse(args);
      if (!parsed.success) {
        throw new SchemaValidationError(
          `Arguments do not match the input schema of ${binding.descriptor.name}`,
          toSchemaIssues(parsed.error)
        );
      }

      const result = await this.invoke(binding, args);
      return { status: 200, body: shapeToolResult(binding.descriptor.name, result) };
    } catch (err) {
      return this.errorResponse(err);
    }
  }

  private async invoke(binding: RouteBinding, args: unknown): Promise<unknown> {
    try {
      return await binding.invoke(args, this.options.callTimeoutMs);
    } catch (err) {
      if (err instanceof TransportError && this.table.routes.get(binding.path) === binding) {
        this.unavailable.add(binding);
        logWarn(`Route ${binding.path} marked unavailable until the next discovery`, {
          component: 'Router',
          generation: binding.generation,
        });
      }
      throw err;
    }
  }

  private errorResponse(err: unknown): RouterResponse {
    const error = normalizeError(err);
    if (!(err instanceof BridgeError)) {
      logError('Unexpected error while dispatching', err instanceof Error ? err : { error: String(err) });
    }

    const response: RouterResponse = { status: error.statusCode, body: toErrorEnvelope(error) };
    if (error instanceof TransportError) {
      response.headers = { 'Retry-After': this.retryAfter };
    }
    return response;
  }
}
