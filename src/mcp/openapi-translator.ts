/**
 * Schema Translator - ToolDescriptors to an OpenAPI 3.1 document.
 *
 * Pure and deterministic: the same descriptors and server info always yield
 * the same document, with paths in sorted order.
 */

import type { ServerInfo, ToolDescriptor } from "./capability-discovery.js";
import { toSummary, type JsonSchema } from "./schema-utils.js";

export const OPENAPI_VERSION = "3.1.0";
export const DEFAULT_TITLE = "MCP OpenAPI Bridge";
export const DEFAULT_API_VERSION = "1.0";

export interface OpenApiResponse {
  description: string;
  content?: Record<string, { schema: JsonSchema }>;
}

export interface OpenApiOperation {
  operationId: string;
  summary: string;
  description: string;
  requestBody: {
    required: boolean;
    content: Record<string, { schema: JsonSchema }>;
  };
  responses: Record<string, OpenApiResponse>;
  "x-mcp-tool": string;
}

export interface OpenApiDocument {
  openapi: typeof OPENAPI_VERSION;
  info: { title: string; description: string; version: string };
  paths: Record<string, { post: OpenApiOperation }>;
  components: { schemas: Record<string, JsonSchema> };
}

const ERROR_ENVELOPE_REF = { $ref: "#/components/schemas/ErrorEnvelope" };

const ERROR_ENVELOPE_SCHEMA: JsonSchema = {
  type: "object",
  required: ["error"],
  properties: {
    error: {
      type: "object",
      required: ["kind", "message"],
      properties: {
        kind: { type: "string" },
        message: { type: "string" },
        state: { type: "string" },
        issues: {
          type: "array",
          items: {
            type: "object",
            properties: { path: { type: "string" }, message: { type: "string" } },
          },
        },
        rpcError: {
          type: "object",
          properties: { code: { type: "integer" }, message: { type: "string" }, data: {} },
        },
        result: {},
      },
      additionalProperties: true,
    },
  },
};

const ERROR_RESPONSES: Record<string, string> = {
  "400": "Bad request",
  "422": "Arguments do not match the tool's input schema",
  "502": "The tool server reported an error or sent an invalid message",
  "503": "The tool server is unavailable",
  "504": "The tool server did not answer in time",
};

function errorResponse(description: string): OpenApiResponse {
  return { description, content: { "application/json": { schema: { ...ERROR_ENVELOPE_REF } } } };
}

function toOperation(tool: ToolDescriptor): OpenApiOperation {
  const responses: Record<string, OpenApiResponse> = {
    "200": {
      description: "Successful Response",
      content: {
        "application/json": {
          schema: tool.outputSchema ? structuredClone(tool.outputSchema) : {},
        },
      },
    },
  };
  for (const [status, description] of Object.entries(ERROR_RESPONSES)) {
    responses[status] = errorResponse(description);
  }

  return {
    operationId: tool.path,
    summary: toSummary(tool.name),
    description: tool.description,
    requestBody: {
      required: true,
      content: { "application/json": { schema: structuredClone(tool.inputSchema) } },
    },
    responses,
    "x-mcp-tool": tool.name,
  };
}

/**
 * Build the OpenAPI document for a set of tools.
 * `info` is the subprocess's serverInfo; either field may be missing or empty.
 */
export function toOpenApi(tools: readonly ToolDescriptor[], info: Partial<ServerInfo> = {}): OpenApiDocument {
  const title = info.name?.trim() || DEFAULT_TITLE;

  const paths: Record<string, { post: OpenApiOperation }> = {};
  const sorted = [...tools].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  for (const tool of sorted) {
    paths[`/${tool.path}`] = { post: toOperation(tool) };
  }

  return {
    openapi: OPENAPI_VERSION,
    info: {
      title,
      description: title === DEFAULT_TITLE ? DEFAULT_TITLE : `${title} MCP OpenAPI Bridge`,
      version: info.version?.trim() || DEFAULT_API_VERSION,
    },
    paths,
    components: { schemas: { ErrorEnvelope: structuredClone(ERROR_ENVELOPE_SCHEMA) } },
  };
}
