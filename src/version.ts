// Identity the bridge reports as clientInfo during the MCP handshake and on --version.

export const BRIDGE_NAME = 'mcp-openapi-bridge';
export const BRIDGE_VERSION = '0.1.0';
