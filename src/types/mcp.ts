/**
 * MCP-specific type definitions
 */

import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

export type ToolResponse = CallToolResult;

export type ToolListing = Tool;

/**
 * Per-call state handed to a tool handler, built from the inbound
 * `Authorization` header when the transport carries one. `credential` is the
 * value after the scheme; `scheme` defaults to `Bearer`. An empty `scheme`
 * means the header had none and `credential` is the whole value.
 */
export interface InvocationContext {
  credential?: string;
  scheme?: string;
}

export type ToolHandler = (
  args: Record<string, unknown>,
  context: InvocationContext
) => Promise<ToolResponse>;

export interface RegisteredTool {
  listing: ToolListing;
  handler: ToolHandler;
}
