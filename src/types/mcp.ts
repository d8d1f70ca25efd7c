/**
 * @packageDocumentation
 * @module MCPTypes
 * @description
 * Type definitions for the Model Context Protocol (MCP).
 *
 * Defines the structure of Tools exposed to Large Language Models.
 */
export type JsonSchema = Record<string, unknown>;

/** A tool's plain-object answer; failures carry a single `error` string. */
export type ToolResponse = Record<string, unknown>;

export type ToolError = {
  error: string;
};

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: JsonSchema;
  handler: (params: unknown) => Promise<ToolResponse>;
}

export interface MCPToolResult {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
}
