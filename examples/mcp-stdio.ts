/**
 * Example: MCP over stdio
 *
 * Serves the checkout tools to an MCP host (e.g. an LLM desktop client)
 * as newline-delimited JSON-RPC on stdin/stdout. Handles `initialize`,
 * `tools/list` and `tools/call`; notifications are ignored.
 *
 * stdout carries protocol messages only, so all logging goes to stderr.
 */

import readline from 'readline';
import { createMCPServer, MCPServer } from '../src';

interface RpcRequest {
    jsonrpc: '2.0';
    id?: string | number;
    method: string;
    params?: Record<string, unknown>;
}

type RpcPayload = { result: unknown } | { error: { code: number; message: string } };

function isRpcRequest(value: unknown): value is RpcRequest {
    return typeof value === 'object' && value !== null && 'method' in value && typeof value.method === 'string';
}

async function dispatch(server: MCPServer, request: RpcRequest): Promise<RpcPayload> {
    switch (request.method) {
        case 'initialize':
            return {
                result: {
                    protocolVersion: '2024-11-05',
                    capabilities: { tools: {} },
                    serverInfo: { name: 'ucp-checkout-agent', version: '0.1.0' },
                },
            };
        case 'tools/list':
            return {
                result: {
                    tools: server.getTools().map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
                },
            };
        case 'tools/call': {
            const name = request.params?.name;
            if (typeof name !== 'string') {
                return { error: { code: -32602, message: 'tools/call needs a tool name' } };
            }
            return { result: await server.executeTool(name, request.params?.arguments ?? {}) };
        }
        default:
            return { error: { code: -32601, message: `Method not found: ${request.method}` } };
    }
}

/**
 * Answer one input line. Returns the response line, or undefined for
 * blank lines, notifications and unparseable input.
 */
export async function handleLine(server: MCPServer, line: string): Promise<string | undefined> {
    if (line.trim() === '') return undefined;

    let request: unknown;
    try {
        request = JSON.parse(line);
    } catch (error) {
        console.error('[mcp-stdio] Dropping unparseable message:', error);
        return undefined;
    }
    if (!isRpcRequest(request) || request.id === undefined) return undefined;

    const payload = await dispatch(server, request);
    return JSON.stringify({ jsonrpc: '2.0', id: request.id, ...payload });
}

async function main() {
    const server = createMCPServer();
    const input = readline.createInterface({ input: process.stdin });

    for await (const line of input) {
        const response = await handleLine(server, line);
        if (response !== undefined) process.stdout.write(`${response}\n`);
    }
}

if (require.main === module) {
    main().catch(console.error);
}
