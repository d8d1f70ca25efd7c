/**
 * @packageDocumentation
 * @module UCPCheckoutAgent
 * @description
 * Lets an automated agent buy from any merchant that speaks the Universal
 * Commerce Protocol (UCP) checkout surface.
 *
 * Exports:
 * - **createMCPServer**: Factory for the tool-calling boundary.
 * - **UCPClient**: The checkout orchestrator (create, update, fulfillment, complete).
 * - **withTransport**: Scoped HTTP transport for one merchant.
 * - **Types**: Session model, wire types, error taxonomy and results.
 */
import { loadConfig, resolveConfig } from './config';
import { MCPServer } from './mcp/MCPServer';
import { PartialAgentConfig } from './types/agent';

/**
 * Build the MCP tool server. Without an explicit config, settings come from
 * the environment (and `.env`).
 */
export function createMCPServer(config?: PartialAgentConfig): MCPServer {
  return new MCPServer(config ? resolveConfig(config) : loadConfig());
}

export * from './config';
export * from './types/agent';
export * from './types/ucp';
export * from './types/mcp';
export * from './types/errors';
export * from './types/result';

export * from './transport/ConnectionPool';
export * from './transport/RequestSigner';
export * from './transport/TransportClient';

export * from './ucp/CheckoutSession';
export * from './ucp/UpdateMerger';
export * from './ucp/FulfillmentNegotiator';
export * from './ucp/CapabilityNegotiator';
export * from './ucp/UCPClient';
export * from './ucp/schemas';

export * from './mcp/MCPServer';
export * as toolSchemas from './mcp/schemas';
