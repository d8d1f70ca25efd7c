/**
 * @packageDocumentation
 * @module MCPServer
 * @description
 * Exposes the checkout flow as MCP tools.
 *
 * Each tool call opens its own transport scope against the merchant named
 * in its arguments, runs one orchestrator operation and closes the scope.
 * Tool responses are plain objects; every failure, including bad arguments
 * and unexpected faults, comes back as `{ error }` rather than a throw.
 */
import { z } from 'zod';
import { CapabilityNegotiator, FULFILLMENT_CAPABILITY } from '../ucp/CapabilityNegotiator';
import { UCPClient } from '../ucp/UCPClient';
import { withTransport } from '../transport/TransportClient';
import { AgentConfig } from '../types/agent';
import { TransportError } from '../types/errors';
import { MCPTool, MCPToolResult, ToolError, ToolResponse } from '../types/mcp';
import { Result } from '../types/result';
import * as schemas from './schemas';

function toolError(message: string): ToolError {
  return { error: message };
}

function parseArgs<S extends z.ZodTypeAny>(schema: S, params: unknown): z.infer<S> | ToolError {
  const parsed = schema.safeParse(params);
  if (parsed.success) return parsed.data;
  const details = parsed.error.issues
    .map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
    .join('; ');
  return toolError(`Invalid arguments: ${details}`);
}

function isToolError(value: unknown): value is ToolError {
  return typeof value === 'object' && value !== null && 'error' in value && typeof value.error === 'string';
}

export class MCPServer {
  private capabilityNegotiator = new CapabilityNegotiator();

  constructor(private config: AgentConfig) { }

  getTools(): MCPTool[] {
    return [
      {
        name: 'ucp_discover',
        description: "Discover a merchant's UCP capabilities and supported payment methods",
        inputSchema: schemas.DISCOVER_SCHEMA,
        handler: (params) => this.discover(params),
      },
      {
        name: 'ucp_checkout_create',
        description: 'Create a new checkout session with a UCP merchant',
        inputSchema: schemas.CREATE_CHECKOUT_SCHEMA,
        handler: (params) => this.createCheckout(params),
      },
      {
        name: 'ucp_checkout_update',
        description: 'Update an existing checkout session (e.g. apply discount codes)',
        inputSchema: schemas.UPDATE_CHECKOUT_SCHEMA,
        handler: (params) => this.updateCheckout(params),
      },
      {
        name: 'ucp_checkout_set_fulfillment',
        description: 'Set up shipping for a checkout. Selects the first offered address and delivery option. ' +
          'Call before completing when the merchant requires fulfillment.',
        inputSchema: schemas.SET_FULFILLMENT_SCHEMA,
        handler: (params) => this.setFulfillment(params),
      },
      {
        name: 'ucp_checkout_complete',
        description: 'Complete a checkout session by submitting payment. This finalizes the purchase.',
        inputSchema: schemas.COMPLETE_CHECKOUT_SCHEMA,
        handler: (params) => this.completeCheckout(params),
      },
    ];
  }

  async executeTool(toolName: string, params: unknown): Promise<MCPToolResult> {
    const tool = this.getTools().find(t => t.name === toolName);
    const result = tool ? await tool.handler(params) : toolError(`Tool ${toolName} not found`);

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      ...(isToolError(result) && { isError: true }),
    };
  }

  async discover(params: unknown): Promise<ToolResponse> {
    const args = parseArgs(schemas.DiscoverArgs, params);
    if (isToolError(args)) return args;

    return this.run(args.merchant_url, client => client.discover(), discovery => ({
      ucp_version: discovery.ucpVersion,
      capabilities: discovery.capabilities.map(cap => ({
        name: cap.name,
        version: cap.version,
        spec: cap.spec ?? null,
      })),
      payment_handlers: discovery.paymentHandlers.map(handler => ({
        id: handler.id,
        name: handler.name,
        version: handler.version,
      })),
      negotiated_capabilities: this.capabilityNegotiator.negotiate(discovery).agreed,
      requires_fulfillment_setup: this.capabilityNegotiator.supports(discovery, FULFILLMENT_CAPABILITY),
    }));
  }

  async createCheckout(params: unknown): Promise<ToolResponse> {
    const args = parseArgs(schemas.CreateCheckoutArgs, params);
    if (isToolError(args)) return args;

    return this.run(
      args.merchant_url,
      client => client.createCheckout({
        items: args.items,
        buyer: { name: args.buyer_name, email: args.buyer_email },
        currency: args.currency,
      }),
      session => ({
        checkout_id: session.id,
        status: session.status,
        total: session.total(),
        subtotal: session.subtotal(),
        currency: session.currency,
        line_items: session.lineItems.map(lineItem => ({
          id: lineItem.item.id ?? null,
          title: lineItem.item.title ?? null,
          quantity: lineItem.quantity,
        })),
      })
    );
  }

  async updateCheckout(params: unknown): Promise<ToolResponse> {
    const args = parseArgs(schemas.UpdateCheckoutArgs, params);
    if (isToolError(args)) return args;

    return this.run(
      args.merchant_url,
      client => client.updateCheckout(args.checkout_id, { discountCodes: args.discount_codes ?? undefined }),
      session => ({
        checkout_id: session.id,
        status: session.status,
        total: session.total(),
        subtotal: session.subtotal(),
        discount_applied: session.discountAmount(),
        currency: session.currency,
        discounts: session.discounts,
      })
    );
  }

  async setFulfillment(params: unknown): Promise<ToolResponse> {
    const args = parseArgs(schemas.SetFulfillmentArgs, params);
    if (isToolError(args)) return args;

    return this.run(
      args.merchant_url,
      client => client.negotiateFulfillment(args.checkout_id),
      ({ session, phase }) => ({
        checkout_id: session.id,
        status: session.status,
        total: session.total(),
        currency: session.currency,
        negotiation_phase: phase,
        fulfillment: session.fulfillment ?? null,
      })
    );
  }

  async completeCheckout(params: unknown): Promise<ToolResponse> {
    const args = parseArgs(schemas.CompleteCheckoutArgs, params);
    if (isToolError(args)) return args;

    return this.run(
      args.merchant_url,
      client => client.completeCheckout(args.checkout_id, {
        handlerId: args.payment_handler_id,
        card: {
          token: args.card_token,
          brand: args.card_brand,
          lastDigits: args.card_last_digits,
        },
      }),
      session => ({
        checkout_id: session.id,
        status: session.status,
        total: session.total(),
        currency: session.currency,
        ...(session.order && {
          order_id: session.order.id ?? null,
          order_url: session.order.permalink_url ?? null,
        }),
      })
    );
  }

  private async run<T>(
    merchantUrl: string,
    operation: (client: UCPClient) => Promise<Result<T, TransportError>>,
    shape: (value: T) => ToolResponse
  ): Promise<ToolResponse> {
    try {
      const result = await withTransport(merchantUrl, this.config.transport, transport =>
        operation(new UCPClient(transport, this.config.checkout))
      );
      return result.ok ? shape(result.value) : toolError(result.error.message);
    } catch (error) {
      console.error('[MCPServer] Unexpected failure:', error);
      return toolError(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
