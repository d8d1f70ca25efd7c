/**
 * @packageDocumentation
 * @module UCPClient
 * @description
 * Client implementation for Universal Commerce Protocol (UCP) checkouts.
 *
 * Handles the flow of:
 * 1. Discovering the merchant's capabilities and payment handlers.
 * 2. Creating a checkout session.
 * 3. Merge-updating it (discount codes, line items).
 * 4. Negotiating fulfillment when the merchant ships goods.
 * 5. Completing the checkout with a caller-selected handler and card token.
 *
 * The client holds no session state: every call reads from and writes to
 * the merchant, which is the only source of truth. Failures come back as
 * {@link Result} values and are never retried.
 */
import { randomUUID } from 'crypto';
import { CheckoutSession } from './CheckoutSession';
import { FulfillmentNegotiator, NegotiationOutcome } from './FulfillmentNegotiator';
import { DiscoveryDocumentSchema } from './schemas';
import { UpdateMerger, sessionPath } from './UpdateMerger';
import { TransportClient } from '../transport/TransportClient';
import { CheckoutDefaults } from '../types/agent';
import { DecodeError, TransportError } from '../types/errors';
import { Result, err, ok } from '../types/result';
import {
  CheckoutChange,
  CompleteCheckoutParams,
  CompleteCheckoutPayload,
  CreateCheckoutParams,
  CreateCheckoutPayload,
  DiscoveryResult,
} from '../types/ucp';

export const DISCOVERY_PATH = '/.well-known/ucp';
export const CHECKOUT_SESSIONS_PATH = '/checkout-sessions';

export class UCPClient {
  private merger: UpdateMerger;
  private negotiator: FulfillmentNegotiator;

  constructor(private transport: TransportClient, private defaults: CheckoutDefaults) {
    this.merger = new UpdateMerger(transport, defaults.currency);
    this.negotiator = new FulfillmentNegotiator(this.merger);
  }

  async discover(): Promise<Result<DiscoveryResult, TransportError>> {
    const response = await this.transport.send('GET', DISCOVERY_PATH);
    if (!response.ok) return response;

    const parsed = DiscoveryDocumentSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(new DecodeError(parsed.error, { entity: 'discovery' }));
    }
    return ok({
      ucpVersion: parsed.data.ucp.version,
      capabilities: parsed.data.ucp.capabilities,
      paymentHandlers: parsed.data.payment.handlers,
    });
  }

  async createCheckout(params: CreateCheckoutParams): Promise<Result<CheckoutSession, TransportError>> {
    const payload: CreateCheckoutPayload = {
      line_items: params.items.map(item => ({
        item: { id: item.id, title: item.title ?? '' },
        quantity: item.quantity,
      })),
      buyer: {
        full_name: params.buyer.name,
        email: params.buyer.email,
      },
      currency: params.currency ?? this.defaults.currency,
      payment: {
        instruments: [],
        handlers: params.paymentHandlers ?? [],
      },
    };

    const response = await this.transport.send('POST', CHECKOUT_SESSIONS_PATH, payload);
    return response.ok ? CheckoutSession.decode(response.value) : response;
  }

  getCheckout(checkoutId: string): Promise<Result<CheckoutSession, TransportError>> {
    return this.merger.fetchSession(checkoutId);
  }

  /**
   * Apply a partial change. Fields not in `change` are carried forward from
   * a snapshot fetched just before the PUT.
   */
  updateCheckout(checkoutId: string, change: CheckoutChange): Promise<Result<CheckoutSession, TransportError>> {
    return this.merger.apply(checkoutId, change);
  }

  /**
   * Select the first offered shipping destination and option.
   */
  negotiateFulfillment(checkoutId: string): Promise<Result<NegotiationOutcome, TransportError>> {
    return this.negotiator.negotiate(checkoutId);
  }

  async completeCheckout(
    checkoutId: string,
    params: CompleteCheckoutParams
  ): Promise<Result<CheckoutSession, TransportError>> {
    const payload: CompleteCheckoutPayload = {
      payment_data: {
        id: `instr_${randomUUID()}`,
        handler_id: params.handlerId,
        handler_name: params.handlerName ?? params.handlerId,
        type: 'card',
        brand: params.card.brand,
        last_digits: params.card.lastDigits,
        credential: { type: 'token', token: params.card.token },
        billing_address: { ...this.defaults.billingAddress },
      },
      risk_signals: { ...this.defaults.riskSignals },
    };

    const response = await this.transport.send('POST', `${sessionPath(checkoutId)}/complete`, payload);
    return response.ok ? CheckoutSession.decode(response.value) : response;
  }
}
