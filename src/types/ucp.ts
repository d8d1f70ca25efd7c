/**
 * @packageDocumentation
 * @module UCPTypes
 * @description
 * Type definitions for the Universal Commerce Protocol (UCP) checkout surface.
 *
 * Includes:
 * - Wire types decoded from merchant responses (inferred from {@link CheckoutSessionSchema}).
 * - Typed request payloads, one per endpoint.
 * - Caller-facing inputs for the orchestrator.
 */
import type { z } from 'zod';
import type {
  AppliedDiscountSchema,
  CapabilitySchema,
  CheckoutSessionSchema,
  DiscountsSchema,
  FulfillmentDestinationSchema,
  FulfillmentGroupSchema,
  FulfillmentMethodSchema,
  FulfillmentOptionSchema,
  FulfillmentSchema,
  LineItemSchema,
  OrderSchema,
  PaymentBlockSchema,
  PaymentHandlerSchema,
  TotalsEntrySchema,
} from '../ucp/schemas';

// Wire types (responses)

export type TotalsEntry = z.infer<typeof TotalsEntrySchema>;
export type LineItem = z.infer<typeof LineItemSchema>;
export type AppliedDiscount = z.infer<typeof AppliedDiscountSchema>;
export type Discounts = z.infer<typeof DiscountsSchema>;
export type FulfillmentOption = z.infer<typeof FulfillmentOptionSchema>;
export type FulfillmentGroup = z.infer<typeof FulfillmentGroupSchema>;
export type FulfillmentDestination = z.infer<typeof FulfillmentDestinationSchema>;
export type FulfillmentMethod = z.infer<typeof FulfillmentMethodSchema>;
export type Fulfillment = z.infer<typeof FulfillmentSchema>;
export type Order = z.infer<typeof OrderSchema>;
export type PaymentBlock = z.infer<typeof PaymentBlockSchema>;
export type CheckoutSessionWire = z.infer<typeof CheckoutSessionSchema>;
export type Capability = z.infer<typeof CapabilitySchema>;
export type PaymentHandler = z.infer<typeof PaymentHandlerSchema>;

/** Known session statuses; merchants may send others. */
export type CheckoutStatus = 'open' | 'ready_for_complete' | 'complete' | (string & {});

export type TotalsType = 'subtotal' | 'discount' | 'fulfillment' | 'tax' | 'total' | (string & {});

export interface DiscoveryResult {
  ucpVersion: string;
  capabilities: Capability[];
  paymentHandlers: PaymentHandler[];
}

// Request payloads

export interface LineItemInput {
  id?: string;
  item: { id: string; title?: string; [field: string]: unknown };
  quantity: number;
}

/** Line items either freshly supplied or carried forward from a snapshot. */
export type LineItemPayload = LineItemInput | LineItem;

export interface CreateCheckoutPayload {
  line_items: LineItemInput[];
  buyer: { full_name: string; email: string };
  currency: string;
  payment: { instruments: unknown[]; handlers: unknown[] };
}

export interface FulfillmentGroupSelection {
  id?: string;
  selected_option_id: string;
}

export interface FulfillmentMethodRequest {
  id?: string;
  type: 'shipping';
  selected_destination_id?: string;
  groups?: FulfillmentGroupSelection[];
}

export interface FulfillmentRequest {
  methods: FulfillmentMethodRequest[];
}

export interface UpdateCheckoutPayload {
  id: string;
  line_items?: LineItemPayload[];
  currency: string;
  payment: PaymentBlock;
  discounts?: { codes: string[] };
  fulfillment?: FulfillmentRequest;
}

export interface BillingAddress {
  street_address: string;
  address_locality: string;
  address_region: string;
  address_country: string;
  postal_code: string;
}

export interface RiskSignals {
  ip: string;
  browser: string;
  [signal: string]: string;
}

export interface CompleteCheckoutPayload {
  payment_data: {
    id: string;
    handler_id: string;
    handler_name: string;
    type: 'card';
    brand: string;
    last_digits: string;
    credential: { type: 'token'; token: string };
    billing_address: BillingAddress;
  };
  risk_signals: RiskSignals;
}

// Orchestrator inputs

export interface CheckoutItem {
  id: string;
  title?: string;
  quantity: number;
}

export interface BuyerInfo {
  name: string;
  email: string;
}

export interface CreateCheckoutParams {
  items: CheckoutItem[];
  buyer: BuyerInfo;
  currency?: string;
  paymentHandlers?: unknown[];
}

/**
 * A partial change to a session. Omitted fields are carried forward from
 * the latest snapshot; `discountCodes: []` asks the merchant to clear codes.
 */
export interface CheckoutChange {
  discountCodes?: string[];
  lineItems?: LineItemPayload[];
  fulfillment?: FulfillmentRequest;
}

export interface CardDetails {
  token: string;
  brand: string;
  lastDigits: string;
}

export interface CompleteCheckoutParams {
  handlerId: string;
  handlerName?: string;
  card: CardDetails;
}
