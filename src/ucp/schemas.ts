/**
 * @packageDocumentation
 * @module UCPSchemas
 * @description
 * zod schemas for the merchant responses this client consumes.
 *
 * Objects are `passthrough()` so merchant-defined fields survive decoding;
 * the update merger resends line items and the payment block verbatim.
 * Optional fields carry no defaults unless the protocol defines one. Line
 * items stay absent when the merchant omits them, so a merge never turns
 * "not sent" into an empty cart.
 */
import { z } from 'zod';

export const TotalsEntrySchema = z.object({
  type: z.string(),
  amount: z.number().int().optional(),
}).passthrough();

export const ItemDescriptorSchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
}).passthrough();

export const LineItemSchema = z.object({
  id: z.string().optional(),
  item: ItemDescriptorSchema,
  quantity: z.number().int().positive(),
  totals: z.array(TotalsEntrySchema).optional(),
}).passthrough();

export const AppliedDiscountSchema = z.object({
  code: z.string().optional(),
  title: z.string().nullable().optional(),
  amount: z.number().int(),
  automatic: z.boolean().optional(),
}).passthrough();

export const DiscountsSchema = z.object({
  codes: z.array(z.string()).optional(),
  applied: z.array(AppliedDiscountSchema).optional(),
}).passthrough();

export const FulfillmentOptionSchema = z.object({
  id: z.string(),
  title: z.string().optional(),
  totals: z.array(TotalsEntrySchema).optional(),
}).passthrough();

export const FulfillmentGroupSchema = z.object({
  id: z.string().optional(),
  line_item_ids: z.array(z.string()).optional(),
  options: z.array(FulfillmentOptionSchema).optional(),
  selected_option_id: z.string().nullable().optional(),
}).passthrough();

export const FulfillmentDestinationSchema = z.object({
  id: z.string(),
}).passthrough();

export const FulfillmentMethodSchema = z.object({
  id: z.string().optional(),
  type: z.string(),
  line_item_ids: z.array(z.string()).optional(),
  destinations: z.array(FulfillmentDestinationSchema).optional(),
  selected_destination_id: z.string().nullable().optional(),
  groups: z.array(FulfillmentGroupSchema).optional(),
}).passthrough();

export const FulfillmentSchema = z.object({
  methods: z.array(FulfillmentMethodSchema).optional(),
}).passthrough();

export const OrderSchema = z.object({
  id: z.string().nullable().optional(),
  permalink_url: z.string().nullable().optional(),
}).passthrough();

export const PaymentBlockSchema = z.object({
  instruments: z.array(z.unknown()).optional(),
  handlers: z.array(z.unknown()).optional(),
}).passthrough();

export const CheckoutSessionSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  currency: z.string().default('USD'),
  line_items: z.array(LineItemSchema).optional(),
  totals: z.array(TotalsEntrySchema).default([]),
  discounts: DiscountsSchema.default({}),
  fulfillment: FulfillmentSchema.nullable().optional(),
  order: OrderSchema.nullable().optional(),
  payment: PaymentBlockSchema.optional(),
}).passthrough();

export const CapabilitySchema = z.object({
  name: z.string(),
  version: z.string(),
  spec: z.string().optional(),
  schema: z.string().optional(),
  extends: z.string().optional(),
}).passthrough();

export const PaymentHandlerSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string(),
  spec: z.string().optional(),
  config: z.record(z.unknown()).default({}),
}).passthrough();

export const DiscoveryDocumentSchema = z.object({
  ucp: z.object({
    version: z.string().default('unknown'),
    capabilities: z.array(CapabilitySchema).default([]),
  }).passthrough().default({}),
  payment: z.object({
    handlers: z.array(PaymentHandlerSchema).default([]),
  }).passthrough().default({}),
}).passthrough();
