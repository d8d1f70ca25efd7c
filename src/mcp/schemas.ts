/**
 * @packageDocumentation
 * @module MCPSchemas
 * @description
 * Input definitions for the checkout tools.
 *
 * Each tool has a JSON Schema (advertised to the LLM through `getTools()`)
 * and a zod schema (applied to the arguments the LLM actually sends).
 */
import { z } from 'zod';

const MERCHANT_URL = { type: 'string', description: 'Base URL of the UCP-enabled merchant (e.g. http://localhost:8182)' };
const CHECKOUT_ID = { type: 'string', description: 'ID of the checkout session, as returned by ucp_checkout_create' };

export const DISCOVER_SCHEMA = {
  type: 'object',
  properties: {
    merchant_url: MERCHANT_URL,
  },
  required: ['merchant_url'],
};

export const CREATE_CHECKOUT_SCHEMA = {
  type: 'object',
  properties: {
    merchant_url: MERCHANT_URL,
    items: {
      type: 'array',
      description: 'Items to purchase',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          title: { type: 'string' },
          quantity: { type: 'integer', minimum: 1, default: 1 },
        },
        required: ['id'],
      },
    },
    buyer_name: { type: 'string', description: 'Full name of the buyer' },
    buyer_email: { type: 'string', description: 'Email address of the buyer' },
    currency: { type: 'string', description: 'ISO 4217 currency code (default: USD)' },
  },
  required: ['merchant_url', 'items', 'buyer_name', 'buyer_email'],
};

export const UPDATE_CHECKOUT_SCHEMA = {
  type: 'object',
  properties: {
    merchant_url: MERCHANT_URL,
    checkout_id: CHECKOUT_ID,
    discount_codes: {
      type: 'array',
      items: { type: 'string' },
      description: 'Discount/promo codes to apply. Omit to leave discounts as they are; pass [] to remove them.',
    },
  },
  required: ['merchant_url', 'checkout_id'],
};

export const SET_FULFILLMENT_SCHEMA = {
  type: 'object',
  properties: {
    merchant_url: MERCHANT_URL,
    checkout_id: CHECKOUT_ID,
  },
  required: ['merchant_url', 'checkout_id'],
};

export const COMPLETE_CHECKOUT_SCHEMA = {
  type: 'object',
  properties: {
    merchant_url: MERCHANT_URL,
    checkout_id: CHECKOUT_ID,
    payment_handler_id: { type: 'string', description: 'Payment handler ID from ucp_discover (default: mock_payment_handler)' },
    card_token: { type: 'string', description: 'Payment token from the payment provider' },
    card_brand: { type: 'string', description: 'Card brand, e.g. Visa or Mastercard' },
    card_last_digits: { type: 'string', description: 'Last 4 digits of the card' },
  },
  required: ['merchant_url', 'checkout_id'],
};

const merchantUrl = z.string().url();
const checkoutId = z.string().min(1);

export const DiscoverArgs = z.object({
  merchant_url: merchantUrl,
});

export const CreateCheckoutArgs = z.object({
  merchant_url: merchantUrl,
  items: z.array(z.object({
    id: z.string().min(1),
    title: z.string().optional(),
    quantity: z.number().int().positive().default(1),
  })).min(1),
  buyer_name: z.string(),
  buyer_email: z.string(),
  currency: z.string().optional(),
});

export const UpdateCheckoutArgs = z.object({
  merchant_url: merchantUrl,
  checkout_id: checkoutId,
  discount_codes: z.array(z.string()).nullish(),
});

export const SetFulfillmentArgs = z.object({
  merchant_url: merchantUrl,
  checkout_id: checkoutId,
});

export const CompleteCheckoutArgs = z.object({
  merchant_url: merchantUrl,
  checkout_id: checkoutId,
  payment_handler_id: z.string().default('mock_payment_handler'),
  card_token: z.string().default('success_token'),
  card_brand: z.string().default('Visa'),
  card_last_digits: z.string().default('4242'),
});
